/**
 * Puerto de pertenencia a canales de grupo (`join_channel`).
 */
export interface IChannelMembershipPort {
  isMember(subject: string, channelId: string): Promise<boolean>;
}
