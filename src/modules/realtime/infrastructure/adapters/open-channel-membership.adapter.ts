import { Injectable } from '@nestjs/common';

import type { IChannelMembershipPort } from '../../domain/ports/channel-membership.port';

/**
 * Pertenencia abierta: cualquier usuario autenticado puede unirse a cualquier
 * canal de grupo. Se sustituye registrando otro CHANNEL_MEMBERSHIP.
 */
@Injectable()
export class OpenChannelMembershipAdapter implements IChannelMembershipPort {
  async isMember(_subject: string, _channelId: string): Promise<boolean> {
    return true;
  }
}
