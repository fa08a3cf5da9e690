import { Inject, Injectable } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { Actor } from '../../../common/interfaces/actor.interface';
import type { IChannelMembershipPort } from '../../realtime/domain/ports/channel-membership.port';

const ADMIN_ROLE = 'admin';

const USER_TOPIC_PATTERN = /^user:([^:]+):/;
const ROLE_TOPIC_PATTERN = /^role:([^:]+):/;
const CHANNEL_TOPIC_PATTERN = /^channel:(.+)$/;

/**
 * Quién puede leer el historial de un tópico.
 *
 * - `user:{id}:*`: su dueño
 * - `role:{role}:*`: quien tenga ese rol
 * - `channel:{id}`: miembros del canal según CHANNEL_MEMBERSHIP
 *
 * Un admin lee cualquier tópico; el resto de tópicos son públicos.
 */
@Injectable()
export class EventTopicAccessService {
  constructor(
    @Inject(INJECTION_TOKENS.CHANNEL_MEMBERSHIP)
    private readonly membership: IChannelMembershipPort,
  ) {}

  async canRead(actor: Actor, topic: string): Promise<boolean> {
    if (actor.roles.includes(ADMIN_ROLE)) {
      return true;
    }

    const owner = USER_TOPIC_PATTERN.exec(topic)?.[1];
    if (owner !== undefined) {
      return owner === actor.sub;
    }

    const role = ROLE_TOPIC_PATTERN.exec(topic)?.[1];
    if (role !== undefined) {
      return actor.roles.includes(role);
    }

    const channelId = CHANNEL_TOPIC_PATTERN.exec(topic)?.[1];
    if (channelId !== undefined) {
      return this.membership.isMember(actor.sub, channelId);
    }

    return true;
  }
}
