import { Inject, Injectable } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { IChannelMembershipPort } from '../domain/ports/channel-membership.port';
import {
  CHANNEL_NOT_AUTHORIZED,
  RouteAction,
  UNKNOWN_MESSAGE_TYPE,
  frames,
} from '../domain/models/realtime-message.model';

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Enruta los mensajes de texto de un cliente por su campo `type`.
 * Las suscripciones las ejecuta la sesión a partir de la acción devuelta.
 */
@Injectable()
export class RealtimeMessageRouter {
  constructor(
    @Inject(INJECTION_TOKENS.CHANNEL_MEMBERSHIP)
    private readonly membership: IChannelMembershipPort,
  ) {}

  async route(raw: string, subject: string): Promise<RouteAction> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { kind: 'reply', frame: frames.echo(raw) };
    }

    if (!isJsonObject(parsed)) {
      return { kind: 'reply', frame: frames.error(UNKNOWN_MESSAGE_TYPE) };
    }

    switch (parsed.type) {
      case 'ping':
        return { kind: 'reply', frame: frames.pong(Date.now()) };

      case 'join_channel': {
        const channelId = this.channelIdOf(parsed);
        if (!channelId) {
          return { kind: 'reply', frame: frames.error('channel_id is required') };
        }
        const allowed = await this.membership.isMember(subject, channelId);
        return allowed
          ? { kind: 'join', channelId }
          : { kind: 'reply', frame: frames.error(CHANNEL_NOT_AUTHORIZED) };
      }

      case 'leave_channel': {
        const channelId = this.channelIdOf(parsed);
        if (!channelId) {
          return { kind: 'reply', frame: frames.error('channel_id is required') };
        }
        return { kind: 'leave', channelId };
      }

      case 'command': {
        const commandId = parsed.command_id;
        return {
          kind: 'reply',
          frame: frames.commandResult(
            typeof commandId === 'string' || typeof commandId === 'number' ? commandId : null,
          ),
        };
      }

      default:
        return { kind: 'reply', frame: frames.error(UNKNOWN_MESSAGE_TYPE) };
    }
  }

  private channelIdOf(message: JsonObject): string | null {
    const channelId = message.channel_id;
    if (typeof channelId === 'number') {
      return String(channelId);
    }
    return typeof channelId === 'string' && channelId.length > 0 ? channelId : null;
  }
}
