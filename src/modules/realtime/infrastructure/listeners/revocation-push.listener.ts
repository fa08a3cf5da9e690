import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { TOKEN_EVENTS, TokenRevokedEvent } from '../../../tokens/domain/events/token-revoked.event';
import { RealtimePublisher } from '../../application/realtime-publisher.service';
import { CONTROL_MESSAGE_TYPE } from '../../domain/models/realtime-message.model';

/**
 * Empuja una trama de control de revocación al canal del subject para que
 * las conexiones abiertas con ese jti se cierren.
 */
@Injectable()
export class RevocationPushListener {
  private readonly logger = new Logger(RevocationPushListener.name);

  constructor(private readonly publisher: RealtimePublisher) {}

  @OnEvent(TOKEN_EVENTS.REVOKED, { async: true })
  async handleTokenRevoked(event: TokenRevokedEvent): Promise<void> {
    try {
      const receivers = await this.publisher.publishControl(event.subject, {
        type: CONTROL_MESSAGE_TYPE,
        action: 'revoke',
        jti: event.jti,
      });
      this.logger.debug(`Revocation of ${event.jti} pushed to ${receivers} receivers`);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to push revocation of ${event.jti}: ${errorMsg}`);
    }
  }
}
