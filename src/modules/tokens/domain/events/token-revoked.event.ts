/**
 * Domain Event: TokenRevokedEvent
 *
 * Emitido en cada revocación efectiva (no en las repetidas).
 */

import { BaseDomainEvent } from '../../../../common/events/base-domain.event';

export const TOKEN_EVENTS = {
  REVOKED: 'token.revoked',
} as const;

export class TokenRevokedEvent extends BaseDomainEvent {
  readonly eventName = TOKEN_EVENTS.REVOKED;

  constructor(
    public readonly jti: string,
    public readonly subject: string,
    public readonly expiresAt: Date,
    public readonly reason?: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}
