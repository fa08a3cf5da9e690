import { Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { Result } from '../../../common/types/result.type';
import { CsrfService } from '../../csrf/csrf.service';
import { RateLimitService } from '../../rate-limit/application/rate-limit.service';
import { TokenService } from '../../tokens/application/token.service';
import type { IUserLookupPort, UserSummary } from '../../users/domain/ports/user-lookup.port';
import { CLOSE_CODES } from '../domain/models/realtime-channels';
import {
  AuthenticatedPrincipal,
  HandshakeRejection,
  HandshakeRejectionKind,
  HandshakeRequest,
} from '../domain/models/handshake.model';

export const NO_TOKEN_REASON = 'Unauthorized: No token provided';
export const UNAUTHORIZED_REASON = 'Unauthorized';
export const CSRF_REASON = 'CSRF validation failed';
export const RATE_LIMIT_REASON = 'Rate limit exceeded';

const reject = (
  kind: HandshakeRejectionKind,
  code: number,
  reason: string,
  detail: string,
): Result<AuthenticatedPrincipal, HandshakeRejection> =>
  Result.fail<AuthenticatedPrincipal, HandshakeRejection>({ kind, code, reason, detail });

/**
 * Autenticación del handshake WebSocket:
 * token → tipo access → usuario activo → CSRF (si se envía) → admisión por rate limit.
 */
@Injectable()
export class HandshakeAuthenticator {
  private readonly logger = new Logger(HandshakeAuthenticator.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly csrfService: CsrfService,
    private readonly rateLimitService: RateLimitService,
    @Inject(INJECTION_TOKENS.USER_LOOKUP) private readonly userLookup: IUserLookupPort,
  ) {}

  async authenticate(
    handshake: HandshakeRequest,
  ): Promise<Result<AuthenticatedPrincipal, HandshakeRejection>> {
    if (!handshake.token) {
      return reject('authentication', CLOSE_CODES.POLICY_VIOLATION, NO_TOKEN_REASON, 'missing token');
    }

    const decoded = await this.tokenService.decode(handshake.token);
    if (decoded.isFailure) {
      const error = decoded.getError();
      return reject(
        'authentication',
        CLOSE_CODES.POLICY_VIOLATION,
        UNAUTHORIZED_REASON,
        `${error.kind}: ${error.message}`,
      );
    }

    const claims = decoded.getValue();
    if (claims.type !== 'access') {
      return reject(
        'authentication',
        CLOSE_CODES.POLICY_VIOLATION,
        UNAUTHORIZED_REASON,
        `invalid: ${claims.type} token presented`,
      );
    }

    let user: UserSummary | null;
    try {
      user = await this.userLookup.getUser(claims.sub);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      return reject('internal', CLOSE_CODES.INTERNAL_ERROR, 'Internal error: user lookup failed', errorMsg);
    }

    if (!user || !user.isActive) {
      return reject(
        'authentication',
        CLOSE_CODES.POLICY_VIOLATION,
        UNAUTHORIZED_REASON,
        `unknown or inactive user ${claims.sub}`,
      );
    }

    if (handshake.csrfToken !== undefined) {
      const csrfValid = await this.csrfService.verifyDoubleSubmit(
        handshake.csrfToken,
        handshake.csrfCookie,
      );
      if (!csrfValid) {
        return reject('authorization', CLOSE_CODES.CSRF_REJECTED, CSRF_REASON, `csrf mismatch for ${claims.sub}`);
      }
    }

    const role = this.rateLimitService.resolveRole(user.roles);
    const decision = await this.rateLimitService.check(claims.sub, role);
    if (!decision.allowed) {
      return reject(
        'rate_limited',
        CLOSE_CODES.POLICY_VIOLATION,
        RATE_LIMIT_REASON,
        `${decision.count}/${decision.limit} for role ${role}`,
      );
    }

    this.logger.debug(`Handshake accepted for ${claims.sub} (jti ${claims.jti})`);

    return Result.ok<AuthenticatedPrincipal, HandshakeRejection>({
      subject: claims.sub,
      roles: user.roles,
      jti: claims.jti,
    });
  }
}
