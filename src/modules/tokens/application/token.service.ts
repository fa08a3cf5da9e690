import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import * as jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { Result } from '../../../common/types/result.type';
import { AuthorizationError, domainError } from '../../../common/types/domain-error.type';
import type { IUserLookupPort, UserSummary } from '../../users/domain/ports/user-lookup.port';
import {
  HmacAlgorithm,
  TokenClaims,
  TokenError,
  TokenPair,
  TokenType,
  hasAnyRole,
  isHmacAlgorithm,
  parseTokenClaims,
  tokenError,
} from '../domain/models/token-claims.model';
import { REVOCATION_REASONS, RevocationOutcome } from '../domain/models/revoked-token.model';
import { TOKEN_EVENTS, TokenRevokedEvent } from '../domain/events/token-revoked.event';
import { RevocationStore } from './revocation-store.service';

const DEFAULT_ACCESS_TOKEN_TTL = 1800;
const DEFAULT_REFRESH_TOKEN_TTL = 604800;

/**
 * Ciclo de vida de los JWT: emisión, validación, revocación y rotación.
 *
 * Firma simétrica (HS256 por defecto) con un único secreto compartido.
 * Toda validación consulta el RevocationStore por jti; si el estado de
 * revocación no se puede determinar el token se rechaza.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  private readonly secret: string;
  private readonly algorithm: HmacAlgorithm;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly revocationStore: RevocationStore,
    private readonly eventEmitter: EventEmitter2,
    private readonly asyncContext: AsyncContextService,
    @Inject(INJECTION_TOKENS.USER_LOOKUP) private readonly userLookup: IUserLookupPort,
  ) {
    this.secret = this.configService.getOrThrow<string>('JWT_SECRET');

    const algorithm = this.configService.get<string>('JWT_ALGORITHM') ?? 'HS256';
    this.algorithm = isHmacAlgorithm(algorithm) ? algorithm : 'HS256';

    this.accessTokenTtl = Number(
      this.configService.get<number>('ACCESS_TOKEN_TTL') ?? DEFAULT_ACCESS_TOKEN_TTL,
    );
    this.refreshTokenTtl = Number(
      this.configService.get<number>('REFRESH_TOKEN_TTL') ?? DEFAULT_REFRESH_TOKEN_TTL,
    );
  }

  /**
   * Emite un token firmado con un jti nuevo.
   */
  mint(subject: string, roles: string[], type: TokenType): string {
    const ttl = type === 'access' ? this.accessTokenTtl : this.refreshTokenTtl;

    return jwt.sign({ sub: subject, roles: [...roles], type, jti: uuidv4() }, this.secret, {
      algorithm: this.algorithm,
      expiresIn: ttl,
    });
  }

  issuePair(subject: string, roles: string[]): TokenPair {
    return {
      accessToken: this.mint(subject, roles, 'access'),
      refreshToken: this.mint(subject, roles, 'refresh'),
      tokenType: 'Bearer',
      expiresIn: this.accessTokenTtl,
    };
  }

  /**
   * Valida firma, expiración (opcional), forma de los claims y revocación.
   */
  async decode(token: string, verifyExpiry: boolean = true): Promise<Result<TokenClaims, TokenError>> {
    const verified = this.verify(token, verifyExpiry);
    if (verified.isFailure) {
      return verified;
    }

    return this.ensureNotRevoked(verified.getValue());
  }

  /**
   * Comprueba en el RevocationStore unos claims ya verificados.
   */
  async ensureNotRevoked(claims: TokenClaims): Promise<Result<TokenClaims, TokenError>> {
    const revoked = await this.revocationStore.isRevoked(claims.jti);

    if (revoked.isFailure) {
      return Result.fail(tokenError('unavailable', revoked.getError().message));
    }
    if (revoked.getValue()) {
      return Result.fail(tokenError('revoked', 'Token has been revoked'));
    }
    return Result.ok(claims);
  }

  /**
   * Revoca un token. La firma se verifica ignorando la expiración.
   * Revocar un token ya revocado es un éxito sin efectos. Un token expirado
   * no deja entrada en cache, así que su estado se consulta en el log durable.
   */
  async revoke(token: string, reason?: string): Promise<Result<RevocationOutcome, TokenError>> {
    const verified = this.verify(token, false);
    if (verified.isFailure) {
      return Result.fail(verified.getError());
    }

    const claims = verified.getValue();
    const expiresAt = new Date(claims.exp * 1000);

    const expired = claims.exp * 1000 <= Date.now();
    const current = await this.revocationStore.isRevoked(claims.jti, { durable: expired });
    if (current.isSuccess && current.getValue()) {
      return Result.ok({
        jti: claims.jti,
        subject: claims.sub,
        expiresAt,
        reason,
        alreadyRevoked: true,
        cached: false,
        persisted: false,
      });
    }

    const marked = await this.revocationStore.markRevoked(claims.jti, claims.sub, expiresAt, reason);
    if (marked.isFailure) {
      this.logger.error(`Revocation of jti ${claims.jti} failed: ${marked.getError().message}`);
      return Result.fail(tokenError('unavailable', marked.getError().message));
    }

    this.logger.log(
      `Token revoked | jti: ${claims.jti} | sub: ${claims.sub} | reason: ${reason ?? 'n/a'}`,
    );
    this.eventEmitter.emit(
      TOKEN_EVENTS.REVOKED,
      new TokenRevokedEvent(claims.jti, claims.sub, expiresAt, reason, this.asyncContext.getRequestId()),
    );

    return Result.ok(marked.getValue());
  }

  /**
   * Autoriza por intersección de roles; sin roles requeridos siempre pasa.
   */
  authorize<T extends { roles: string[] }>(
    subject: T,
    requiredRoles: string[],
  ): Result<T, AuthorizationError> {
    if (hasAnyRole(subject.roles, requiredRoles)) {
      return Result.ok(subject);
    }
    return Result.fail(
      domainError('authorization', `Requires one of roles: ${requiredRoles.join(', ')}`),
    );
  }

  /**
   * Intercambia un refresh token válido por un par nuevo (rotación).
   * El refresh anterior queda revocado con motivo `refresh_rotation`.
   */
  async refresh(refreshToken: string): Promise<Result<TokenPair, TokenError>> {
    const decoded = await this.decode(refreshToken);
    if (decoded.isFailure) {
      return Result.fail(decoded.getError());
    }

    const claims = decoded.getValue();
    if (claims.type !== 'refresh') {
      return Result.fail(tokenError('invalid', 'Token is not a refresh token'));
    }

    let user: UserSummary | null;
    try {
      user = await this.userLookup.getUser(claims.sub);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      return Result.fail(tokenError('unavailable', `User lookup failed: ${errorMsg}`));
    }

    if (!user || !user.isActive) {
      return Result.fail(tokenError('invalid', 'Unknown or inactive user'));
    }

    const rotated = await this.revoke(refreshToken, REVOCATION_REASONS.REFRESH_ROTATION);
    if (rotated.isFailure) {
      return Result.fail(rotated.getError());
    }
    if (rotated.getValue().alreadyRevoked) {
      // Otra petición rotó este refresh token primero
      return Result.fail(tokenError('revoked', 'Token has been revoked'));
    }

    return Result.ok(this.issuePair(user.id, user.roles));
  }

  /**
   * Verifica firma y forma de los claims sin consultar revocaciones.
   */
  verify(token: string, verifyExpiry: boolean = true): Result<TokenClaims, TokenError> {
    let payload: unknown;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        ignoreExpiration: !verifyExpiry,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return Result.fail(tokenError('expired', 'Token has expired'));
      }
      const errorMsg = error instanceof Error ? error.message : String(error);
      return Result.fail(tokenError('invalid', `Invalid token: ${errorMsg}`));
    }

    const claims = parseTokenClaims(payload);
    if (!claims) {
      return Result.fail(tokenError('invalid', 'Malformed token claims'));
    }
    return Result.ok(claims);
  }
}
