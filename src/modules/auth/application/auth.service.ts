import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import type { Actor } from '../../../common/interfaces/actor.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { IUserLookupPort, UserSummary } from '../../users/domain/ports/user-lookup.port';
import { TokenService } from '../../tokens/application/token.service';
import { REVOCATION_REASONS } from '../../tokens/domain/models/revoked-token.model';
import {
  TokenErrorKind,
  TokenPair,
} from '../../tokens/domain/models/token-claims.model';
import { RevocationResponseDto, TokenPairResponseDto } from '../dto/token.dto';

const ADMIN_ROLE = 'admin';

/**
 * Casos de uso HTTP de tokens: emisión, rotación y revocación.
 * Traduce los Result del TokenService al sobre ApiResponse.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly asyncContext: AsyncContextService,
    @Inject(INJECTION_TOKENS.USER_LOOKUP) private readonly userLookup: IUserLookupPort,
  ) {}

  /**
   * Emite un par de tokens para un usuario existente y activo.
   */
  async issueTokens(subject: string): Promise<ApiResponse<TokenPairResponseDto>> {
    const requestId = this.asyncContext.getRequestId();

    let user: UserSummary | null;
    try {
      user = await this.userLookup.getUser(subject);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`[${requestId}] User lookup failed for ${subject}: ${errorMsg}`);
      return ApiResponse.fail<TokenPairResponseDto>(
        HttpStatus.SERVICE_UNAVAILABLE,
        'Servicio de usuarios no disponible',
        'No se pudieron emitir los tokens',
        { requestId },
      );
    }

    if (!user) {
      return ApiResponse.fail<TokenPairResponseDto>(
        HttpStatus.NOT_FOUND,
        'Usuario no encontrado',
        'No se pudieron emitir los tokens',
        { requestId },
      );
    }

    if (!user.isActive) {
      this.logger.warn(`[${requestId}] Token issuance denied for inactive user ${subject}`);
      return ApiResponse.fail<TokenPairResponseDto>(
        HttpStatus.FORBIDDEN,
        'Usuario inactivo',
        'No se pudieron emitir los tokens',
        { requestId },
      );
    }

    const pair = this.tokenService.issuePair(user.id, user.roles);
    this.logger.log(`[${requestId}] Tokens issued for ${user.id}`);

    return ApiResponse.ok<TokenPairResponseDto>(
      HttpStatus.OK,
      this.toPairDto(pair),
      'Tokens emitidos exitosamente',
      { requestId },
    );
  }

  /**
   * Rota el refresh token y devuelve un par nuevo.
   */
  async refresh(refreshToken: string): Promise<ApiResponse<TokenPairResponseDto>> {
    const requestId = this.asyncContext.getRequestId();
    const result = await this.tokenService.refresh(refreshToken);

    if (result.isFailure) {
      const error = result.getError();
      this.logger.warn(`[${requestId}] Failed token refresh attempt: ${error.kind} (${error.message})`);
      return ApiResponse.fail<TokenPairResponseDto>(
        this.statusFor(error.kind),
        error.kind === 'unavailable'
          ? 'Servicio de tokens no disponible'
          : 'Token de refresco inválido o expirado',
        'No se pudo renovar el token',
        { requestId },
      );
    }

    return ApiResponse.ok<TokenPairResponseDto>(
      HttpStatus.OK,
      this.toPairDto(result.getValue()),
      'Token renovado exitosamente',
      { requestId },
    );
  }

  /**
   * Revoca un token. Un actor puede revocar sus propios tokens; `admin` cualquiera.
   */
  async revoke(
    actor: Actor,
    token: string,
    reason?: string,
  ): Promise<ApiResponse<RevocationResponseDto>> {
    const requestId = this.asyncContext.getRequestId();

    const verified = this.tokenService.verify(token, false);
    if (verified.isFailure) {
      return ApiResponse.fail<RevocationResponseDto>(
        HttpStatus.BAD_REQUEST,
        'Token inválido',
        'No se pudo revocar el token',
        { requestId },
      );
    }

    const claims = verified.getValue();
    if (claims.sub !== actor.sub && !actor.roles.includes(ADMIN_ROLE)) {
      this.logger.warn(`[${requestId}] ${actor.sub} tried to revoke a token of ${claims.sub}`);
      return ApiResponse.fail<RevocationResponseDto>(
        HttpStatus.FORBIDDEN,
        'No autorizado para revocar este token',
        'No se pudo revocar el token',
        { requestId },
      );
    }

    const revoked = await this.tokenService.revoke(
      token,
      reason ?? (claims.sub === actor.sub ? REVOCATION_REASONS.EXPLICIT : REVOCATION_REASONS.FORCED_LOGOUT),
    );
    if (revoked.isFailure) {
      const error = revoked.getError();
      return ApiResponse.fail<RevocationResponseDto>(
        this.statusFor(error.kind),
        error.message,
        'No se pudo revocar el token',
        { requestId },
      );
    }

    const outcome = revoked.getValue();
    return ApiResponse.ok<RevocationResponseDto>(
      HttpStatus.OK,
      {
        jti: outcome.jti,
        already_revoked: outcome.alreadyRevoked,
        persisted: outcome.persisted,
      },
      outcome.alreadyRevoked ? 'El token ya estaba revocado' : 'Token revocado exitosamente',
      { requestId },
    );
  }

  private statusFor(kind: TokenErrorKind): HttpStatus {
    return kind === 'unavailable' ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.UNAUTHORIZED;
  }

  private toPairDto(pair: TokenPair): TokenPairResponseDto {
    return {
      access_token: pair.accessToken,
      refresh_token: pair.refreshToken,
      token_type: pair.tokenType,
      expires_in: pair.expiresIn,
    };
  }
}
