import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';

import { ExtractJwt, Strategy } from 'passport-jwt';

import { AsyncContextService } from '../../../common/context/async-context.service';
import { Actor } from '../../../common/interfaces/actor.interface';
import { TokenService } from '../../tokens/application/token.service';
import { isHmacAlgorithm, parseTokenClaims } from '../../tokens/domain/models/token-claims.model';

/**
 * Estrategia JWT (HS256 con secreto compartido).
 * - passport-jwt valida firma y expiración.
 * - La revocación por jti se delega en TokenService.
 * - Solo se aceptan access tokens.
 * - El actor queda en el contexto async de la request.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService,
    private readonly tokenService: TokenService,
    private readonly asyncContext: AsyncContextService,
  ) {
    const algorithm = configService.get<string>('JWT_ALGORITHM') ?? 'HS256';

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
      algorithms: [isHmacAlgorithm(algorithm) ? algorithm : 'HS256'],
    });
  }

  async validate(payload: unknown): Promise<Actor> {
    // Validar claims mínimos (fail-closed)
    const claims = parseTokenClaims(payload);
    if (!claims) {
      throw new UnauthorizedException('Invalid token payload');
    }

    if (claims.type !== 'access') {
      throw new UnauthorizedException('Access token required');
    }

    const checked = await this.tokenService.ensureNotRevoked(claims);
    if (checked.isFailure) {
      const error = checked.getError();
      this.logger.warn(`Rejected token ${claims.jti}: ${error.kind}`);
      throw new UnauthorizedException('Unauthorized');
    }

    const actor: Actor = {
      sub: claims.sub,
      actorId: claims.sub,
      roles: claims.roles,
      jti: claims.jti,
      tokenType: claims.type,
    };
    this.asyncContext.setActor(actor);

    return actor;
  }
}
