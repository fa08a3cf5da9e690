import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { isActor } from '../../../common/interfaces/actor.interface';
import { RateLimitService } from '../application/rate-limit.service';
import { FALLBACK_ROLE } from '../domain/models/rate-limit.model';

/**
 * Aplica el rate limit por actor y rol. Va después de JwtAuthGuard; sin
 * actor autenticado la petición cuenta como `guest` por IP.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(private readonly rateLimitService: RateLimitService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const actor = isActor(request.user) ? request.user : undefined;
    const actorId = actor?.actorId ?? `ip:${request.ip ?? 'unknown'}`;
    const role = actor ? this.rateLimitService.resolveRole(actor.roles) : FALLBACK_ROLE;

    const decision = await this.rateLimitService.check(actorId, role);

    response.setHeader('X-RateLimit-Limit', String(decision.limit));
    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: 'Rate limit exceeded',
          limit: decision.limit,
          remaining: 0,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    return true;
  }
}
