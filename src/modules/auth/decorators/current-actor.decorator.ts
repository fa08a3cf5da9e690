import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import type { Request } from 'express';

import { Actor, isActor } from '../../../common/interfaces/actor.interface';

/**
 * Inyecta el Actor autenticado por JwtStrategy.
 */
export const CurrentActor = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Actor => {
    const request = context.switchToHttp().getRequest<Request>();
    if (!isActor(request.user)) {
      throw new UnauthorizedException('Missing authenticated actor');
    }
    return request.user;
  },
);
