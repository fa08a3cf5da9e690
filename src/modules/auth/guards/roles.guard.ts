import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';

import { isActor } from '../../../common/interfaces/actor.interface';
import { hasAnyRole } from '../../tokens/domain/models/token-claims.model';
import { ROLES_KEY } from '../decorators/roles.decorator';

/**
 * Autoriza por intersección entre los roles del token y los de @Roles().
 * Debe ejecutarse después de JwtAuthGuard.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles =
      this.reflector.getAllAndOverride<string[] | undefined>(ROLES_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? [];

    if (requiredRoles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    if (!isActor(request.user) || !hasAnyRole(request.user.roles, requiredRoles)) {
      throw new ForbiddenException(`Requires one of roles: ${requiredRoles.join(', ')}`);
    }

    return true;
  }
}
