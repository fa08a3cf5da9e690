import { ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import type { Actor } from '../../../common/interfaces/actor.interface';
import { Roles } from '../decorators/roles.decorator';
import { RolesGuard } from './roles.guard';

class PublishController {
  @Roles('admin', 'ops')
  publish(): void {}

  list(): void {}
}

describe('RolesGuard', () => {
  const guard = new RolesGuard(new Reflector());

  const actorWith = (roles: string[]): Actor => ({
    sub: 'alice',
    actorId: 'alice',
    roles,
    jti: 'jti-1',
    tokenType: 'access',
  });

  const contextFor = (handler: () => void, user?: Actor): ExecutionContextHost =>
    new ExecutionContextHost([{ user }], PublishController, handler);

  it('should allow handlers without required roles', () => {
    expect(guard.canActivate(contextFor(PublishController.prototype.list))).toBe(true);
  });

  it('should allow an actor holding one of the roles', () => {
    const context = contextFor(PublishController.prototype.publish, actorWith(['user', 'ops']));

    expect(guard.canActivate(context)).toBe(true);
  });

  it('should forbid an actor without the roles', () => {
    const context = contextFor(PublishController.prototype.publish, actorWith(['user']));

    expect(() => guard.canActivate(context)).toThrow(
      new ForbiddenException('Requires one of roles: admin, ops'),
    );
  });

  it('should forbid requests without an actor', () => {
    const context = contextFor(PublishController.prototype.publish);

    expect(() => guard.canActivate(context)).toThrow(ForbiddenException);
  });
});
