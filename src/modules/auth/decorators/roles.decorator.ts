import { SetMetadata } from '@nestjs/common';

export const ROLES_KEY = 'roles';

/**
 * Roles requeridos por un handler o controlador (basta con uno).
 */
export const Roles = (...roles: string[]) => SetMetadata(ROLES_KEY, roles);
