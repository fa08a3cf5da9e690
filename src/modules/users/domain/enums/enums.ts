/**
 * Estados posibles de un usuario en la colección externa `users`.
 * Solo ACTIVE puede obtener tokens o abrir conexiones realtime.
 */
export enum UserStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  SUSPENDED = 'suspended',
  DISABLED = 'disabled',
}
