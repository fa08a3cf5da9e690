export type TokenType = 'access' | 'refresh';

/**
 * Actor derivado del JWT tras autenticación.
 * NO incluir token completo ni secretos.
 */
export interface Actor {
  sub: string; // subject (usuario/servicio)
  actorId: string;
  roles: string[];
  jti: string;
  tokenType: TokenType;
  ipAddress?: string; // IP del cliente
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

/**
 * Type guard para el `request.user` que deja passport.
 */
export function isActor(value: unknown): value is Actor {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    'actorId' in value &&
    typeof value.actorId === 'string' &&
    'jti' in value &&
    typeof value.jti === 'string' &&
    'roles' in value &&
    isStringArray(value.roles) &&
    'tokenType' in value &&
    (value.tokenType === 'access' || value.tokenType === 'refresh')
  );
}
