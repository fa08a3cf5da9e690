import type { TokenType } from '../../../../common/interfaces/actor.interface';

export type { TokenType };

/**
 * Claims de un token emitido por el servicio.
 * `exp` e `iat` en segundos epoch; `jti` es un UUID v4 único por token.
 */
export interface TokenClaims {
  sub: string;
  roles: string[];
  iat: number;
  exp: number;
  jti: string;
  type: TokenType;
}

export type TokenErrorKind = 'invalid' | 'expired' | 'revoked' | 'unavailable';

export interface TokenError {
  readonly kind: TokenErrorKind;
  readonly message: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Vida del access token en segundos */
  expiresIn: number;
}

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

export function isHmacAlgorithm(value: string): value is HmacAlgorithm {
  return HMAC_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function tokenError(kind: TokenErrorKind, message: string): TokenError {
  return { kind, message };
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

/**
 * Valida la forma del payload verificado. Devuelve null si falta algún claim.
 */
export function parseTokenClaims(payload: unknown): TokenClaims | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }

  const sub = 'sub' in payload ? payload.sub : undefined;
  const roles = 'roles' in payload ? payload.roles : undefined;
  const iat = 'iat' in payload ? payload.iat : undefined;
  const exp = 'exp' in payload ? payload.exp : undefined;
  const jti = 'jti' in payload ? payload.jti : undefined;
  const type = 'type' in payload ? payload.type : undefined;

  if (
    typeof sub !== 'string' ||
    sub.length === 0 ||
    !isStringArray(roles) ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    typeof jti !== 'string' ||
    jti.length === 0 ||
    (type !== 'access' && type !== 'refresh')
  ) {
    return null;
  }

  return { sub, roles, iat, exp, jti, type };
}

/**
 * Intersección de roles; una lista requerida vacía siempre autoriza.
 */
export function hasAnyRole(roles: readonly string[], requiredRoles: readonly string[]): boolean {
  if (requiredRoles.length === 0) {
    return true;
  }
  return requiredRoles.some((role) => roles.includes(role));
}
