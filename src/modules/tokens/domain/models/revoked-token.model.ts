/**
 * Registro de revocación de un token.
 * Se crea en revocación explícita, rotación de refresh o logout forzado.
 */
export interface RevokedTokenRecord {
  jti: string;
  subject: string;
  revokedAt: Date;
  expiresAt: Date;
  reason?: string;
}

/**
 * Resultado de revocar: qué capas quedaron escritas.
 */
export interface RevocationOutcome {
  jti: string;
  subject: string;
  expiresAt: Date;
  reason?: string;
  alreadyRevoked: boolean;
  cached: boolean;
  persisted: boolean;
}

export const REVOCATION_REASONS = {
  EXPLICIT: 'explicit',
  REFRESH_ROTATION: 'refresh_rotation',
  FORCED_LOGOUT: 'forced_logout',
} as const;

export const REVOKED_TOKEN_CACHE_PREFIX = 'revoked_token:';
