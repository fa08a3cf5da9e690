/**
 * Decisión del limitador para una petición.
 * `degraded` indica que la cache no respondió y se dejó pasar (fail open).
 */
export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  count: number;
  remaining: number;
  /** Epoch en milisegundos del inicio de la siguiente ventana */
  resetAt: number;
  degraded: boolean;
}

export const RATE_LIMIT_WINDOW_SECONDS = 60;

export const DEFAULT_ROLE_LIMITS: Record<string, number> = {
  admin: 1000,
  user: 100,
  guest: 20,
};

export const FALLBACK_ROLE = 'guest';

export function rateLimitKey(role: string, actorId: string, windowMinute: number): string {
  return `ratelimit:${role}:${actorId}:${windowMinute}`;
}
