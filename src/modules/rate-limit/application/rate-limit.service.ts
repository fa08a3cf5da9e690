import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { ICacheService } from '../../../common/interfaces/cache.interface';
import type { IMetricsSink } from '../../../common/interfaces/metrics-sink.interface';
import {
  DEFAULT_ROLE_LIMITS,
  FALLBACK_ROLE,
  RATE_LIMIT_WINDOW_SECONDS,
  RateLimitDecision,
  rateLimitKey,
} from '../domain/models/rate-limit.model';

/**
 * Rate limiter distribuido de ventana fija por minuto.
 *
 * Contador por (rol, actor, minuto) en la cache compartida, creado con TTL de
 * 60 s. Si la cache falla la petición pasa (fail open) marcada como degradada.
 */
@Injectable()
export class RateLimitService {
  private readonly logger = new Logger(RateLimitService.name);
  private readonly limits: Map<string, number>;
  private readonly fallbackLimit: number;

  constructor(
    @Inject(INJECTION_TOKENS.CACHE_SERVICE) private readonly cacheService: ICacheService,
    @Inject(INJECTION_TOKENS.METRICS_SINK) private readonly metrics: IMetricsSink,
    private readonly configService: ConfigService,
  ) {
    this.fallbackLimit = this.configuredLimit('RATE_LIMIT_GUEST', DEFAULT_ROLE_LIMITS.guest);
    this.limits = new Map<string, number>([
      ['admin', this.configuredLimit('RATE_LIMIT_ADMIN', DEFAULT_ROLE_LIMITS.admin)],
      ['user', this.configuredLimit('RATE_LIMIT_USER', DEFAULT_ROLE_LIMITS.user)],
      [FALLBACK_ROLE, this.fallbackLimit],
    ]);
  }

  /**
   * Cuenta una petición del actor en la ventana del minuto actual.
   */
  async check(actorId: string, role: string): Promise<RateLimitDecision> {
    const limit = this.limitFor(role);
    const windowMinute = Math.floor(Date.now() / (RATE_LIMIT_WINDOW_SECONDS * 1000));
    const resetAt = (windowMinute + 1) * RATE_LIMIT_WINDOW_SECONDS * 1000;
    const key = rateLimitKey(role, actorId, windowMinute);

    try {
      const count = await this.cacheService.increment(key, RATE_LIMIT_WINDOW_SECONDS);

      return {
        allowed: count <= limit,
        limit,
        count,
        remaining: Math.max(0, limit - count),
        resetAt,
        degraded: false,
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rate limit store unavailable, failing open for ${actorId}: ${errorMsg}`);
      this.metrics.increment('ratelimit.fail_open', 1, { role });

      return {
        allowed: true,
        limit,
        count: 0,
        remaining: limit,
        resetAt,
        degraded: true,
      };
    }
  }

  /**
   * Límite por rol; los roles desconocidos usan el de `guest`.
   */
  limitFor(role: string): number {
    return this.limits.get(role) ?? this.fallbackLimit;
  }

  /**
   * Para actores con varios roles se aplica el límite más generoso.
   */
  resolveRole(roles: readonly string[]): string {
    let selected = FALLBACK_ROLE;
    for (const role of roles) {
      if (this.limits.has(role) && this.limitFor(role) > this.limitFor(selected)) {
        selected = role;
      }
    }
    return selected;
  }

  private configuredLimit(key: string, fallback: number): number {
    const value = Number(this.configService.get<number>(key) ?? fallback);
    return Number.isFinite(value) && value >= 0 ? value : fallback;
  }
}
