import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { ICacheService } from '../interfaces/cache.interface';

/**
 * Cache entry with expiration timestamp (null = never expires)
 */
interface CacheEntry {
  value: unknown;
  expiresAt: number | null;
}

/**
 * In-memory cache implementation using Map with TTL support.
 * Suitable for single-instance deployments and tests.
 */
@Injectable()
export class InMemoryCacheService implements ICacheService {
  private readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheEntry>();

  async get<T>(key: string): Promise<T | null> {
    const entry = this.liveEntry(key);
    return entry ? (entry.value as T) : null;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    this.cache.set(key, { value, expiresAt: this.expiryFor(ttlSeconds) });
  }

  async exists(key: string): Promise<boolean> {
    return this.liveEntry(key) !== undefined;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.liveEntry(key);

    if (!entry) {
      this.cache.set(key, { value: 1, expiresAt: this.expiryFor(ttlSeconds) });
      return 1;
    }

    const current = typeof entry.value === 'number' ? entry.value : 0;
    entry.value = current + 1;
    return current + 1;
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  /**
   * Limpia entradas expiradas cada hora
   */
  @Cron(CronExpression.EVERY_HOUR)
  sweepExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired cache entries`);
    }

    return removed;
  }

  get size(): number {
    return this.cache.size;
  }

  private liveEntry(key: string): CacheEntry | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry;
  }

  private expiryFor(ttlSeconds: number): number | null {
    return ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : null;
  }
}
