/**
 * Cache service interface for abstraction over different cache implementations.
 * Allows swapping between in-memory and Redis.
 */
export interface ICacheService {
  /**
   * Get a value from cache by key
   */
  get<T>(key: string): Promise<T | null>;

  /**
   * Set a value in cache with TTL in seconds (0 = no expiry)
   */
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;

  /**
   * Whether a live entry exists for the key
   */
  exists(key: string): Promise<boolean>;

  /**
   * Atomically increments a counter. The TTL is applied only when the
   * counter is created, so a window never slides.
   */
  increment(key: string, ttlSeconds: number): Promise<number>;

  /**
   * Delete a key from cache
   */
  delete(key: string): Promise<void>;

  /**
   * Clear all cache entries
   */
  clear(): Promise<void>;
}
