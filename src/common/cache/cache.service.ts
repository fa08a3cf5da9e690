import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import Redis from 'ioredis';
import { InjectRedis } from '@nestjs-modules/ioredis';

import { ICacheService } from '../interfaces/cache.interface';

/**
 * INCR + EXPIRE en un solo viaje; la expiración solo se fija al crear el contador.
 */
const INCREMENT_WITH_EXPIRY_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

/**
 * Redis cache implementation.
 * Shared across instances; every key is namespaced with REDIS_ROOT_KEY.
 */
@Injectable()
export class CacheService implements ICacheService {
  private readonly logger = new Logger(CacheService.name);

  private readonly rootKey: string;

  constructor(
    @InjectRedis() private readonly redisClient: Redis,
    private readonly configService: ConfigService,
  ) {
    // Obtener root key desde variable de entorno
    this.rootKey = this.configService.get<string>('REDIS_ROOT_KEY') ?? '';
  }

  /**
   * Establece un valor en el caché.
   * @param ttl - Tiempo de vida en segundos. Con 0 la clave no expira.
   */
  async set<T>(key: string, value: T, ttl: number): Promise<void> {
    const namespaced = this.namespaced(key);
    const serialized = JSON.stringify(value);

    if (ttl <= 0) {
      await this.redisClient.set(namespaced, serialized);
      return;
    }

    // Convertir ttl de segundos a milisegundos
    await this.redisClient.set(namespaced, serialized, 'PX', Math.ceil(ttl * 1000));
  }

  /**
   * Recupera un valor del caché. Si la clave no existe devuelve null.
   */
  async get<T>(key: string): Promise<T | null> {
    const value = await this.redisClient.get(this.namespaced(key));
    return value ? (JSON.parse(value) as T) : null;
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.redisClient.exists(this.namespaced(key));
    return count > 0;
  }

  /**
   * Incrementa un contador de forma atómica (script Lua).
   */
  async increment(key: string, ttlSeconds: number): Promise<number> {
    const result: unknown = await this.redisClient.eval(
      INCREMENT_WITH_EXPIRY_SCRIPT,
      1,
      this.namespaced(key),
      String(Math.max(1, Math.ceil(ttlSeconds))),
    );

    if (typeof result !== 'number') {
      this.logger.error(`Unexpected INCR reply for ${key}: ${String(result)}`);
      throw new Error(`Unexpected INCR reply for ${key}`);
    }

    return result;
  }

  /**
   * Elimina una clave específica del caché.
   */
  async delete(key: string): Promise<void> {
    await this.redisClient.del(this.namespaced(key));
  }

  /**
   * Borra todas las entradas del caché.
   */
  async clear(): Promise<void> {
    await this.redisClient.flushdb();
  }

  private namespaced(key: string): string {
    return this.rootKey ? `${this.rootKey}:${key}` : key;
  }
}
