import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { RedisModule } from '@nestjs-modules/ioredis';

import { INJECTION_TOKENS } from '../constants/injection-tokens';
import { RedisPubSubAdapter } from '../pubsub/redis-pubsub.adapter';
import { EventBusModule } from '../../modules/event-bus/event-bus.module';
import { EventBusPubSubAdapter } from '../../modules/event-bus/infrastructure/adapters/event-bus-pubsub.adapter';
import { CacheService } from './cache.service';
import { InMemoryCacheService } from './in-memory-cache.service';

export type CacheDriver = 'redis' | 'memory';

export function resolveCacheDriver(value: string | undefined): CacheDriver {
  return value === 'memory' ? 'memory' : 'redis';
}

/**
 * Cache y pub/sub compartidos (tokens CACHE_SERVICE y PUBSUB).
 *
 * - redis: estado compartido entre instancias (ioredis)
 * - memory: un solo proceso; el pub/sub se apoya en el EventBus
 */
@Module({})
export class CachingModule {
  static forRoot(driver: CacheDriver): DynamicModule {
    if (driver === 'memory') {
      return {
        module: CachingModule,
        global: true,
        imports: [EventBusModule],
        providers: [
          { provide: INJECTION_TOKENS.CACHE_SERVICE, useClass: InMemoryCacheService },
          { provide: INJECTION_TOKENS.PUBSUB, useExisting: EventBusPubSubAdapter },
        ],
        exports: [INJECTION_TOKENS.CACHE_SERVICE, INJECTION_TOKENS.PUBSUB],
      };
    }

    return {
      module: CachingModule,
      global: true,
      imports: [
        RedisModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (config: ConfigService) => ({
            type: 'single',
            url: `redis://${config.get<string>('REDIS_HOST') ?? 'localhost'}:${config.get<number>('REDIS_PORT') ?? 6379}`,
            options: {
              password: config.get<string>('REDIS_PASSWORD') || undefined,
            },
          }),
        }),
      ],
      providers: [
        { provide: INJECTION_TOKENS.CACHE_SERVICE, useClass: CacheService },
        { provide: INJECTION_TOKENS.PUBSUB, useClass: RedisPubSubAdapter },
      ],
      exports: [INJECTION_TOKENS.CACHE_SERVICE, INJECTION_TOKENS.PUBSUB],
    };
  }
}
