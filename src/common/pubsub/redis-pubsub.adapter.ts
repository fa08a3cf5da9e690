import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

import Redis from 'ioredis';
import { InjectRedis } from '@nestjs-modules/ioredis';

import {
  IPubSubPort,
  PubSubListener,
  PubSubSubscription,
} from '../interfaces/pubsub.interface';

/**
 * Pub/sub distribuido sobre Redis.
 *
 * Una conexión en modo subscriber (duplicada del cliente principal) compartida
 * por todos los listeners del proceso; cada canal se suscribe en Redis una vez
 * y se libera cuando su último listener se va.
 */
@Injectable()
export class RedisPubSubAdapter implements IPubSubPort, OnModuleDestroy {
  private readonly logger = new Logger(RedisPubSubAdapter.name);

  private readonly listeners = new Map<string, Set<PubSubListener>>();
  private subscriber?: Redis;

  constructor(@InjectRedis() private readonly redisClient: Redis) {}

  async publish(channel: string, message: string): Promise<number> {
    return this.redisClient.publish(channel, message);
  }

  async subscribe(channel: string, listener: PubSubListener): Promise<PubSubSubscription> {
    const existing = this.listeners.get(channel);

    if (existing) {
      existing.add(listener);
    } else {
      this.listeners.set(channel, new Set([listener]));
      try {
        await this.subscriberConnection().subscribe(channel);
      } catch (error) {
        this.listeners.get(channel)?.delete(listener);
        if (this.listeners.get(channel)?.size === 0) {
          this.listeners.delete(channel);
        }
        throw error;
      }
      this.logger.debug(`Subscribed to Redis channel ${channel}`);
    }

    let active = true;
    return {
      channel,
      unsubscribe: async () => {
        if (!active) {
          return;
        }
        active = false;
        await this.release(channel, listener);
      },
    };
  }

  async onModuleDestroy(): Promise<void> {
    this.listeners.clear();
    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = undefined;
    }
  }

  private async release(channel: string, listener: PubSubListener): Promise<void> {
    const listeners = this.listeners.get(channel);
    if (!listeners) {
      return;
    }

    listeners.delete(listener);
    if (listeners.size > 0) {
      return;
    }

    this.listeners.delete(channel);
    if (this.subscriber) {
      await this.subscriber.unsubscribe(channel);
      this.logger.debug(`Unsubscribed from Redis channel ${channel}`);
    }
  }

  private subscriberConnection(): Redis {
    if (!this.subscriber) {
      const subscriber = this.redisClient.duplicate();
      subscriber.on('message', (channel: string, message: string) => this.dispatch(channel, message));
      subscriber.on('error', (error: Error) =>
        this.logger.error(`Redis subscriber error: ${error.message}`),
      );
      this.subscriber = subscriber;
    }
    return this.subscriber;
  }

  private dispatch(channel: string, message: string): void {
    for (const listener of [...(this.listeners.get(channel) ?? [])]) {
      try {
        listener(message, channel);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.logger.error(`Listener failed on ${channel}: ${errorMsg}`);
      }
    }
  }
}
