import { Injectable } from '@nestjs/common';

import {
  IPubSubPort,
  PubSubListener,
  PubSubSubscription,
} from '../../../../common/interfaces/pubsub.interface';
import { EventBusService } from '../../application/event-bus.service';
import { EventHandler } from '../../domain/models/event-message.model';

/**
 * Pub/sub de un solo proceso sobre el EventBus (CACHE_DRIVER=memory).
 */
@Injectable()
export class EventBusPubSubAdapter implements IPubSubPort {
  constructor(private readonly eventBus: EventBusService) {}

  async publish(channel: string, message: string): Promise<number> {
    const receivers = this.eventBus.subscriberCount(channel);
    await this.eventBus.publish(channel, message);
    return receivers;
  }

  async subscribe(channel: string, listener: PubSubListener): Promise<PubSubSubscription> {
    const handler: EventHandler = (event) => {
      if (typeof event.payload === 'string') {
        listener(event.payload, channel);
      }
    };
    this.eventBus.subscribe(channel, handler);

    return {
      channel,
      unsubscribe: async () => {
        this.eventBus.unsubscribe(channel, handler);
      },
    };
  }
}
