import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';

import { EventMessage } from '../domain/models/event-message.model';
import { EventBusService } from './event-bus.service';

describe('EventBusService', () => {
  let eventBus: EventBusService;

  const createBus = async (historySize?: number): Promise<EventBusService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventBusService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue(historySize) },
        },
      ],
    }).compile();

    return module.get<EventBusService>(EventBusService);
  };

  beforeEach(async () => {
    eventBus = await createBus();
  });

  describe('publish', () => {
    it('should deliver to every subscriber in publication order', async () => {
      const received: string[] = [];
      eventBus.subscribe('orders', (message) => {
        received.push(`a:${String(message.payload)}`);
      });
      eventBus.subscribe('orders', (message) => {
        received.push(`b:${String(message.payload)}`);
      });

      await eventBus.publish('orders', 1);
      await eventBus.publish('orders', 2);

      expect(received).toEqual(['a:1', 'b:1', 'a:2', 'b:2']);
    });

    it('should keep delivering when a subscriber fails', async () => {
      const healthy = jest.fn();
      eventBus.subscribe('orders', () => {
        throw new Error('subscriber bug');
      });
      eventBus.subscribe('orders', healthy);

      const message = await eventBus.publish('orders', { id: 1 });

      expect(healthy).toHaveBeenCalledWith(message);
    });

    it('should publish immutable messages with explicit id and timestamp', async () => {
      const message = await eventBus.publish('orders', 'x', { id: 'evt-1', timestamp: 1000 });

      expect(message).toEqual({ id: 'evt-1', topic: 'orders', timestamp: 1000, payload: 'x' });
      expect(Object.isFrozen(message)).toBe(true);
    });
  });

  describe('subscribe / unsubscribe', () => {
    it('should stop delivery after unsubscribe', async () => {
      const handler = jest.fn();
      eventBus.subscribe('orders', handler);

      expect(eventBus.subscriberCount('orders')).toBe(1);
      expect(eventBus.unsubscribe('orders', handler)).toBe(true);
      expect(eventBus.unsubscribe('orders', handler)).toBe(false);

      await eventBus.publish('orders', 1);
      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.subscriberCount('orders')).toBe(0);
    });
  });

  describe('poll', () => {
    it('should return messages strictly after since', async () => {
      await eventBus.publish('gateway.connections', 'a', { timestamp: 100 });
      await eventBus.publish('gateway.connections', 'b', { timestamp: 200 });
      await eventBus.publish('gateway.connections', 'c', { timestamp: 300 });

      const payloads = (messages: EventMessage[]): unknown[] =>
        messages.map((message) => message.payload);

      expect(payloads(eventBus.poll('gateway.connections'))).toEqual(['a', 'b', 'c']);
      expect(payloads(eventBus.poll('gateway.connections', 200))).toEqual(['c']);
      expect(eventBus.poll('unknown')).toEqual([]);
    });

    it('should evict the oldest messages beyond the history size', async () => {
      const smallBus = await createBus(2);

      await smallBus.publish('t', 1);
      await smallBus.publish('t', 2);
      await smallBus.publish('t', 3);

      expect(smallBus.poll('t').map((message) => message.payload)).toEqual([2, 3]);
    });
  });

  it('should clear history per topic or globally', async () => {
    await eventBus.publish('a', 1);
    await eventBus.publish('b', 2);

    eventBus.clearHistory('a');
    expect(eventBus.poll('a')).toEqual([]);
    expect(eventBus.poll('b')).toHaveLength(1);

    eventBus.clearHistory();
    expect(eventBus.poll('b')).toEqual([]);
  });

  it('should list topics with history or subscribers', async () => {
    eventBus.subscribe('zeta', jest.fn());
    await eventBus.publish('alpha', 1);

    expect(eventBus.topics()).toEqual(['alpha', 'zeta']);
  });

  describe('openChannel', () => {
    it('should buffer messages until received', async () => {
      const channel = eventBus.openChannel('orders', 10);

      await eventBus.publish('orders', 'first');

      expect(channel.pending).toBe(1);
      const message = await channel.receive(10);
      expect(message?.payload).toBe('first');
    });

    it('should drop the oldest message when the channel is full', async () => {
      const channel = eventBus.openChannel('orders', 1);

      await eventBus.publish('orders', 'first');
      await eventBus.publish('orders', 'second');

      expect(channel.dropped).toBe(1);
      expect(channel.tryReceive()?.payload).toBe('second');
    });

    it('should unsubscribe when closed', () => {
      const channel = eventBus.openChannel('orders');

      channel.close();

      expect(channel.isClosed).toBe(true);
      expect(eventBus.subscriberCount('orders')).toBe(0);
    });
  });
});
