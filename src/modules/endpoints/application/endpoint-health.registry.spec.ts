import { EventEmitter2 } from '@nestjs/event-emitter';

import { ENDPOINT_EVENTS, EndpointStatusChangedEvent } from '../domain/events/endpoint-status-changed.event';
import { ENDPOINT_HISTORY_LIMIT, EndpointStatus } from '../domain/models/endpoint.model';
import { EndpointHealthRegistry } from './endpoint-health.registry';

describe('EndpointHealthRegistry', () => {
  let registry: EndpointHealthRegistry;
  let eventEmitter: EventEmitter2;

  beforeEach(() => {
    eventEmitter = new EventEmitter2();
    registry = new EndpointHealthRegistry(eventEmitter);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('register', () => {
    it('should create an endpoint with defaults', () => {
      const info = registry.register('GET:/api/v1/orders', 'List orders');

      expect(info).toEqual({
        endpointId: 'GET:/api/v1/orders',
        name: 'List orders',
        description: '',
        category: 'general',
        status: EndpointStatus.STARTING,
        lastChecked: expect.any(Date),
        metadata: {},
        tags: [],
        history: [],
      });
    });

    it('should merge into an existing endpoint without changing its status', () => {
      registry.register('orders', 'Orders', {
        description: 'Order API',
        category: 'api',
        status: EndpointStatus.HEALTHY,
        metadata: { owner: 'team-a', version: 1 },
        tags: ['http', 'orders'],
      });

      const merged = registry.register('orders', 'Orders v2', {
        status: EndpointStatus.DOWN,
        metadata: { version: 2 },
        tags: ['orders', 'public'],
      });

      expect(merged.name).toBe('Orders v2');
      expect(merged.description).toBe('Order API');
      expect(merged.category).toBe('api');
      expect(merged.status).toBe(EndpointStatus.HEALTHY);
      expect(merged.metadata).toEqual({ owner: 'team-a', version: 2 });
      expect(merged.tags).toEqual(['http', 'orders', 'public']);
    });
  });

  describe('updateStatus', () => {
    it('should record the transition and emit an event', () => {
      const listener = jest.fn();
      eventEmitter.on(ENDPOINT_EVENTS.STATUS_CHANGED, listener);
      registry.register('orders', 'Orders');

      const result = registry.updateStatus('orders', EndpointStatus.DOWN, { error: 'timeout' });

      const info = result.getValue();
      expect(info.status).toBe(EndpointStatus.DOWN);
      expect(info.metadata).toEqual({ error: 'timeout' });
      expect(info.history).toEqual([
        {
          previousStatus: EndpointStatus.STARTING,
          newStatus: EndpointStatus.DOWN,
          timestamp: expect.any(Date),
          metadata: {},
        },
      ]);
      expect(listener).toHaveBeenCalledTimes(1);
      const event: EndpointStatusChangedEvent = listener.mock.calls[0][0];
      expect(event.endpointId).toBe('orders');
      expect(event.previousStatus).toBe(EndpointStatus.STARTING);
      expect(event.newStatus).toBe(EndpointStatus.DOWN);
    });

    it('should snapshot the endpoint metadata before merging the update', () => {
      registry.register('orders', 'Orders', { metadata: { region: 'eu', version: 1 } });

      const info = registry
        .updateStatus('orders', EndpointStatus.DOWN, { version: 2, error: 'timeout' })
        .getValue();

      expect(info.metadata).toEqual({ region: 'eu', version: 2, error: 'timeout' });
      expect(info.history[0].metadata).toEqual({ region: 'eu', version: 1 });
    });

    it('should only refresh lastChecked when the status does not change', () => {
      jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00Z') });
      const listener = jest.fn();
      eventEmitter.on(ENDPOINT_EVENTS.STATUS_CHANGED, listener);
      registry.register('orders', 'Orders', { status: EndpointStatus.HEALTHY });

      jest.setSystemTime(new Date('2024-01-01T00:05:00Z'));
      const info = registry.updateStatus('orders', EndpointStatus.HEALTHY).getValue();

      expect(info.lastChecked).toEqual(new Date('2024-01-01T00:05:00Z'));
      expect(info.history).toEqual([]);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should advance lastChecked on a transition', () => {
      jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00Z') });
      registry.register('orders', 'Orders');

      jest.setSystemTime(new Date('2024-01-01T00:10:00Z'));
      const info = registry.updateStatus('orders', EndpointStatus.HEALTHY).getValue();

      expect(info.lastChecked).toEqual(new Date('2024-01-01T00:10:00Z'));
      expect(info.history[0].timestamp).toEqual(new Date('2024-01-01T00:10:00Z'));
    });

    it('should fail for an unknown endpoint', () => {
      const result = registry.updateStatus('missing', EndpointStatus.HEALTHY);

      expect(result.getError()).toEqual({ kind: 'not_found', message: 'Endpoint missing not found' });
    });

    it('should keep only the most recent transitions', () => {
      registry.register('orders', 'Orders');
      for (let i = 0; i < ENDPOINT_HISTORY_LIMIT + 5; i++) {
        registry.updateStatus('orders', i % 2 === 0 ? EndpointStatus.HEALTHY : EndpointStatus.DEGRADED);
      }

      const history = registry.get('orders')?.history ?? [];

      expect(history).toHaveLength(ENDPOINT_HISTORY_LIMIT);
      expect(history[history.length - 1].newStatus).toBe(EndpointStatus.HEALTHY);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      registry.register('a', 'A', { category: 'api', status: EndpointStatus.HEALTHY, tags: ['http'] });
      registry.register('b', 'B', { category: 'api', status: EndpointStatus.DOWN });
      registry.register('c', 'C', { category: 'ws', tags: ['websocket'] });
    });

    it('should filter by status, category and tag', () => {
      const ids = (list: { endpointId: string }[]) => list.map((info) => info.endpointId);

      expect(ids(registry.listByStatus(EndpointStatus.DOWN))).toEqual(['b']);
      expect(ids(registry.listByStatus([EndpointStatus.HEALTHY, EndpointStatus.STARTING]))).toEqual(['a', 'c']);
      expect(ids(registry.listByCategory('api'))).toEqual(['a', 'b']);
      expect(ids(registry.listByTag('websocket'))).toEqual(['c']);
    });

    it('should count every status in the summary', () => {
      expect(registry.summary()).toEqual({
        healthy: 1,
        degraded: 0,
        down: 1,
        unknown: 0,
        starting: 1,
        maintenance: 0,
        planned: 0,
      });
    });

    it('should promote every endpoint in a status', () => {
      expect(registry.promote(EndpointStatus.STARTING, EndpointStatus.HEALTHY)).toBe(1);
      expect(registry.get('c')?.status).toBe(EndpointStatus.HEALTHY);
      expect(registry.promote(EndpointStatus.STARTING, EndpointStatus.HEALTHY)).toBe(0);
    });

    it('should return copies', () => {
      const info = registry.get('a');
      info?.tags.push('mutated');

      expect(registry.get('a')?.tags).toEqual(['http']);
      expect(registry.has('a')).toBe(true);
      expect(registry.has('z')).toBe(false);
    });
  });
});
