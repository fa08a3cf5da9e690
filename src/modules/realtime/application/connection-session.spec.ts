import { ConfigService } from '@nestjs/config';

import { EventBusService } from '../../event-bus/application/event-bus.service';
import { EventBusPubSubAdapter } from '../../event-bus/infrastructure/adapters/event-bus-pubsub.adapter';
import { Connection } from '../domain/models/connection.model';
import { frames } from '../domain/models/realtime-message.model';
import { OpenChannelMembershipAdapter } from '../infrastructure/adapters/open-channel-membership.adapter';
import { FakeRealtimeSocket, waitFor } from '../testing/fake-realtime-socket';
import { ConnectionLifecycle } from './connection-lifecycle';
import { ConnectionRegistryService } from './connection-registry.service';
import { ConnectionSession, ConnectionSessionOptions } from './connection-session';
import { RealtimeMessageRouter } from './realtime-message.router';

describe('ConnectionSession', () => {
  let eventBus: EventBusService;
  let pubsub: EventBusPubSubAdapter;
  let socket: FakeRealtimeSocket;
  let lifecycle: ConnectionLifecycle;
  let connection: Connection;
  let session: ConnectionSession;

  const createSession = (overrides: Partial<ConnectionSessionOptions> = {}): ConnectionSession =>
    new ConnectionSession(
      connection,
      lifecycle,
      socket,
      pubsub,
      new RealtimeMessageRouter(new OpenChannelMembershipAdapter()),
      { receiveTimeoutMs: 5, livenessMs: 60_000, fanoutQueueSize: 10, ...overrides },
    );

  beforeEach(() => {
    eventBus = new EventBusService(new ConfigService());
    pubsub = new EventBusPubSubAdapter(eventBus);
    socket = new FakeRealtimeSocket();

    lifecycle = new ConnectionLifecycle('conn-1');
    lifecycle.send({ type: 'TOKEN_PRESENTED' });
    lifecycle.send({ type: 'AUTHENTICATED', subject: 'alice' });

    connection = new ConnectionRegistryService().register({
      connectionId: 'conn-1',
      subject: 'alice',
      roles: ['user'],
      jti: 'jti-1',
      state: lifecycle.state,
    });
    session = createSession();
  });

  afterEach(async () => {
    await session.teardown();
    lifecycle.stop();
  });

  it('should subscribe the user channel and one channel per role', async () => {
    await session.subscribeInitial();

    expect([...connection.subscribedChannels]).toEqual(['user:alice:realtime', 'role:user:broadcasts']);
    expect(eventBus.subscriberCount('user:alice:realtime')).toBe(1);
    expect(eventBus.subscriberCount('role:user:broadcasts')).toBe(1);
  });

  it('should forward published frames and stop when the client disconnects', async () => {
    await session.subscribeInitial();
    const running = session.run();

    await pubsub.publish('role:user:broadcasts', 'maintenance at noon');
    await waitFor(() => socket.sent.length === 1);
    socket.disconnect();

    await expect(running).resolves.toEqual({
      code: 1000,
      reason: 'Client disconnected',
      initiatedBy: 'client',
    });
    expect(socket.sent).toEqual(['maintenance at noon']);
    expect(connection.state).toBe('closing');
  });

  it('should drop the oldest frames when the fan-out queue is full', async () => {
    session = createSession({ fanoutQueueSize: 2 });
    await session.subscribeInitial();
    await pubsub.publish('user:alice:realtime', 'first');
    await pubsub.publish('user:alice:realtime', 'second');
    await pubsub.publish('user:alice:realtime', 'third');

    const running = session.run();
    await waitFor(() => socket.sent.length === 2);
    socket.disconnect();
    await running;

    expect(socket.sent).toEqual(['second', 'third']);
    expect(session.droppedFrames).toBe(1);
  });

  it('should join and leave group channels', async () => {
    await session.subscribeInitial();
    const running = session.run();

    socket.deliver('{"type":"join_channel","channel_id":"ops"}');
    await waitFor(() => socket.sent.length === 1);
    expect(socket.sentJson()).toEqual([{ type: 'channel_joined', channel_id: 'ops' }]);
    expect(connection.subscribedChannels.has('channel:ops')).toBe(true);

    await pubsub.publish('channel:ops', 'deploy finished');
    await waitFor(() => socket.sent.length === 2);
    expect(socket.sent[1]).toBe('deploy finished');

    socket.deliver('{"type":"leave_channel","channel_id":"ops"}');
    await waitFor(() => !connection.subscribedChannels.has('channel:ops'));
    expect(eventBus.subscriberCount('channel:ops')).toBe(0);

    socket.disconnect();
    await running;
  });

  it('should close with 1008 when its own token is revoked', async () => {
    await session.subscribeInitial();
    const running = session.run();

    await pubsub.publish(
      'user:alice:realtime',
      frames.control({ type: '__control', action: 'revoke', jti: 'jti-other' }),
    );
    await pubsub.publish(
      'user:alice:realtime',
      frames.control({ type: '__control', action: 'revoke', jti: 'jti-1' }),
    );

    await expect(running).resolves.toEqual({
      code: 1008,
      reason: 'Token revoked',
      initiatedBy: 'server',
    });
    expect(socket.closedWith).toEqual({ code: 1008, reason: 'Token revoked' });
    expect(socket.sent).toEqual([]);
  });

  it('should ping an idle client', async () => {
    session = createSession({ livenessMs: 20 });
    await session.subscribeInitial();
    const running = session.run();

    await waitFor(() => socket.sent.length > 0);
    socket.disconnect();
    await running;

    expect(socket.sentJson()[0]).toEqual({ type: 'ping', timestamp: expect.any(Number) });
  });

  it('should close with 1011 when a send fails on an open socket', async () => {
    await session.subscribeInitial();
    socket.failSends = true;
    const running = session.run();

    socket.deliver('{"type":"ping"}');

    await expect(running).resolves.toEqual({
      code: 1011,
      reason: 'Send failed',
      initiatedBy: 'server',
    });
    expect(socket.closedWith).toEqual({ code: 1011, reason: 'Send failed' });
  });

  it('should release every subscription on teardown', async () => {
    await session.subscribeInitial();

    await session.teardown();

    expect(connection.subscribedChannels.size).toBe(0);
    expect(eventBus.subscriberCount('user:alice:realtime')).toBe(0);
    expect(eventBus.subscriberCount('role:user:broadcasts')).toBe(0);
  });
});
