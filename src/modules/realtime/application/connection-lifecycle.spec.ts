import { ConnectionLifecycle } from './connection-lifecycle';

describe('ConnectionLifecycle', () => {
  let lifecycle: ConnectionLifecycle;

  beforeEach(() => {
    lifecycle = new ConnectionLifecycle('conn-1');
  });

  afterEach(() => {
    lifecycle.stop();
  });

  it('should start in connecting', () => {
    expect(lifecycle.state).toBe('connecting');
    expect(lifecycle.isTerminal).toBe(false);
  });

  it('should walk through the full lifecycle', () => {
    expect(lifecycle.send({ type: 'TOKEN_PRESENTED' })).toBe(true);
    expect(lifecycle.send({ type: 'AUTHENTICATED', subject: 'alice' })).toBe(true);
    expect(lifecycle.state).toBe('subscribed');
    expect(lifecycle.send({ type: 'START' })).toBe(true);
    expect(lifecycle.send({ type: 'CLOSE', code: 1000, reason: 'Client disconnected' })).toBe(true);
    expect(lifecycle.state).toBe('closing');
    expect(lifecycle.send({ type: 'CLOSED' })).toBe(true);

    expect(lifecycle.state).toBe('closed');
    expect(lifecycle.isTerminal).toBe(true);
    expect(lifecycle.closeCode).toBe(1000);
    expect(lifecycle.closeReason).toBe('Client disconnected');
  });

  it('should record the rejection reason', () => {
    lifecycle.send({ type: 'REJECT', code: 1008, reason: 'Unauthorized: No token provided' });

    expect(lifecycle.state).toBe('rejected');
    expect(lifecycle.closeCode).toBe(1008);
    expect(lifecycle.closeReason).toBe('Unauthorized: No token provided');
  });

  it('should ignore events not allowed in the current state', () => {
    expect(lifecycle.send({ type: 'START' })).toBe(false);
    expect(lifecycle.state).toBe('connecting');
  });

  it('should keep the first close reason', () => {
    lifecycle.send({ type: 'TOKEN_PRESENTED' });
    lifecycle.send({ type: 'AUTHENTICATED', subject: 'alice' });
    lifecycle.send({ type: 'START' });
    lifecycle.send({ type: 'CLOSE', code: 1008, reason: 'Token revoked' });

    expect(lifecycle.send({ type: 'CLOSE', code: 1000, reason: 'Client disconnected' })).toBe(false);
    expect(lifecycle.closeReason).toBe('Token revoked');
  });
});
