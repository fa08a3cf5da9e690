import { ConnectionRegistryService } from './connection-registry.service';

describe('ConnectionRegistryService', () => {
  let registry: ConnectionRegistryService;

  const register = (connectionId: string, subject: string) =>
    registry.register({ connectionId, subject, roles: ['user'], jti: `jti-${connectionId}`, state: 'subscribed' });

  beforeEach(() => {
    registry = new ConnectionRegistryService();
  });

  it('should register a connection with empty subscriptions', () => {
    const connection = register('conn-1', 'alice');

    expect(connection.subject).toBe('alice');
    expect(connection.subscribedChannels.size).toBe(0);
    expect(connection.lastActivity).toBe(connection.connectedAt.getTime());
    expect(registry.get('conn-1')).toBe(connection);
  });

  it('should refuse a duplicated connection id', () => {
    register('conn-1', 'alice');

    expect(() => register('conn-1', 'bob')).toThrow('Connection conn-1 is already registered');
  });

  it('should index connections by subject', () => {
    register('conn-1', 'alice');
    register('conn-2', 'alice');
    register('conn-3', 'bob');

    expect(registry.listBySubject('alice').map((c) => c.connectionId)).toEqual(['conn-1', 'conn-2']);
    expect(registry.count()).toBe(3);
    expect(registry.subjectCount()).toBe(2);
    expect(registry.listBySubject('carol')).toEqual([]);
  });

  it('should remove connections from the arena and the index', () => {
    register('conn-1', 'alice');
    register('conn-2', 'alice');

    registry.remove('conn-1');
    expect(registry.listBySubject('alice').map((c) => c.connectionId)).toEqual(['conn-2']);

    registry.remove('conn-2');
    expect(registry.count()).toBe(0);
    expect(registry.subjectCount()).toBe(0);
  });

  it('should ignore removing an unknown connection', () => {
    expect(registry.remove('missing')).toBeUndefined();
  });
});
