import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { Actor } from '../../../common/interfaces/actor.interface';
import { EventTopicAccessService } from './event-topic-access.service';

describe('EventTopicAccessService', () => {
  let service: EventTopicAccessService;
  let membership: { isMember: jest.Mock };

  const actor = (sub: string, roles: string[]): Actor => ({
    sub,
    actorId: sub,
    roles,
    jti: `jti-${sub}`,
    tokenType: 'access',
  });

  beforeEach(async () => {
    membership = {
      isMember: jest.fn((subject: string, channelId: string) =>
        Promise.resolve(subject === 'alice' && channelId === 'board'),
      ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventTopicAccessService,
        { provide: INJECTION_TOKENS.CHANNEL_MEMBERSHIP, useValue: membership },
      ],
    }).compile();

    service = module.get<EventTopicAccessService>(EventTopicAccessService);
  });

  describe('user topics', () => {
    it('should allow the owner', async () => {
      await expect(service.canRead(actor('alice', ['user']), 'user:alice:realtime')).resolves.toBe(true);
    });

    it('should refuse another user', async () => {
      await expect(service.canRead(actor('bob', ['user']), 'user:alice:realtime')).resolves.toBe(false);
    });
  });

  describe('role topics', () => {
    it('should refuse a guest on the admin broadcasts', async () => {
      await expect(
        service.canRead(actor('guest-1', ['guest']), 'role:admin:broadcasts'),
      ).resolves.toBe(false);
    });

    it('should allow an actor holding the role', async () => {
      await expect(
        service.canRead(actor('alice', ['user', 'ops']), 'role:ops:broadcasts'),
      ).resolves.toBe(true);
    });
  });

  describe('channel topics', () => {
    it('should allow a channel member', async () => {
      await expect(service.canRead(actor('alice', ['user']), 'channel:board')).resolves.toBe(true);
      expect(membership.isMember).toHaveBeenCalledWith('alice', 'board');
    });

    it('should refuse a non member', async () => {
      await expect(service.canRead(actor('guest-1', ['guest']), 'channel:board')).resolves.toBe(false);
      expect(membership.isMember).toHaveBeenCalledWith('guest-1', 'board');
    });
  });

  it('should let an admin read any private topic without a membership lookup', async () => {
    const admin = actor('root', ['admin']);

    await expect(service.canRead(admin, 'user:alice:realtime')).resolves.toBe(true);
    await expect(service.canRead(admin, 'role:ops:broadcasts')).resolves.toBe(true);
    await expect(service.canRead(admin, 'channel:board')).resolves.toBe(true);
    expect(membership.isMember).not.toHaveBeenCalled();
  });

  it('should leave other topics public', async () => {
    await expect(service.canRead(actor('guest-1', ['guest']), 'orders')).resolves.toBe(true);
  });
});
