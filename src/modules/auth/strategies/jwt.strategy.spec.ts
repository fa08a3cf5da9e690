import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AsyncContextService } from '../../../common/context/async-context.service';
import { Result } from '../../../common/types/result.type';
import { TokenService } from '../../tokens/application/token.service';
import type { TokenClaims, TokenError } from '../../tokens/domain/models/token-claims.model';
import { JwtStrategy } from './jwt.strategy';

describe('JwtStrategy', () => {
  let strategy: JwtStrategy;
  let tokenService: { ensureNotRevoked: jest.Mock };
  let asyncContext: { setActor: jest.Mock };

  const payload = {
    sub: 'alice',
    roles: ['user'],
    type: 'access',
    jti: 'jti-1',
    iat: 1_700_000_000,
    exp: 1_700_001_800,
  };

  beforeEach(async () => {
    tokenService = {
      ensureNotRevoked: jest.fn((claims: TokenClaims) => Promise.resolve(Result.ok<TokenClaims, TokenError>(claims))),
    };
    asyncContext = { setActor: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JwtStrategy,
        { provide: TokenService, useValue: tokenService },
        { provide: AsyncContextService, useValue: asyncContext },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn().mockReturnValue(undefined),
            getOrThrow: jest.fn().mockReturnValue('test-secret'),
          },
        },
      ],
    }).compile();

    strategy = module.get<JwtStrategy>(JwtStrategy);
  });

  it('should turn valid access claims into an actor', async () => {
    const actor = await strategy.validate(payload);

    expect(actor).toEqual({
      sub: 'alice',
      actorId: 'alice',
      roles: ['user'],
      jti: 'jti-1',
      tokenType: 'access',
    });
    expect(asyncContext.setActor).toHaveBeenCalledWith(actor);
  });

  it('should reject a payload with missing claims', async () => {
    await expect(strategy.validate({ sub: 'alice' })).rejects.toThrow(
      new UnauthorizedException('Invalid token payload'),
    );
  });

  it('should reject a refresh token', async () => {
    await expect(strategy.validate({ ...payload, type: 'refresh' })).rejects.toThrow(
      new UnauthorizedException('Access token required'),
    );
    expect(tokenService.ensureNotRevoked).not.toHaveBeenCalled();
  });

  it('should reject a revoked token', async () => {
    tokenService.ensureNotRevoked.mockResolvedValue(
      Result.fail<TokenClaims, TokenError>({ kind: 'revoked', message: 'Token has been revoked' }),
    );

    await expect(strategy.validate(payload)).rejects.toThrow(new UnauthorizedException('Unauthorized'));
    expect(asyncContext.setActor).not.toHaveBeenCalled();
  });
});
