import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import type { Actor } from '../../../common/interfaces/actor.interface';
import { Result } from '../../../common/types/result.type';
import { TokenService } from '../../tokens/application/token.service';
import type { RevocationOutcome } from '../../tokens/domain/models/revoked-token.model';
import type {
  TokenClaims,
  TokenError,
  TokenPair,
} from '../../tokens/domain/models/token-claims.model';
import { AuthService } from './auth.service';

describe('AuthService', () => {
  let service: AuthService;
  let tokenService: {
    issuePair: jest.Mock;
    refresh: jest.Mock;
    verify: jest.Mock;
    revoke: jest.Mock;
  };
  let userLookup: { getUser: jest.Mock };

  const pair: TokenPair = {
    accessToken: 'access-token',
    refreshToken: 'refresh-token',
    tokenType: 'Bearer',
    expiresIn: 1800,
  };

  const pairDto = {
    access_token: 'access-token',
    refresh_token: 'refresh-token',
    token_type: 'Bearer',
    expires_in: 1800,
  };

  const claimsOf = (sub: string): TokenClaims => ({
    sub,
    roles: ['user'],
    iat: 1_700_000_000,
    exp: 1_700_001_800,
    jti: 'jti-1',
    type: 'access',
  });

  const actorWith = (sub: string, roles: string[]): Actor => ({
    sub,
    actorId: sub,
    roles,
    jti: 'jti-actor',
    tokenType: 'access',
  });

  const outcome = (alreadyRevoked: boolean): RevocationOutcome => ({
    jti: 'jti-1',
    subject: 'alice',
    expiresAt: new Date(1_700_001_800_000),
    alreadyRevoked,
    cached: !alreadyRevoked,
    persisted: !alreadyRevoked,
  });

  beforeEach(async () => {
    tokenService = {
      issuePair: jest.fn().mockReturnValue(pair),
      refresh: jest.fn(),
      verify: jest.fn(),
      revoke: jest.fn(),
    };
    userLookup = {
      getUser: jest.fn().mockResolvedValue({ id: 'alice', roles: ['user'], isActive: true }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: TokenService, useValue: tokenService },
        { provide: INJECTION_TOKENS.USER_LOOKUP, useValue: userLookup },
        {
          provide: AsyncContextService,
          useValue: { getRequestId: jest.fn().mockReturnValue('req-1') },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
  });

  describe('issueTokens', () => {
    it('should issue a pair for an active user', async () => {
      const response = await service.issueTokens('alice');

      expect(response.ok).toBe(true);
      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.data).toEqual(pairDto);
      expect(response.meta).toEqual({ requestId: 'req-1' });
      expect(tokenService.issuePair).toHaveBeenCalledWith('alice', ['user']);
    });

    it('should return 404 for an unknown user', async () => {
      userLookup.getUser.mockResolvedValue(null);

      const response = await service.issueTokens('ghost');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('Usuario no encontrado');
      expect(tokenService.issuePair).not.toHaveBeenCalled();
    });

    it('should return 403 for an inactive user', async () => {
      userLookup.getUser.mockResolvedValue({ id: 'alice', roles: ['user'], isActive: false });

      const response = await service.issueTokens('alice');

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
    });

    it('should return 503 when the user store fails', async () => {
      userLookup.getUser.mockRejectedValue(new Error('timeout'));

      const response = await service.issueTokens('alice');

      expect(response.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    });
  });

  describe('refresh', () => {
    it('should return the rotated pair', async () => {
      tokenService.refresh.mockResolvedValue(Result.ok<TokenPair, TokenError>(pair));

      const response = await service.refresh('refresh-token');

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.data).toEqual(pairDto);
    });

    it('should return 401 for a revoked refresh token', async () => {
      tokenService.refresh.mockResolvedValue(
        Result.fail<TokenPair, TokenError>({ kind: 'revoked', message: 'Token has been revoked' }),
      );

      const response = await service.refresh('refresh-token');

      expect(response.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(response.errors).toBe('Token de refresco inválido o expirado');
    });

    it('should return 503 when revocation state is unavailable', async () => {
      tokenService.refresh.mockResolvedValue(
        Result.fail<TokenPair, TokenError>({ kind: 'unavailable', message: 'down' }),
      );

      const response = await service.refresh('refresh-token');

      expect(response.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    });
  });

  describe('revoke', () => {
    it('should let an actor revoke its own token', async () => {
      tokenService.verify.mockReturnValue(Result.ok<TokenClaims, TokenError>(claimsOf('alice')));
      tokenService.revoke.mockResolvedValue(
        Result.ok<RevocationOutcome, TokenError>(outcome(false)),
      );

      const response = await service.revoke(actorWith('alice', ['user']), 'token');

      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.data).toEqual({ jti: 'jti-1', already_revoked: false, persisted: true });
      expect(response.message).toBe('Token revocado exitosamente');
      expect(tokenService.revoke).toHaveBeenCalledWith('token', 'explicit');
    });

    it('should let an admin revoke any token as a forced logout', async () => {
      tokenService.verify.mockReturnValue(Result.ok<TokenClaims, TokenError>(claimsOf('alice')));
      tokenService.revoke.mockResolvedValue(
        Result.ok<RevocationOutcome, TokenError>(outcome(false)),
      );

      await service.revoke(actorWith('root', ['admin']), 'token');

      expect(tokenService.revoke).toHaveBeenCalledWith('token', 'forced_logout');
    });

    it('should forbid revoking a token of another user', async () => {
      tokenService.verify.mockReturnValue(Result.ok<TokenClaims, TokenError>(claimsOf('alice')));

      const response = await service.revoke(actorWith('bob', ['user']), 'token');

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(tokenService.revoke).not.toHaveBeenCalled();
    });

    it('should return 400 for an invalid token', async () => {
      tokenService.verify.mockReturnValue(
        Result.fail<TokenClaims, TokenError>({ kind: 'invalid', message: 'Invalid token' }),
      );

      const response = await service.revoke(actorWith('alice', ['user']), 'garbage');

      expect(response.statusCode).toBe(HttpStatus.BAD_REQUEST);
    });

    it('should report an already revoked token', async () => {
      tokenService.verify.mockReturnValue(Result.ok<TokenClaims, TokenError>(claimsOf('alice')));
      tokenService.revoke.mockResolvedValue(
        Result.ok<RevocationOutcome, TokenError>(outcome(true)),
      );

      const response = await service.revoke(actorWith('alice', ['user']), 'token', 'explicit');

      expect(response.data).toEqual({ jti: 'jti-1', already_revoked: true, persisted: false });
      expect(response.message).toBe('El token ya estaba revocado');
    });
  });
});
