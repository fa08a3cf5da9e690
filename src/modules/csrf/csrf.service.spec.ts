import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { InMemoryCacheService } from '../../common/cache/in-memory-cache.service';
import { CryptoService } from '../../common/crypto/crypto.service';
import { CsrfService } from './csrf.service';

describe('CsrfService', () => {
  let service: CsrfService;
  let cache: InMemoryCacheService;

  beforeEach(async () => {
    cache = new InMemoryCacheService();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CsrfService,
        CryptoService,
        { provide: INJECTION_TOKENS.CACHE_SERVICE, useValue: cache },
      ],
    }).compile();

    service = module.get<CsrfService>(CsrfService);
  });

  it('should generate tokens that validate', async () => {
    const token = await service.generateToken();

    await expect(service.validateToken(token)).resolves.toBe(true);
    await expect(cache.exists(`csrf:${token}`)).resolves.toBe(true);
  });

  it('should not validate unknown or empty tokens', async () => {
    await expect(service.validateToken('unknown')).resolves.toBe(false);
    await expect(service.validateToken('')).resolves.toBe(false);
  });

  it('should invalidate the previous token on rotation', async () => {
    const previous = await service.generateToken();

    const next = await service.rotateToken(previous);

    expect(next).not.toBe(previous);
    await expect(service.validateToken(previous)).resolves.toBe(false);
    await expect(service.validateToken(next)).resolves.toBe(true);
  });

  describe('verifyDoubleSubmit', () => {
    it('should accept a live token that matches its cookie', async () => {
      const token = await service.generateToken();

      await expect(service.verifyDoubleSubmit(token, token)).resolves.toBe(true);
    });

    it('should reject a token that does not match its cookie', async () => {
      const token = await service.generateToken();
      const other = await service.generateToken();

      await expect(service.verifyDoubleSubmit(token, other)).resolves.toBe(false);
    });

    it('should reject a matching pair that was never issued', async () => {
      await expect(service.verifyDoubleSubmit('forged', 'forged')).resolves.toBe(false);
    });

    it('should reject a missing token or cookie', async () => {
      const token = await service.generateToken();

      await expect(service.verifyDoubleSubmit(token, undefined)).resolves.toBe(false);
      await expect(service.verifyDoubleSubmit(undefined, token)).resolves.toBe(false);
    });
  });
});
