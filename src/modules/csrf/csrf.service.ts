import { Inject, Injectable, Logger } from '@nestjs/common';

import { randomUUID } from 'crypto';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { CryptoService } from '../../common/crypto/crypto.service';
import type { ICacheService } from '../../common/interfaces/cache.interface';

@Injectable()
export class CsrfService {
  private readonly logger = new Logger(CsrfService.name);

  private readonly CSRF_PREFIX = 'csrf:';
  private readonly CSRF_TTL = 3600; // 1 hora en segundos

  constructor(
    @Inject(INJECTION_TOKENS.CACHE_SERVICE) private readonly cacheService: ICacheService,
    private readonly cryptoService: CryptoService,
  ) {}

  /**
   * Genera un nuevo token CSRF y lo almacena en cache
   */
  async generateToken(): Promise<string> {
    const token = randomUUID();
    await this.cacheService.set(this.CSRF_PREFIX + token, true, this.CSRF_TTL);
    return token;
  }

  /**
   * Valida un token CSRF emitido por este servicio
   */
  async validateToken(token: string): Promise<boolean> {
    if (!token) {
      return false;
    }

    return this.cacheService.exists(this.CSRF_PREFIX + token);
  }

  /**
   * Double submit: el token enviado debe coincidir con la cookie y
   * seguir vigente en cache.
   */
  async verifyDoubleSubmit(submitted: string | undefined, cookie: string | undefined): Promise<boolean> {
    if (!submitted || !cookie) {
      return false;
    }

    if (!this.cryptoService.constantTimeCompare(submitted, cookie)) {
      this.logger.warn('CSRF token mismatch between parameter and cookie');
      return false;
    }

    return this.validateToken(submitted);
  }

  /**
   * Invalida un token CSRF (útil para rotación)
   */
  async invalidateToken(token: string): Promise<void> {
    if (!token) {
      return;
    }

    await this.cacheService.delete(this.CSRF_PREFIX + token);
  }

  /**
   * Rota un token CSRF: invalida el viejo y genera uno nuevo
   */
  async rotateToken(oldToken: string): Promise<string> {
    await this.invalidateToken(oldToken);
    return this.generateToken();
  }
}
