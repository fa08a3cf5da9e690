import { HttpStatus, Injectable, Logger, NestMiddleware } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NextFunction, Request, Response } from 'express';

import { CryptoService } from '../common/crypto/crypto.service';
import { ApiResponse } from '../common/types/api-response.type';

export const API_KEY_HEADER = 'x-api-key';

/**
 * Valida la cabecera x-api-key en las rutas servicio a servicio
 * (emisión de tokens y registro de endpoints).
 */
@Injectable()
export class ApiKeyMiddleware implements NestMiddleware {
  private readonly logger = new Logger(ApiKeyMiddleware.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly cryptoService: CryptoService,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers[API_KEY_HEADER];
    const apiKey = typeof header === 'string' ? header : '';

    if (!apiKey) {
      this.reject(req, res, 'Missing x-api-key header');
      return;
    }

    const expected = this.configService.getOrThrow<string>('API_KEY');
    if (!this.cryptoService.constantTimeCompare(apiKey, expected)) {
      this.reject(req, res, 'Invalid x-api-key');
      return;
    }

    next();
  }

  private reject(req: Request, res: Response, reason: string): void {
    this.logger.warn(`${req.method} ${req.originalUrl} rejected: ${reason}`);
    const response = ApiResponse.fail(HttpStatus.UNAUTHORIZED, reason, 'Unauthorized');
    res.status(response.statusCode).json(response);
  }
}
