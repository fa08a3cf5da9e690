import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';

import { ClsService } from 'nestjs-cls';
import { v4 as uuidv4 } from 'uuid';

import { AppClsStore } from '../common/context/cls-store.interface';

export const REQUEST_ID_HEADER = 'x-request-id';

const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * RequestIdMiddleware: identificador único por request.
 *
 * - Respeta un x-request-id entrante si es un UUID v4
 * - Si no, usa el id generado por ClsModule
 * - Lo expone en la cabecera de respuesta y registra la request al terminar
 *
 * El actor lo fija la estrategia JWT tras verificar el token.
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger(RequestIdMiddleware.name);

  constructor(private readonly cls: ClsService<AppClsStore>) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && UUID_V4_PATTERN.test(incoming) ? incoming : (this.cls.getId() ?? uuidv4());

    this.cls.set('requestId', requestId);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const startedAt = Date.now();
    res.on('finish', () => {
      const actor = this.cls.isActive() ? this.cls.get('actor') : undefined;
      const actorInfo = actor ? ` (sub=${actor.sub})` : '';
      this.logger.log(
        `[${requestId}] ${req.method} ${req.originalUrl} ${res.statusCode} - ${Date.now() - startedAt}ms${actorInfo}`,
      );
    });

    next();
  }
}
