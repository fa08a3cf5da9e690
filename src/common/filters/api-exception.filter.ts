import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { AsyncContextService } from '../context/async-context.service';
import { ApiResponse } from '../types/api-response.type';

const messagesOf = (body: string | object): string | string[] => {
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body) {
    const message = body.message;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message) && message.every((entry) => typeof entry === 'string')) {
      return message;
    }
  }
  return 'Request failed';
};

/**
 * Convierte cualquier excepción HTTP en el sobre ApiResponse.
 * Los errores inesperados se registran y se responden como 500 sin detalles.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(private readonly asyncContext: AsyncContextService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      return;
    }

    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const requestId = this.asyncContext.getRequestId();

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      const extra =
        typeof body === 'object' && 'limit' in body && 'remaining' in body
          ? { limit: body.limit, remaining: body.remaining }
          : {};

      const envelope = ApiResponse.fail(exception.getStatus(), messagesOf(body), exception.message, {
        requestId,
        ...extra,
      });
      response.status(envelope.statusCode).json(envelope);
      return;
    }

    const errorMsg = exception instanceof Error ? exception.message : String(exception);
    this.logger.error(
      `[${requestId}] Unhandled error on ${request.method} ${request.originalUrl}: ${errorMsg}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    const envelope = ApiResponse.fail(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'Internal server error',
      undefined,
      { requestId },
    );
    response.status(envelope.statusCode).json(envelope);
  }
}
