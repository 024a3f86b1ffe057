import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import { BACKEND_ERROR_MESSAGE, INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';

/**
 * Renders every failure as `{ ok: false, message, requestId }`.
 * Client errors keep their message; anything 5xx or unknown becomes the
 * generic backend message and is logged with its stack.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const requestMeta = { path: request.path, method: request.method, requestId: request.requestId };

    let message = BACKEND_ERROR_MESSAGE;
    if (status >= 500) {
      this.logger.error(
        'request_failed',
        exception instanceof Error ? exception : undefined,
        { ...requestMeta, status },
      );
    } else if (exception instanceof HttpException) {
      message = clientMessage(exception);
      this.logger.http('request_rejected', { ...requestMeta, status });
    }

    response.status(status).json({
      ok: false,
      message,
      requestId: request.requestId,
    });
  }
}

function clientMessage(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }

  if (typeof body === 'object' && body !== null && 'message' in body) {
    // Nest's built-in pipes report a list of messages.
    const detail = Array.isArray(body.message) ? body.message[0] : body.message;
    if (typeof detail === 'string') {
      return detail;
    }
  }

  return INVALID_PAYLOAD_MESSAGE;
}
