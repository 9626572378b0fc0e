import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { errorMessage } from '../result';
import { ErrorItem, fail } from './response.envelope';
import { getRequestId } from './request-id';

const CODES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'bad_request',
  [HttpStatus.NOT_FOUND]: 'not_found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'method_not_allowed',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'payload_too_large',
};

export const toErrorItems = (exception: HttpException): ErrorItem[] => {
  const status = exception.getStatus();
  const code = CODES[status] ?? 'http_error';
  const body = exception.getResponse();

  const message =
    typeof body === 'string'
      ? body
      : 'message' in body
        ? body.message
        : exception.message;

  // ValidationPipe reports one message per failed constraint
  if (Array.isArray(message)) {
    return message.map((m) => ({
      code: 'validation_error',
      message: String(m),
    }));
  }

  return [
    {
      code,
      message: typeof message === 'string' ? message : exception.message,
    },
  ];
};

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const requestId = getRequestId(req);

    if (exception instanceof HttpException) {
      res
        .status(exception.getStatus())
        .json(fail(toErrorItems(exception), requestId));
      return;
    }

    this.logger.error(
      `${req.method} ${req.originalUrl} failed: ${errorMessage(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json(
      fail(
        [
          {
            code: 'internal_error',
            message: `Unexpected error: ${errorMessage(exception)}`,
          },
        ],
        requestId,
      ),
    );
  }
}
