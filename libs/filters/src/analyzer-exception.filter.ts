import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

import { AnalyzerError } from '@libs/exceptions';
import { SentryClientService } from '@libs/sentry';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
}

@Catch()
export class AnalyzerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AnalyzerExceptionFilter.name);

  constructor(private readonly sentry: SentryClientService) {}

  public catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${body.error}: ${String(body.message)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
      this.sentry.sendException(exception, { kind: body.error });
    } else {
      this.logger.warn(`${body.error}: ${String(body.message)}`);
    }

    response.status(body.statusCode).json(body);
  }

  public toBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof AnalyzerError) {
      return {
        statusCode: exception.httpStatus,
        error: exception.kind,
        message: exception.message,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const payload = exception.getResponse();
      const message =
        typeof payload === 'object' &&
        payload !== null &&
        'message' in payload &&
        (typeof payload.message === 'string' || Array.isArray(payload.message))
          ? payload.message
          : exception.message;

      return {
        statusCode: status,
        error: 'http',
        message,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'internal',
      message: 'An unexpected error occurred',
    };
  }
}
