import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  StreamableFile,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { includes } from 'lodash';
import { Observable, map } from 'rxjs';

import { ApiResponse } from '@libs/interfaces';

/** Paths answered verbatim (Prometheus text, liveness probe). */
export const RAW_RESPONSE_PATHS = ['/metrics', '/health'];

@Injectable()
export class TransformInterceptor<T>
  implements NestInterceptor<T, ApiResponse<T> | T | StreamableFile>
{
  public intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T> | T | StreamableFile> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const statusCode = ctx.getResponse<Response>().statusCode;

    if (includes(RAW_RESPONSE_PATHS, request.path)) {
      return next.handle();
    }

    return next.handle().pipe(
      map((value) => {
        if (value instanceof StreamableFile) {
          return value;
        }

        const message = statusCode === 201 ? 'Created successfully' : 'Success';

        return { statusCode, data: value, message };
      }),
    );
  }
}
