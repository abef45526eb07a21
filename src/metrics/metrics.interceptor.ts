import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import { MetricsService } from './metrics.service';

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null) {
    if ('httpStatus' in error && typeof error.httpStatus === 'number') {
      return error.httpStatus;
    }
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
  }
  return 500;
}

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method } = request;
    const routePath: string =
      typeof request.route?.path === 'string' ? request.route.path : request.path;

    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = (Date.now() - startTime) / 1000;
          this.metricsService.recordHttpRequest(
            method,
            routePath,
            response.statusCode || 200,
            duration,
          );
        },
        error: (error: unknown) => {
          const duration = (Date.now() - startTime) / 1000;
          this.metricsService.recordHttpRequest(
            method,
            routePath,
            statusOf(error),
            duration,
          );
        },
      }),
    );
  }
}
