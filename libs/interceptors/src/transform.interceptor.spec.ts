import { CallHandler, StreamableFile } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';

import { TransformInterceptor } from './transform.interceptor';

function contextFor(path: string, statusCode: number) {
  return new ExecutionContextHost([{ path }, { statusCode }]);
}

function handlerReturning<T>(value: T): CallHandler<T> {
  return { handle: () => of(value) };
}

describe('TransformInterceptor', () => {
  const interceptor = new TransformInterceptor<unknown>();

  it('wraps JSON payloads in the response envelope', async () => {
    const result = await lastValueFrom(
      interceptor.intercept(
        contextFor('/api/v1/session', 200),
        handlerReturning({ status: 'no_upload' }),
      ),
    );

    expect(result).toEqual({
      statusCode: 200,
      data: { status: 'no_upload' },
      message: 'Success',
    });
  });

  it('labels 201 responses as created', async () => {
    const result = await lastValueFrom(
      interceptor.intercept(
        contextFor('/api/v1/session/video', 201),
        handlerReturning({ status: 'uploaded' }),
      ),
    );

    expect(result).toMatchObject({ message: 'Created successfully' });
  });

  it('leaves the liveness probe untouched', async () => {
    const result = await lastValueFrom(
      interceptor.intercept(
        contextFor('/health', 200),
        handlerReturning({ status: 'healthy' }),
      ),
    );

    expect(result).toEqual({ status: 'healthy' });
  });

  it('passes streamed files through', async () => {
    const file = new StreamableFile(Buffer.from('%PDF-1.3'));

    const result = await lastValueFrom(
      interceptor.intercept(
        contextFor('/api/v1/session/report.pdf', 200),
        handlerReturning(file),
      ),
    );

    expect(result).toBe(file);
  });
});
