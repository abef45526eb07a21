import {
  BadRequestException,
  createParamDecorator,
  ExecutionContext,
} from '@nestjs/common';
import type { Request } from 'express';

import { SESSION_ID_HEADER, SESSION_ID_PATTERN } from '../session.constants';

export function readSessionId(request: Pick<Request, 'headers'>): string {
  const raw = request.headers[SESSION_ID_HEADER];
  const sessionId = Array.isArray(raw) ? raw[0] : raw;

  if (!sessionId || !SESSION_ID_PATTERN.test(sessionId)) {
    throw new BadRequestException(
      'X-Session-Id header must be 8-128 letters, digits, dashes or underscores',
    );
  }

  return sessionId;
}

/**
 * Injects the caller's session id taken from the `X-Session-Id` header.
 */
export const SessionId = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string =>
    readSessionId(context.switchToHttp().getRequest<Request>()),
);
