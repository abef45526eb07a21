import { BadRequestException } from '@nestjs/common';
import type { Request } from 'express';

import { readSessionId } from './session-id.decorator';

function requestWith(headers: Request['headers']): Pick<Request, 'headers'> {
  return { headers };
}

describe('readSessionId', () => {
  it('returns a well-formed header value', () => {
    expect(readSessionId(requestWith({ 'x-session-id': 'tab-1234abcd' }))).toBe(
      'tab-1234abcd',
    );
  });

  it.each([undefined, '', 'short', 'has spaces in it', 'x'.repeat(129)])(
    'rejects %p',
    (value) => {
      expect(() =>
        readSessionId(requestWith({ 'x-session-id': value })),
      ).toThrow(BadRequestException);
    },
  );
});
