import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export const DEFAULT_UPLOAD_MAX_BYTES = 200 * 1024 * 1024;

export default registerAs('upload', () => ({
  maxBytes: env.UPLOAD_MAX_BYTES
    ? parseInt(env.UPLOAD_MAX_BYTES, 10)
    : DEFAULT_UPLOAD_MAX_BYTES,
  prefix: env.UPLOAD_PREFIX,
}));
