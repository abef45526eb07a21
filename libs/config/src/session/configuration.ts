import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('session', () => ({
  ttlMs: env.SESSION_TTL_MS ? parseInt(env.SESSION_TTL_MS, 10) : 7_200_000,
}));
