import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('app', () => ({
  env: env.NODE_ENV ?? 'development',
  host: env.APP_HOST ?? '0.0.0.0',
  port: env.APP_PORT
    ? parseInt(env.APP_PORT, 10)
    : env.PORT
      ? parseInt(env.PORT, 10)
      : 3000,
  globalPrefix: env.APP_GLOBAL_PREFIX,
  promptTemplatePath: env.PROMPT_TEMPLATE_PATH,
  webDistPath: env.WEB_DIST_PATH,
}));
