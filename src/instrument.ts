import * as Sentry from '@sentry/nestjs';
import { env } from 'node:process';

// Loaded before anything else so Sentry can patch the modules it traces.
if (env.SENTRY_DSN && env.NODE_ENV === 'production') {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE
      ? parseFloat(env.SENTRY_TRACES_SAMPLE_RATE)
      : 0.1,
  });
}
