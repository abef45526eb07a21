import { Global, Module } from '@nestjs/common';
import { SentryModule } from '@sentry/nestjs/setup';

import { AppConfigModule } from '@libs/config';

import { SentryClientService } from './sentry-client.service';

/**
 * Sentry's Nest integration plus the env-aware client the services report
 * through. `src/instrument.ts` must have run first for events to be sent.
 */
@Global()
@Module({
  imports: [AppConfigModule, SentryModule.forRoot()],
  providers: [SentryClientService],
  exports: [SentryClientService],
})
export class SentryClientModule {}
