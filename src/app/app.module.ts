import { Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';

import { AppConfigModule } from '@libs/config';
import { AnalyzerExceptionFilter } from '@libs/filters';
import { SentryClientModule } from '@libs/sentry';

import { AppController } from './app.controller';
import { MetricsModule, MetricsInterceptor } from '../metrics';
import { SessionModule } from '../session';

@Module({
  imports: [
    AppConfigModule,
    MetricsModule,
    SentryClientModule,
    SessionModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AnalyzerExceptionFilter,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor,
    },
  ],
})
export class AppModule {}
