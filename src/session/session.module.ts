import { CacheModule } from '@nestjs/cache-manager';
import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';

import {
  GcpConfigModule,
  SessionConfigModule,
  SessionConfigService,
  UploadConfigModule,
  UploadConfigService,
} from '@libs/config';

import { AnalysisModule } from '../analysis';
import { MetricsModule } from '../metrics';
import { PresentationModule } from '../presentation';
import { StorageModule } from '../storage';
import { GcpConfiguredGuard } from './guards/gcp-configured.guard';
import { SessionController } from './session.controller';
import { SessionService } from './session.service';
import { SessionStore } from './session.store';

@Module({
  imports: [
    AnalysisModule,
    CacheModule.registerAsync({
      imports: [SessionConfigModule],
      useFactory: (config: SessionConfigService) => ({ ttl: config.ttlMs }),
      inject: [SessionConfigService],
    }),
    GcpConfigModule,
    MetricsModule,
    MulterModule.registerAsync({
      imports: [UploadConfigModule],
      useFactory: (config: UploadConfigService) => ({
        limits: { fileSize: config.maxBytes, files: 1 },
      }),
      inject: [UploadConfigService],
    }),
    PresentationModule,
    StorageModule,
    UploadConfigModule,
  ],
  controllers: [SessionController],
  providers: [GcpConfiguredGuard, SessionService, SessionStore],
})
export class SessionModule {}
