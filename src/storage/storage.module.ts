import { Module } from '@nestjs/common';
import { Storage } from '@google-cloud/storage';

import {
  AppConfigModule,
  GcpConfigModule,
  GcpConfigService,
  UploadConfigModule,
} from '@libs/config';

import { MetricsModule } from '../metrics';
import { ObjectStorageClient } from './interfaces';
import { GCS_CLIENT } from './storage.constants';
import { StorageService } from './storage.service';

@Module({
  imports: [AppConfigModule, GcpConfigModule, MetricsModule, UploadConfigModule],
  providers: [
    {
      provide: GCS_CLIENT,
      useFactory: (config: GcpConfigService): ObjectStorageClient =>
        new Storage({ projectId: config.projectId }),
      inject: [GcpConfigService],
    },
    StorageService,
  ],
  exports: [StorageService],
})
export class StorageModule {}
