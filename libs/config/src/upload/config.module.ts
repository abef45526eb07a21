import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { UploadConfigService } from './config.service';
import uploadConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [uploadConfiguration],
    }),
  ],
  providers: [UploadConfigService],
  exports: [UploadConfigService],
})
export class UploadConfigModule {}
