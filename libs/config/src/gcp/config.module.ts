import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { GcpConfigService } from './config.service';
import gcpConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [gcpConfiguration],
    }),
  ],
  providers: [GcpConfigService],
  exports: [GcpConfigService],
})
export class GcpConfigModule {}
