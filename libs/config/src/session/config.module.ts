import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { SessionConfigService } from './config.service';
import sessionConfiguration from './configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [sessionConfiguration],
    }),
  ],
  providers: [SessionConfigService],
  exports: [SessionConfigService],
})
export class SessionConfigModule {}
