import './instrument';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppConfigService } from '@libs/config';

import { AppModule, configureApp } from './app';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const config = app.get(AppConfigService);

  configureApp(app);
  app.enableShutdownHooks();

  await app.listen(config.port, config.host);

  Logger.log(
    `Listening at http://${config.host}:${config.port}/${config.globalPrefix}`,
    'BrandMediaAnalyzer',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(error, 'BrandMediaAnalyzer');
  process.exitCode = 1;
});
