import { Logger, ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { AppConfigService } from '@libs/config';
import { TransformInterceptor } from '@libs/interceptors';

/**
 * HTTP wiring shared by the server and the e2e specs.
 */
export function configureApp(
  app: NestExpressApplication,
): NestExpressApplication {
  const config = app.get(AppConfigService);

  app.setGlobalPrefix(config.globalPrefix, {
    exclude: ['/metrics', '/health'],
  });

  app.useGlobalInterceptors(new TransformInterceptor());

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidUnknownValues: true,
      stopAtFirstError: true,
    }),
  );

  app.enableCors({ exposedHeaders: ['Content-Disposition'] });

  const webDist = resolve(config.webDistPath);
  if (existsSync(webDist)) {
    app.useStaticAssets(webDist);
  } else {
    Logger.warn(
      `No web build at ${webDist}; serving the API only`,
      'BrandMediaAnalyzer',
    );
  }

  return app;
}
