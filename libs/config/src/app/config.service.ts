import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class AppConfigService {
  constructor(private readonly config: ConfigService) {}

  public get env(): string {
    return this.config.getOrThrow<string>('app.env');
  }

  public get isProd(): boolean {
    return this.env === 'production';
  }

  public get host(): string {
    return this.config.getOrThrow<string>('app.host');
  }

  public get port(): number {
    return this.config.getOrThrow<number>('app.port');
  }

  public get globalPrefix(): string {
    return this.config.get<string>('app.globalPrefix', 'api/v1');
  }

  public get promptTemplatePath(): string {
    return this.config.get<string>(
      'app.promptTemplatePath',
      'prompts/branding_prompt.md',
    );
  }

  /**
   * Directory holding the built single-page UI (`npm run build:web`).
   */
  public get webDistPath(): string {
    return this.config.get<string>('app.webDistPath', 'apps/web/dist');
  }
}
