import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_UPLOAD_MAX_BYTES } from './configuration';

@Injectable()
export class UploadConfigService {
  constructor(private readonly config: ConfigService) {}

  public get maxBytes(): number {
    return this.config.get<number>('upload.maxBytes', DEFAULT_UPLOAD_MAX_BYTES);
  }

  public get prefix(): string {
    return this.config.get<string>('upload.prefix', 'uploads');
  }
}
