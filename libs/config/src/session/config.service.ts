import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class SessionConfigService {
  constructor(private readonly config: ConfigService) {}

  /**
   * Idle lifetime of a session's upload and analysis, in milliseconds.
   */
  public get ttlMs(): number {
    return this.config.get<number>('session.ttlMs', 7_200_000);
  }
}
