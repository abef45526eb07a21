import { CanActivate, Injectable } from '@nestjs/common';

import { GcpConfigService } from '@libs/config';

/**
 * Answers 503 with the missing variable names until the bucket and project
 * are configured.
 */
@Injectable()
export class GcpConfiguredGuard implements CanActivate {
  constructor(private readonly gcpConfig: GcpConfigService) {}

  public canActivate(): boolean {
    this.gcpConfig.requireTarget();
    return true;
  }
}
