import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ConfigurationError } from '@libs/exceptions';

export interface GcpTarget {
  bucketName: string;
  projectId: string;
}

@Injectable()
export class GcpConfigService {
  constructor(private readonly config: ConfigService) {}

  public get bucketName(): string | undefined {
    return this.config.get<string>('gcp.bucketName') || undefined;
  }

  public get projectId(): string | undefined {
    return this.config.get<string>('gcp.projectId') || undefined;
  }

  public get location(): string {
    return this.config.get<string>('gcp.location', 'us-central1');
  }

  public get model(): string {
    return this.config.get<string>('gcp.model', 'gemini-2.0-flash-001');
  }

  public get temperature(): number {
    return this.config.get<number>('gcp.temperature', 0.2);
  }

  /**
   * Returns the bucket and project, or throws a `ConfigurationError` naming
   * every missing variable.
   */
  public requireTarget(): GcpTarget {
    const bucketName = this.bucketName;
    const projectId = this.projectId;

    if (bucketName && projectId) {
      return { bucketName, projectId };
    }

    const missing = [
      bucketName ? null : 'GCP_BUCKET_NAME',
      projectId ? null : 'GCP_PROJECT',
    ].filter((name): name is string => name !== null);

    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing,
    );
  }
}
