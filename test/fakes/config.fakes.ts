import { ConfigService } from '@nestjs/config';

import {
  AppConfigService,
  GcpConfigService,
  SessionConfigService,
  UploadConfigService,
} from '@libs/config';

export const TEST_BUCKET = 'creator-videos';
export const TEST_PROJECT = 'demo-project';

export interface TestConfigOverrides {
  bucketName?: string;
  projectId?: string;
  maxBytes?: number;
}

/**
 * Builds the typed config services over an in-memory `ConfigService`.
 */
export function createTestConfig(overrides: TestConfigOverrides = {}) {
  const config = new ConfigService({
    app: {
      env: 'test',
      host: '127.0.0.1',
      port: 0,
      promptTemplatePath: 'prompts/branding_prompt.md',
    },
    gcp: {
      bucketName:
        'bucketName' in overrides ? overrides.bucketName : TEST_BUCKET,
      projectId: 'projectId' in overrides ? overrides.projectId : TEST_PROJECT,
      location: 'us-central1',
      model: 'gemini-test',
      temperature: 0,
    },
    upload: {
      maxBytes: overrides.maxBytes ?? 200 * 1024 * 1024,
      prefix: 'uploads',
    },
    session: { ttlMs: 60_000 },
  });

  return {
    config,
    app: new AppConfigService(config),
    gcp: new GcpConfigService(config),
    upload: new UploadConfigService(config),
    session: new SessionConfigService(config),
  };
}
