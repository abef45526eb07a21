import { Injectable } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';

import { AppConfigService } from '@libs/config';
import { AnalysisError, AnalyzerError } from '@libs/exceptions';

type CaptureContext = Parameters<typeof Sentry.captureMessage>[1];

/**
 * Tags that let analyzer failures be grouped by kind (and, for analysis
 * failures, by reason) in the Sentry UI.
 */
export function analyzerErrorTags(error: unknown): Record<string, string> {
  if (!(error instanceof AnalyzerError)) {
    return {};
  }
  if (error instanceof AnalysisError) {
    return { error_kind: error.kind, analysis_reason: error.reason };
  }
  return { error_kind: error.kind };
}

@Injectable()
export class SentryClientService {
  constructor(private readonly config: AppConfigService) {}

  /**
   * Reports a failure in production, tagged with its analyzer kind.
   *
   * @param extra - Context such as the bucket, the locator or the failing step.
   */
  public sendException(error: unknown, extra?: Record<string, unknown>) {
    if (!this.config.isProd) {
      return;
    }
    Sentry.captureException(error, {
      extra,
      tags: analyzerErrorTags(error),
    });
  }

  public sendMessage(message: string, context?: CaptureContext) {
    if (this.config.isProd) {
      Sentry.captureMessage(message, context);
    }
  }
}
