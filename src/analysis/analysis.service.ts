import { Inject, Injectable, Logger } from '@nestjs/common';

import { GcpConfigService } from '@libs/config';
import { AnalysisValidationError } from '@libs/exceptions';
import { SentryClientService } from '@libs/sentry';

import { MetricsService } from '../metrics';
import { ANALYSIS_METRICS_SERVICE, MODEL_CLIENT } from './analysis.constants';
import {
  BrandAnalysis,
  MultimodalModelClient,
  StructuredGenerationResult,
} from './interfaces';
import { PROMPT_TEMPLATE } from './prompt/prompt-template.provider';
import { BRAND_ANALYSIS_SCHEMA } from './schemas/brand-analysis.schema';
import {
  buildAnalysisContents,
  parseAnalysisPayload,
  toAnalysisError,
  validateBrandAnalysis,
} from './utils/analysis-payload.utils';

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(MODEL_CLIENT) private readonly modelClient: MultimodalModelClient,
    @Inject(PROMPT_TEMPLATE) private readonly promptTemplate: string,
    private readonly gcpConfig: GcpConfigService,
    private readonly sentry: SentryClientService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Asks the model for a brand compatibility analysis of a stored video.
   *
   * A single attempt is made; any failure surfaces immediately.
   *
   * @param {string} locator - `gs://bucket/key` of the uploaded video.
   *
   * @throws {AnalysisError} when the endpoint fails or the answer does not parse.
   * @throws {AnalysisValidationError} when the answer misses schema fields.
   */
  public async analyze(locator: string): Promise<BrandAnalysis> {
    const model = this.modelClient.modelName;
    this.logger.log(`Analyzing ${locator} with ${model}`);

    const startTime = Date.now();
    this.metricsService.recordLLMCall(model, ANALYSIS_METRICS_SERVICE);

    let result: StructuredGenerationResult;
    try {
      result = await this.modelClient.generateStructured({
        contents: buildAnalysisContents(this.promptTemplate, locator),
        responseSchema: BRAND_ANALYSIS_SCHEMA,
        temperature: this.gcpConfig.temperature,
      });
    } catch (error) {
      const failure = toAnalysisError(error);
      this.recordFailure(model, startTime, failure.reason);
      this.logger.error(`Model call failed (${failure.reason}): ${failure.message}`);
      this.sentry.sendException(error, { locator, reason: failure.reason });
      throw failure;
    }

    if (result.usage) {
      this.metricsService.recordLLMTokenUsage(
        model,
        ANALYSIS_METRICS_SERVICE,
        result.usage.promptTokens,
        result.usage.completionTokens,
        result.usage.totalTokens,
      );
    }

    try {
      const analysis = await validateBrandAnalysis(
        parseAnalysisPayload(result.payload),
      );
      this.metricsService.recordLLMCallDuration(
        model,
        ANALYSIS_METRICS_SERVICE,
        (Date.now() - startTime) / 1000,
        'success',
      );
      return analysis;
    } catch (error) {
      const failure = toAnalysisError(error);
      this.recordFailure(model, startTime, failure.reason);
      this.logger.warn(`Unusable model response: ${failure.message}`);

      if (failure instanceof AnalysisValidationError) {
        this.sentry.sendMessage('Model response failed schema validation', {
          level: 'warning',
          extra: { locator, issues: failure.issues },
        });
      }
      throw failure;
    }
  }

  private recordFailure(model: string, startTime: number, reason: string) {
    this.metricsService.recordLLMCallDuration(
      model,
      ANALYSIS_METRICS_SERVICE,
      (Date.now() - startTime) / 1000,
      'error',
    );
    this.metricsService.recordLLMError(model, ANALYSIS_METRICS_SERVICE, reason);
  }
}
