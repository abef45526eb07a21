import { Injectable, Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';

import { GcpConfigService } from '@libs/config';
import { AnalysisError } from '@libs/exceptions';

import {
  MultimodalModelClient,
  StructuredGenerationRequest,
  StructuredGenerationResult,
} from '../interfaces';

/**
 * Gemini on Vertex AI. The SDK client is built on first use so the app can
 * start (and report a configuration error) without GCP credentials.
 */
@Injectable()
export class GeminiClientService implements MultimodalModelClient {
  private readonly logger = new Logger(GeminiClientService.name);
  private client: GoogleGenAI | null = null;

  constructor(private readonly gcpConfig: GcpConfigService) {}

  public get modelName(): string {
    return this.gcpConfig.model;
  }

  private getClient(): GoogleGenAI {
    if (!this.client) {
      const { projectId } = this.gcpConfig.requireTarget();
      this.logger.log(
        `Creating Vertex AI client for ${projectId} in ${this.gcpConfig.location}`,
      );
      this.client = new GoogleGenAI({
        vertexai: true,
        project: projectId,
        location: this.gcpConfig.location,
      });
    }
    return this.client;
  }

  public async generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<StructuredGenerationResult> {
    const response = await this.getClient().models.generateContent({
      model: this.modelName,
      contents: request.contents,
      config: {
        responseMimeType: 'application/json',
        responseSchema: request.responseSchema,
        temperature: request.temperature,
      },
    });

    const text = response.text;
    if (!text) {
      const blockReason = response.promptFeedback?.blockReason;
      throw new AnalysisError(
        blockReason
          ? `Model blocked the request: ${blockReason}`
          : 'Model returned an empty response',
        'endpoint',
      );
    }

    const usage = response.usageMetadata;
    return {
      payload: text,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount ?? 0,
            completionTokens: usage.candidatesTokenCount ?? 0,
            totalTokens: usage.totalTokenCount ?? 0,
          }
        : null,
    };
  }
}
