import type { Content, Schema } from '@google/genai';

export interface StructuredGenerationRequest {
  contents: Content[];
  responseSchema: Schema;
  temperature: number;
}

export interface ModelTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * `payload` is either the raw JSON text or an already parsed object.
 * `usage` is null when the endpoint reports no token counts.
 */
export interface StructuredGenerationResult {
  payload: unknown;
  usage: ModelTokenUsage | null;
}

/**
 * A hosted model that answers a multimodal prompt with JSON constrained to a
 * schema.
 */
export interface MultimodalModelClient {
  readonly modelName: string;
  generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<StructuredGenerationResult>;
}
