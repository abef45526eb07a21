import { Injectable, OnModuleInit } from '@nestjs/common';
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export type CallStatus = 'success' | 'error';

@Injectable()
export class MetricsService implements OnModuleInit {
  private readonly registry = new Registry();
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestTotal: Counter<string>;
  private readonly httpRequestErrors: Counter<string>;
  private readonly uploadsTotal: Counter<string>;
  private readonly uploadBytes: Histogram<string>;
  private readonly uploadDuration: Histogram<string>;
  private readonly uploadsRejected: Counter<string>;
  private readonly llmCallsTotal: Counter<string>;
  private readonly llmCallDuration: Histogram<string>;
  private readonly llmCallErrors: Counter<string>;
  private readonly llmPromptTokens: Counter<string>;
  private readonly llmCompletionTokens: Counter<string>;
  private readonly llmTotalTokens: Counter<string>;
  private readonly reportsGenerated: Counter<string>;

  constructor() {
    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.1, 0.3, 0.5, 1, 3, 10, 30, 60, 120],
      registers: [this.registry],
    });

    this.httpRequestTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.httpRequestErrors = new Counter({
      name: 'http_request_errors_total',
      help: 'Total number of HTTP request errors',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.uploadsTotal = new Counter({
      name: 'video_uploads_total',
      help: 'Total number of video uploads to object storage',
      labelNames: ['status'],
      registers: [this.registry],
    });

    this.uploadBytes = new Histogram({
      name: 'video_upload_bytes',
      help: 'Size of uploaded videos in bytes',
      buckets: [1e6, 10e6, 50e6, 100e6, 150e6, 200e6],
      registers: [this.registry],
    });

    this.uploadDuration = new Histogram({
      name: 'video_upload_duration_seconds',
      help: 'Duration of object storage writes in seconds',
      labelNames: ['status'],
      buckets: [0.5, 1, 3, 10, 30, 60, 120],
      registers: [this.registry],
    });

    this.uploadsRejected = new Counter({
      name: 'video_uploads_rejected_total',
      help: 'Uploads refused before reaching object storage',
      labelNames: ['reason'],
      registers: [this.registry],
    });

    this.llmCallsTotal = new Counter({
      name: 'llm_calls_total',
      help: 'Total number of LLM API calls',
      labelNames: ['model', 'service'],
      registers: [this.registry],
    });

    this.llmCallDuration = new Histogram({
      name: 'llm_call_duration_seconds',
      help: 'Duration of LLM API calls in seconds',
      labelNames: ['model', 'service', 'status'],
      buckets: [1, 5, 10, 30, 60, 120, 300],
      registers: [this.registry],
    });

    this.llmCallErrors = new Counter({
      name: 'llm_call_errors_total',
      help: 'Total number of LLM API call errors',
      labelNames: ['model', 'service', 'error_type'],
      registers: [this.registry],
    });

    this.llmPromptTokens = new Counter({
      name: 'llm_prompt_tokens_total',
      help: 'Total number of prompt tokens (video included) sent to the model',
      labelNames: ['model', 'service'],
      registers: [this.registry],
    });

    this.llmCompletionTokens = new Counter({
      name: 'llm_completion_tokens_total',
      help: 'Total number of tokens the model answered with',
      labelNames: ['model', 'service'],
      registers: [this.registry],
    });

    this.llmTotalTokens = new Counter({
      name: 'llm_total_tokens_total',
      help: 'Total number of tokens used in LLM requests',
      labelNames: ['model', 'service'],
      registers: [this.registry],
    });

    this.reportsGenerated = new Counter({
      name: 'pdf_reports_generated_total',
      help: 'Total number of PDF reports rendered',
      registers: [this.registry],
    });
  }

  onModuleInit(): void {
    // Process metrics (CPU, memory, event loop lag)
    collectDefaultMetrics({ register: this.registry });
  }

  /**
   * Record HTTP request metrics
   */
  recordHttpRequest(
    method: string,
    route: string,
    statusCode: number,
    duration: number,
  ): void {
    const labels = { method, route, status: String(statusCode) };
    this.httpRequestDuration.observe(labels, duration);
    this.httpRequestTotal.inc(labels);

    if (statusCode >= 400) {
      this.httpRequestErrors.inc(labels);
    }
  }

  /**
   * Record an object storage write
   */
  recordUpload(sizeBytes: number, duration: number, status: CallStatus): void {
    this.uploadsTotal.inc({ status });
    this.uploadDuration.observe({ status }, duration);

    if (status === 'success') {
      this.uploadBytes.observe(sizeBytes);
    }
  }

  /**
   * Record an upload refused by the size or type precondition
   */
  recordUploadRejected(reason: string): void {
    this.uploadsRejected.inc({ reason });
  }

  /**
   * Record LLM call
   */
  recordLLMCall(model: string, service: string): void {
    this.llmCallsTotal.inc({ model, service });
  }

  /**
   * Record LLM call duration
   */
  recordLLMCallDuration(
    model: string,
    service: string,
    duration: number,
    status: CallStatus = 'success',
  ): void {
    this.llmCallDuration.observe({ model, service, status }, duration);
  }

  /**
   * Record LLM call error
   */
  recordLLMError(model: string, service: string, errorType: string): void {
    this.llmCallErrors.inc({ model, service, error_type: errorType });
  }

  /**
   * Record LLM token usage
   */
  recordLLMTokenUsage(
    model: string,
    service: string,
    promptTokens: number,
    completionTokens: number,
    totalTokens: number,
  ): void {
    const labels = { model, service };
    this.llmPromptTokens.inc(labels, promptTokens);
    this.llmCompletionTokens.inc(labels, completionTokens);
    this.llmTotalTokens.inc(labels, totalTokens);
  }

  recordReportGenerated(): void {
    this.reportsGenerated.inc();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
