import {
  ModelTokenUsage,
  MultimodalModelClient,
  StructuredGenerationRequest,
  StructuredGenerationResult,
} from '../../src/analysis';

type Responder = (request: StructuredGenerationRequest) => Promise<unknown>;

/**
 * Scripted stand-in for the Gemini client.
 */
export class FakeModelClient implements MultimodalModelClient {
  public readonly modelName = 'gemini-test';
  public readonly requests: StructuredGenerationRequest[] = [];
  public usage: ModelTokenUsage | null = null;
  private responder: Responder = async () => ({});

  public respondWith(payload: unknown): this {
    this.responder = async () => payload;
    return this;
  }

  /**
   * Holds the answer until `gate` settles, so a test can act on the session
   * while the call is in flight.
   */
  public respondAfter(gate: Promise<unknown>, payload: unknown): this {
    this.responder = async () => {
      await gate;
      return payload;
    };
    return this;
  }

  public failAfter(gate: Promise<unknown>, error: unknown): this {
    this.responder = async () => {
      await gate;
      throw error;
    };
    return this;
  }

  public failWith(error: unknown): this {
    this.responder = async () => {
      throw error;
    };
    return this;
  }

  public async generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<StructuredGenerationResult> {
    this.requests.push(request);
    return { payload: await this.responder(request), usage: this.usage };
  }
}
