import type { Chunk } from "@chunkgraph/shared";

export interface EmbeddingRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface EmbedOptions {
  /** Requested vector length; providers that cannot honour it return their native length. */
  dimension?: number;
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface EmbeddingConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  sendDimensions?: boolean;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

/** The subset of the `openai` client the embedding provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface AnswerRequest {
  query: string;
  chunks: Chunk[];
}

export interface AnswerSynthesizer {
  synthesize(request: AnswerRequest, options?: { signal?: AbortSignal }): Promise<string>;
}

/** Narrow port over chat completions so tests can stand in for the SDK. */
export interface ChatCompletionClient {
  complete(
    request: {
      model: string;
      temperature: number;
      maxTokens: number;
      systemPrompt: string;
      userPrompt: string;
    },
    signal: AbortSignal
  ): Promise<string | null>;
}
