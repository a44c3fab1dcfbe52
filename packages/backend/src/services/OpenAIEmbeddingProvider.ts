import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { UpstreamError } from "../errors/AppError.js";
import { EmbeddingRateLimiter } from "./EmbeddingRateLimiter.js";
import type {
  EmbedOptions,
  EmbeddingConfig,
  EmbeddingProvider,
  EmbeddingsClient
} from "./embeddingTypes.js";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  private readonly client: EmbeddingsClient;
  private readonly rateLimiter: EmbeddingRateLimiter;

  constructor(
    private readonly config: EmbeddingConfig,
    deps?: {
      client?: EmbeddingsClient;
      rateLimiter?: EmbeddingRateLimiter;
    }
  ) {
    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL ?? "https://api.openai.com/v1",
        // retries are owned by the rate limiter
        maxRetries: 0
      });

    this.rateLimiter =
      deps?.rateLimiter ??
      new EmbeddingRateLimiter({
        maxConcurrent: config.maxConcurrent ?? 4,
        maxRetries: config.maxRetries ?? 3,
        retryDelayMs: config.retryDelayMs ?? 500,
        requestsPerMinute: config.requestsPerMinute ?? 300,
        timeoutMs: config.timeoutMs ?? 30_000
      });
  }

  static fromConfig(config: AppConfig): OpenAIEmbeddingProvider {
    return new OpenAIEmbeddingProvider({
      apiKey: config.EMBEDDING_API_KEY,
      baseURL: config.EMBEDDING_BASE_URL,
      model: config.EMBEDDING_MODEL,
      sendDimensions: config.EMBEDDING_SEND_DIMENSIONS,
      maxConcurrent: config.EMBEDDING_MAX_CONCURRENT,
      maxRetries: config.EMBEDDING_MAX_RETRIES,
      retryDelayMs: config.EMBEDDING_RETRY_DELAY_MS,
      requestsPerMinute: config.EMBEDDING_REQUESTS_PER_MINUTE,
      timeoutMs: config.EMBEDDING_TIMEOUT_MS
    });
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const dimension = options.dimension;
    const response = await this.rateLimiter.run(
      (signal) =>
        this.client.embeddings.create(
          {
            model: this.config.model,
            input: text,
            ...(this.config.sendDimensions && dimension !== undefined ? { dimensions: dimension } : {})
          },
          { signal }
        ),
      options.signal
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new UpstreamError("Embedding response contained no vector");
    }
    return embedding;
  }
}
