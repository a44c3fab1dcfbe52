import type {
  CandidateStore,
  IndexStore,
  RelationshipStore,
  RetrievalStrategyName,
  ScoredChunk
} from "@chunkgraph/shared";
import type { AppConfig } from "../config.js";
import { NotFoundError, ValidationError } from "../errors/AppError.js";
import type { EmbeddingProvider } from "../services/embeddingTypes.js";
import { linkAbortSignals, raceAbort, throwIfAborted } from "../utils/abort.js";
import { queryTerms } from "./scoring.js";
import { FusionStrategy, GraphAugmentedStrategy, type RetrievalStrategy } from "./strategies.js";

export interface SearchEngineConfig {
  defaultStrategy: RetrievalStrategyName;
  vectorWeight: number;
  defaultTopK: number;
  maxTopK: number;
  candidateLimit: number;
  neighborDecay: number;
  timeoutMs: number;
}

export interface SearchInput {
  indexName: string;
  query: string;
  keywords?: string[];
  topK?: number;
  strategy?: RetrievalStrategyName;
}

export function searchEngineConfigFrom(config: AppConfig): SearchEngineConfig {
  return {
    defaultStrategy: config.SEARCH_STRATEGY,
    vectorWeight: config.SEARCH_VECTOR_WEIGHT,
    defaultTopK: config.SEARCH_DEFAULT_TOP_K,
    maxTopK: config.SEARCH_MAX_TOP_K,
    candidateLimit: config.SEARCH_CANDIDATE_LIMIT,
    neighborDecay: config.SEARCH_GRAPH_NEIGHBOR_DECAY,
    timeoutMs: config.SEARCH_TIMEOUT_MS
  };
}

export class HybridSearchEngine {
  private readonly strategies: Record<RetrievalStrategyName, RetrievalStrategy>;

  constructor(
    private readonly store: IndexStore & CandidateStore & RelationshipStore,
    embeddings: EmbeddingProvider,
    private readonly config: SearchEngineConfig
  ) {
    const deps = { store, embeddings, candidateLimit: config.candidateLimit };
    const hybrid = new FusionStrategy("hybrid", deps, config.vectorWeight);
    this.strategies = {
      vector: new FusionStrategy("vector", deps, 1),
      hybrid,
      graph: new GraphAugmentedStrategy(hybrid, store, config.neighborDecay)
    };
  }

  /**
   * Ranks chunks of one index. Aborting `signal` fails the call with
   * `CancelledError`; running past the configured deadline fails it with
   * `UpstreamTimeoutError`.
   */
  async search(input: SearchInput, options: { signal?: AbortSignal } = {}): Promise<ScoredChunk[]> {
    const topK = input.topK ?? this.config.defaultTopK;
    if (!Number.isInteger(topK) || topK <= 0 || topK > this.config.maxTopK) {
      throw new ValidationError(`top_k must be an integer between 1 and ${this.config.maxTopK}`, {
        top_k: topK
      });
    }
    if (input.query.trim().length === 0) {
      throw new ValidationError("query must not be blank");
    }

    const linked = linkAbortSignals([options.signal], this.config.timeoutMs);
    try {
      const index = await raceAbort(this.store.getIndex(input.indexName), linked.signal);
      throwIfAborted(linked.signal);
      if (!index) {
        throw new NotFoundError(`Index "${input.indexName}" not found`);
      }

      const strategy = this.strategies[input.strategy ?? this.config.defaultStrategy];
      return await strategy.retrieve({
        index,
        query: input.query,
        terms: queryTerms(input.query, input.keywords),
        topK,
        signal: linked.signal
      });
    } finally {
      linked.dispose();
    }
  }
}
