import type {
  CandidateStore,
  Chunk,
  RagIndex,
  RelationshipStore,
  RetrievalStrategyName,
  ScoredChunk
} from "@chunkgraph/shared";
import { DimensionMismatchError, NotFoundError } from "../errors/AppError.js";
import type { EmbeddingProvider } from "../services/embeddingTypes.js";
import { raceAbort, throwIfAborted } from "../utils/abort.js";
import { compareScoredChunks, rankCandidates } from "./scoring.js";

export interface RetrievalContext {
  index: RagIndex;
  query: string;
  terms: string[];
  topK: number;
  signal: AbortSignal;
}

export interface RetrievalStrategy {
  readonly name: RetrievalStrategyName;
  /** Ranked chunks of `context.index`, at most `context.topK` of them. */
  retrieve(context: RetrievalContext): Promise<ScoredChunk[]>;
}

export interface StrategyDeps {
  store: CandidateStore & RelationshipStore;
  embeddings: EmbeddingProvider;
  candidateLimit: number;
}

/**
 * Candidate fetch + weighted fusion. The vector and hybrid strategies are the
 * same class configured with a different `vectorWeight` (1 for pure vector).
 */
export class FusionStrategy implements RetrievalStrategy {
  constructor(
    readonly name: RetrievalStrategyName,
    private readonly deps: StrategyDeps,
    readonly vectorWeight: number
  ) {}

  async retrieve(context: RetrievalContext): Promise<ScoredChunk[]> {
    const ranked = await this.rankAll(context);
    return ranked.slice(0, context.topK);
  }

  /** Every candidate of the index, ranked; not cut to topK. */
  async rankAll(context: RetrievalContext): Promise<ScoredChunk[]> {
    const { index, signal } = context;
    const queryEmbedding = await raceAbort(
      this.deps.embeddings.embed(context.query, { dimension: index.dimension, signal }),
      signal
    );
    if (queryEmbedding.length !== index.dimension) {
      throw new DimensionMismatchError(index.dimension, queryEmbedding.length);
    }

    const candidates = await raceAbort(
      this.deps.store.findCandidates(index.name, {
        embedding: queryEmbedding,
        terms: context.terms,
        limit: this.deps.candidateLimit
      }),
      signal
    );
    throwIfAborted(signal);
    if (!candidates) {
      throw new NotFoundError(`Index "${index.name}" not found`);
    }

    return rankCandidates(candidates, {
      queryEmbedding,
      terms: context.terms,
      vectorWeight: this.vectorWeight
    });
  }
}

/**
 * Hybrid ranking, then chunks linked to the top hits by a relationship edge
 * join with `parentScore * neighborDecay` and the union is re-ranked.
 */
export class GraphAugmentedStrategy implements RetrievalStrategy {
  readonly name = "graph";

  constructor(
    private readonly hybrid: FusionStrategy,
    private readonly store: CandidateStore & RelationshipStore,
    private readonly neighborDecay: number
  ) {}

  async retrieve(context: RetrievalContext): Promise<ScoredChunk[]> {
    const { index, signal } = context;
    const ranked = await this.hybrid.rankAll(context);
    const top = ranked.slice(0, context.topK);
    if (top.length === 0) {
      return top;
    }

    const topScores = new Map(top.map((hit) => [hit.chunk.docId, hit.score]));
    const edges = await raceAbort(
      this.store.getRelationshipsForChunks(index.name, [...topScores.keys()]),
      signal
    );
    throwIfAborted(signal);

    const neighborScores = new Map<string, number>();
    const offer = (docId: string, parentScore: number | undefined): void => {
      if (parentScore === undefined) {
        return;
      }
      const score = parentScore * this.neighborDecay;
      neighborScores.set(docId, Math.max(neighborScores.get(docId) ?? 0, score));
    };
    for (const edge of edges) {
      offer(edge.targetDocId, topScores.get(edge.sourceDocId));
      offer(edge.sourceDocId, topScores.get(edge.targetDocId));
    }

    const merged = new Map<string, ScoredChunk>(ranked.map((hit) => [hit.chunk.docId, hit]));
    const missing = [...neighborScores.keys()].filter((docId) => !merged.has(docId));
    const fetched: Chunk[] =
      missing.length > 0
        ? await raceAbort(this.store.getChunksByIds(index.name, missing), signal)
        : [];
    throwIfAborted(signal);
    for (const chunk of fetched) {
      merged.set(chunk.docId, { chunk, score: 0 });
    }

    for (const [docId, score] of neighborScores) {
      const existing = merged.get(docId);
      if (existing && score > existing.score) {
        merged.set(docId, { chunk: existing.chunk, score });
      }
    }

    return [...merged.values()].sort(compareScoredChunks).slice(0, context.topK);
  }
}
