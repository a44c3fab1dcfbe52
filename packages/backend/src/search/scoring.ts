import type { Chunk, ScoredChunk } from "@chunkgraph/shared";
import { flattenMetadataText } from "../utils/metadata.js";

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "how", "in", "is", "it",
  "of", "on", "or", "that", "the", "this", "to", "was", "what", "when", "where", "which",
  "who", "why", "with"
]);

const METADATA_ONLY_WEIGHT = 0.5;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Search terms: the caller's keywords when any are given, otherwise the query
 * tokens without stop-words. Lowercased and de-duplicated in first-seen order.
 */
export function queryTerms(query: string, keywords?: string[]): string[] {
  const explicit = (keywords ?? [])
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);
  if (explicit.length > 0) {
    return [...new Set(explicit)];
  }
  return [...new Set(tokenize(query).filter((token) => !STOP_WORDS.has(token)))];
}

/** Undefined when either side is missing, lengths differ or a norm is zero. */
export function cosineSimilarity(a: number[] | undefined, b: number[] | undefined): number | undefined {
  if (!a || !b || a.length !== b.length || a.length === 0) {
    return undefined;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return undefined;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function keywordScore(chunk: Chunk, terms: string[]): number {
  if (terms.length === 0) {
    return 0;
  }
  const content = chunk.content.toLowerCase();
  const contentTokens = new Set(tokenize(chunk.content));
  const metadataLeaves = flattenMetadataText(chunk.metadata);

  let total = 0;
  for (const term of terms) {
    if (contentTokens.has(term) || content.includes(term)) {
      total += 1;
    } else if (metadataLeaves.some((leaf) => leaf.includes(term))) {
      total += METADATA_ONLY_WEIGHT;
    }
  }
  return total / terms.length;
}

/**
 * Min-max normalization over the candidate set. When every present value is
 * equal the result is 1 for a positive value and 0 otherwise; absent is 0.
 */
export function normalizeScores(values: Array<number | undefined>): number[] {
  const present = values.filter((value): value is number => value !== undefined);
  if (present.length === 0) {
    return values.map(() => 0);
  }
  const min = Math.min(...present);
  const max = Math.max(...present);
  const range = max - min;

  return values.map((value) => {
    if (value === undefined) {
      return 0;
    }
    if (range === 0) {
      return value > 0 ? 1 : 0;
    }
    return (value - min) / range;
  });
}

export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  const recency = b.chunk.updatedAt.getTime() - a.chunk.updatedAt.getTime();
  if (recency !== 0) {
    return recency;
  }
  return a.chunk.docId < b.chunk.docId ? -1 : a.chunk.docId > b.chunk.docId ? 1 : 0;
}

export interface RankOptions {
  queryEmbedding?: number[];
  terms: string[];
  /** Weight of the vector signal; the keyword signal gets `1 - vectorWeight`. */
  vectorWeight: number;
}

export function rankCandidates(candidates: Chunk[], options: RankOptions): ScoredChunk[] {
  const vector = normalizeScores(
    candidates.map((chunk) => cosineSimilarity(options.queryEmbedding, chunk.embedding))
  );
  const keyword =
    options.vectorWeight >= 1
      ? candidates.map(() => 0)
      : normalizeScores(candidates.map((chunk) => keywordScore(chunk, options.terms)));

  return candidates
    .map((chunk, position) => ({
      chunk,
      score:
        options.vectorWeight * (vector[position] ?? 0) +
        (1 - options.vectorWeight) * (keyword[position] ?? 0)
    }))
    .sort(compareScoredChunks);
}
