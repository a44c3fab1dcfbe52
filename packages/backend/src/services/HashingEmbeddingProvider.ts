import { createHash } from "node:crypto";
import { tokenize } from "../search/scoring.js";
import { throwIfAborted } from "../utils/abort.js";
import type { EmbedOptions, EmbeddingProvider } from "./embeddingTypes.js";

/**
 * Local feature-hashing embedding. Each token (and each adjacent token pair)
 * lands in one bucket with a hash-derived sign; the result is L2-normalized.
 * Identical text always yields the identical vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashing";

  constructor(private readonly defaultDimension = 1536) {}

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    throwIfAborted(options.signal);
    return hashingEmbedding(text, options.dimension ?? this.defaultDimension);
  }
}

export function hashingEmbedding(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  const tokens = tokenize(text);
  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i += 1) {
    features.push(`${tokens[i]} ${tokens[i + 1]}`);
  }

  for (const feature of features) {
    const digest = createHash("sha256").update(feature).digest();
    const bucket = digest.readUInt32BE(0) % dimension;
    const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
    vector[bucket] = (vector[bucket] ?? 0) + sign;
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return vector;
  }
  return vector.map((value) => value / norm);
}
