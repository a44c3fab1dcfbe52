import type { ChunkMetadata } from "./metadata.js";

export interface Chunk {
  docId: string;
  indexName: string;
  content: string;
  metadata: ChunkMetadata;
  embedding?: number[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ChunkPatch {
  content?: string;
  metadata?: ChunkMetadata;
  embedding?: number[];
  updatedAt: Date;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}
