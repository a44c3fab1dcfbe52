import type { Chunk, ChunkPatch } from "./types/document.js";
import type {
  IndexAnalytics,
  RelationshipEdge,
  RelationshipKey,
  RelationshipUpsertResult
} from "./types/graph.js";
import type { RagIndex, RagIndexPatch } from "./types/partition.js";

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export interface IndexStore {
  /** Resolves to null when an index with the same name already exists. */
  createIndex(index: RagIndex): Promise<RagIndex | null>;
  getIndex(name: string): Promise<RagIndex | null>;
  listIndexes(page?: PageRequest): Promise<Page<RagIndex>>;
  updateIndex(name: string, patch: RagIndexPatch, updatedAt: Date): Promise<RagIndex | null>;
  /** Removes the index with all of its chunks and edges; false when absent. */
  deleteIndex(name: string): Promise<boolean>;
}

export interface ChunkRecordStore {
  /** Resolves to null when the owning index no longer exists. */
  insertChunk(chunk: Chunk): Promise<Chunk | null>;
  getChunk(indexName: string, docId: string): Promise<Chunk | null>;
  /** Resolves to null when the index does not exist. */
  listChunks(indexName: string): Promise<Chunk[] | null>;
  updateChunk(indexName: string, docId: string, patch: ChunkPatch): Promise<Chunk | null>;
  /** Removes the chunk and every edge touching it; false when absent. */
  deleteChunk(indexName: string, docId: string): Promise<boolean>;
}

export interface CandidateQuery {
  embedding?: number[];
  terms: string[];
  limit: number;
}

export interface CandidateStore {
  /**
   * Returns a superset of the best chunks for the query, all owned by
   * `indexName`. Resolves to null when the index does not exist.
   */
  findCandidates(indexName: string, query: CandidateQuery): Promise<Chunk[] | null>;
  getChunksByIds(indexName: string, docIds: string[]): Promise<Chunk[]>;
}

export interface RelationshipStore {
  /** Resolves to null when the index or an endpoint is missing. */
  upsertRelationship(
    key: RelationshipKey,
    reason: string,
    now: Date
  ): Promise<RelationshipUpsertResult | null>;
  deleteRelationship(key: RelationshipKey): Promise<boolean>;
  getRelationshipsForChunks(indexName: string, docIds: string[]): Promise<RelationshipEdge[]>;
  /** Resolves to null when the index does not exist. */
  getAnalytics(indexName: string, sampleSize: number): Promise<IndexAnalytics | null>;
}

export interface AbstractRagStore
  extends IndexStore,
    ChunkRecordStore,
    CandidateStore,
    RelationshipStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
}
