import type { ChunkMetadata } from "./metadata.js";

export type ApiErrorCode =
  | "CONFLICT"
  | "NOT_FOUND"
  | "DIMENSION_MISMATCH"
  | "VALIDATION_ERROR"
  | "UPSTREAM_TIMEOUT"
  | "UPSTREAM_ERROR"
  | "PARTIAL_FAILURE"
  | "CANCELLED"
  | "STORE_UNAVAILABLE"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: string;
  code: ApiErrorCode;
  details?: unknown;
}

export interface CreateIndexRequest {
  name: string;
  description?: string | null;
  dimension?: number;
}

export interface UpdateIndexRequest {
  description?: string | null;
}

export interface IndexResponse {
  name: string;
  dimension: number;
  description: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateDocumentRequest {
  content: string;
  metadata?: ChunkMetadata;
  embedding?: number[];
}

export interface UpdateDocumentRequest {
  content?: string;
  metadata?: ChunkMetadata;
  embedding?: number[];
}

export interface DocumentResponse {
  doc_id: string;
  index_name: string;
  content: string;
  metadata: ChunkMetadata;
  embedding: number[] | null;
  created_at: string;
  updated_at: string;
}

export interface BatchCreateDocumentsRequest {
  documents: CreateDocumentRequest[];
}

/**
 * Per-item result of a bulk call. `status: "created"` means the item was
 * applied; a relationship that already existed is applied too, and its
 * `result.created` is false.
 */
export type BatchItemOutcome<T> =
  | { index: number; status: "created"; result: T }
  | { index: number; status: "failed"; error: { code: ApiErrorCode; message: string } };

export interface BatchCreateDocumentsResponse {
  created: number;
  failed: number;
  results: BatchItemOutcome<DocumentResponse>[];
}

export interface DeclareRelationshipRequest {
  source_doc_id: string;
  target_doc_id: string;
  rel_type: string;
  reason?: string;
}

export interface RelationshipResponse {
  index_name: string;
  source_doc_id: string;
  target_doc_id: string;
  rel_type: string;
  reason: string;
  created_at: string;
  updated_at: string;
}

export interface DeclareRelationshipResponse {
  created: boolean;
  relationship: RelationshipResponse;
}

export interface BatchDeclareRelationshipsResponse {
  /** Items applied, new and reconfirmed edges alike. */
  created: number;
  failed: number;
  results: BatchItemOutcome<DeclareRelationshipResponse>[];
}

export interface DocumentRelationshipsResponse {
  doc_id: string;
  outgoing: RelationshipResponse[];
  incoming: RelationshipResponse[];
}

export interface AnalyticsResponse {
  index_name: string;
  chunk_count: number;
  edge_count: number;
  rel_type_distribution: Record<string, number>;
  sample_edges: RelationshipResponse[];
}

export type RetrievalStrategyName = "vector" | "hybrid" | "graph";

export interface SearchRequest {
  index_name: string;
  query: string;
  keywords?: string[];
  top_k?: number;
  strategy?: RetrievalStrategyName;
}

export interface SearchChunkResponse {
  doc_id: string;
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface SearchResponse {
  chunks: SearchChunkResponse[];
  answer?: string;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    neo4j: ServiceConnectionStatus;
    embedding: ServiceConnectionStatus;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
