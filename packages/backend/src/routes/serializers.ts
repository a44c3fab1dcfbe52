import type { Response } from "express";
import type {
  AnalyticsResponse,
  ApiErrorResponse,
  BatchItemOutcome,
  Chunk,
  DocumentResponse,
  IndexAnalytics,
  IndexResponse,
  RagIndex,
  RelationshipEdge,
  RelationshipResponse,
  ScoredChunk,
  SearchChunkResponse
} from "@chunkgraph/shared";
import { PartialFailureError } from "../errors/AppError.js";

interface BatchResponseBody<R> {
  created: number;
  failed: number;
  results: BatchItemOutcome<R>[];
}

export function toIndexResponse(index: RagIndex): IndexResponse {
  return {
    name: index.name,
    dimension: index.dimension,
    description: index.description,
    created_at: index.createdAt.toISOString(),
    updated_at: index.updatedAt.toISOString()
  };
}

export function toDocumentResponse(chunk: Chunk): DocumentResponse {
  return {
    doc_id: chunk.docId,
    index_name: chunk.indexName,
    content: chunk.content,
    metadata: chunk.metadata,
    embedding: chunk.embedding ?? null,
    created_at: chunk.createdAt.toISOString(),
    updated_at: chunk.updatedAt.toISOString()
  };
}

export function toRelationshipResponse(edge: RelationshipEdge): RelationshipResponse {
  return {
    index_name: edge.indexName,
    source_doc_id: edge.sourceDocId,
    target_doc_id: edge.targetDocId,
    rel_type: edge.relType,
    reason: edge.reason,
    created_at: edge.createdAt.toISOString(),
    updated_at: edge.updatedAt.toISOString()
  };
}

export function toAnalyticsResponse(analytics: IndexAnalytics): AnalyticsResponse {
  return {
    index_name: analytics.indexName,
    chunk_count: analytics.chunkCount,
    edge_count: analytics.edgeCount,
    rel_type_distribution: analytics.relTypeDistribution,
    sample_edges: analytics.sampleEdges.map(toRelationshipResponse)
  };
}

export function toSearchChunkResponse(hit: ScoredChunk): SearchChunkResponse {
  return {
    doc_id: hit.chunk.docId,
    content: hit.chunk.content,
    metadata: hit.chunk.metadata,
    score: hit.score
  };
}

export function setPageHeaders(res: Response, total: number, page: number, pageSize: number): void {
  res.setHeader("x-total-count", String(total));
  res.setHeader("x-page", String(page));
  res.setHeader("x-page-size", String(pageSize));
}

/**
 * Sends per-item batch outcomes: 201 when every item succeeded, otherwise 207
 * with the partial-failure error fields alongside the results.
 */
export function sendBatchOutcomes<T, R>(
  res: Response,
  outcomes: BatchItemOutcome<T>[],
  serialize: (result: T) => R
): void {
  const results = outcomes.map((outcome): BatchItemOutcome<R> =>
    outcome.status === "created"
      ? { index: outcome.index, status: "created", result: serialize(outcome.result) }
      : outcome
  );
  const created = results.filter((outcome) => outcome.status === "created").length;
  const failed = results.length - created;

  if (failed === 0) {
    const body: BatchResponseBody<R> = { created, failed, results };
    res.status(201).json(body);
    return;
  }

  const partial = new PartialFailureError(`${failed} of ${results.length} item(s) failed`);
  const body: ApiErrorResponse & BatchResponseBody<R> = {
    error: partial.message,
    code: partial.code,
    created,
    failed,
    results
  };
  res.status(partial.status).json(body);
}
