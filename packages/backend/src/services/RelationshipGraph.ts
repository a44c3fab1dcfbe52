import type {
  BatchItemOutcome,
  ChunkRecordStore,
  IndexAnalytics,
  IndexStore,
  RelationshipEdge,
  RelationshipKey,
  RelationshipStore,
  RelationshipUpsertResult
} from "@chunkgraph/shared";
import { NotFoundError, describeError } from "../errors/AppError.js";
import { logger } from "../utils/logger.js";

export interface DeclareRelationshipInput {
  sourceDocId: string;
  targetDocId: string;
  relType: string;
  reason?: string;
}

export interface ChunkRelationships {
  docId: string;
  outgoing: RelationshipEdge[];
  incoming: RelationshipEdge[];
}

export class RelationshipGraph {
  constructor(
    private readonly store: IndexStore & ChunkRecordStore & RelationshipStore,
    private readonly analyticsSampleSize: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Creates the edge, or on a repeat declaration of the same
   * (index, source, target, relType) replaces only its reason.
   */
  async declareRelationship(
    indexName: string,
    input: DeclareRelationshipInput
  ): Promise<RelationshipUpsertResult> {
    const key: RelationshipKey = {
      indexName,
      sourceDocId: input.sourceDocId,
      targetDocId: input.targetDocId,
      relType: input.relType
    };
    const result = await this.store.upsertRelationship(key, input.reason ?? "", this.now());
    if (result) {
      return result;
    }
    throw await this.explainMissingEndpoint(key);
  }

  /** A reconfirmed edge counts as applied; its result carries `created: false`. */
  async declareRelationships(
    indexName: string,
    inputs: DeclareRelationshipInput[]
  ): Promise<BatchItemOutcome<RelationshipUpsertResult>[]> {
    await this.requireIndex(indexName);

    const outcomes: BatchItemOutcome<RelationshipUpsertResult>[] = [];
    for (const [position, input] of inputs.entries()) {
      try {
        const result = await this.declareRelationship(indexName, input);
        outcomes.push({ index: position, status: "created", result });
      } catch (error) {
        const described = describeError(error);
        if (described.code === "INTERNAL_ERROR") {
          logger.error({ err: error, indexName, position }, "Batch relationship declare failed");
        }
        outcomes.push({ index: position, status: "failed", error: described });
      }
    }
    return outcomes;
  }

  async removeRelationship(indexName: string, key: Omit<RelationshipKey, "indexName">): Promise<void> {
    await this.requireIndex(indexName);
    const removed = await this.store.deleteRelationship({ indexName, ...key });
    if (!removed) {
      throw new NotFoundError(
        `Relationship ${key.sourceDocId} -[${key.relType}]-> ${key.targetDocId} not found`
      );
    }
  }

  async listRelationships(indexName: string, docId: string): Promise<ChunkRelationships> {
    await this.requireIndex(indexName);
    const chunk = await this.store.getChunk(indexName, docId);
    if (!chunk) {
      throw new NotFoundError(`Document "${docId}" not found in index "${indexName}"`);
    }

    const edges = await this.store.getRelationshipsForChunks(indexName, [docId]);
    return {
      docId,
      outgoing: edges.filter((edge) => edge.sourceDocId === docId),
      incoming: edges.filter((edge) => edge.targetDocId === docId)
    };
  }

  async analytics(indexName: string): Promise<IndexAnalytics> {
    const analytics = await this.store.getAnalytics(indexName, this.analyticsSampleSize);
    if (!analytics) {
      throw new NotFoundError(`Index "${indexName}" not found`);
    }
    return analytics;
  }

  private async requireIndex(indexName: string): Promise<void> {
    const index = await this.store.getIndex(indexName);
    if (!index) {
      throw new NotFoundError(`Index "${indexName}" not found`);
    }
  }

  private async explainMissingEndpoint(key: RelationshipKey): Promise<NotFoundError> {
    await this.requireIndex(key.indexName);
    for (const docId of [key.sourceDocId, key.targetDocId]) {
      const chunk = await this.store.getChunk(key.indexName, docId);
      if (!chunk) {
        return new NotFoundError(`Document "${docId}" not found in index "${key.indexName}"`);
      }
    }
    return new NotFoundError(`Relationship endpoints not found in index "${key.indexName}"`);
  }
}
