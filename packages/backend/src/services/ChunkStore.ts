import { randomUUID } from "node:crypto";
import type {
  BatchItemOutcome,
  Chunk,
  ChunkMetadata,
  ChunkPatch,
  ChunkRecordStore,
  IndexStore,
  RagIndex
} from "@chunkgraph/shared";
import { DimensionMismatchError, NotFoundError, describeError } from "../errors/AppError.js";
import { logger } from "../utils/logger.js";
import type { EmbeddingProvider } from "./embeddingTypes.js";

export interface CreateDocumentInput {
  content: string;
  metadata?: ChunkMetadata;
  embedding?: number[];
}

export interface UpdateDocumentInput {
  content?: string;
  metadata?: ChunkMetadata;
  embedding?: number[];
}

export class ChunkStore {
  constructor(
    private readonly store: IndexStore & ChunkRecordStore,
    private readonly embeddings: EmbeddingProvider,
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = randomUUID
  ) {}

  async createDocument(indexName: string, input: CreateDocumentInput): Promise<Chunk> {
    const index = await this.requireIndex(indexName);
    const embedding = await this.resolveEmbedding(index, input.content, input.embedding);

    const timestamp = this.now();
    const chunk: Chunk = {
      docId: this.generateId(),
      indexName: index.name,
      content: input.content,
      metadata: input.metadata ?? {},
      embedding,
      createdAt: timestamp,
      updatedAt: timestamp
    };

    const inserted = await this.store.insertChunk(chunk);
    if (!inserted) {
      // the index was deleted between the lookup and the write
      throw new NotFoundError(`Index "${indexName}" not found`);
    }
    return inserted;
  }

  /** Creates each document independently; outcomes come back in input order. */
  async createDocuments(
    indexName: string,
    inputs: CreateDocumentInput[]
  ): Promise<BatchItemOutcome<Chunk>[]> {
    await this.requireIndex(indexName);

    const outcomes: BatchItemOutcome<Chunk>[] = [];
    for (const [position, input] of inputs.entries()) {
      try {
        const chunk = await this.createDocument(indexName, input);
        outcomes.push({ index: position, status: "created", result: chunk });
      } catch (error) {
        const described = describeError(error);
        if (described.code === "INTERNAL_ERROR") {
          logger.error({ err: error, indexName, position }, "Batch document insert failed");
        }
        outcomes.push({ index: position, status: "failed", error: described });
      }
    }
    return outcomes;
  }

  async getDocument(indexName: string, docId: string): Promise<Chunk> {
    await this.requireIndex(indexName);
    const chunk = await this.store.getChunk(indexName, docId);
    if (!chunk) {
      throw new NotFoundError(`Document "${docId}" not found in index "${indexName}"`);
    }
    return chunk;
  }

  /** All chunks of the index, most recently updated first. */
  async listDocuments(indexName: string): Promise<Chunk[]> {
    const chunks = await this.store.listChunks(indexName);
    if (!chunks) {
      throw new NotFoundError(`Index "${indexName}" not found`);
    }
    return chunks;
  }

  async updateDocument(indexName: string, docId: string, input: UpdateDocumentInput): Promise<Chunk> {
    const index = await this.requireIndex(indexName);
    const existing = await this.store.getChunk(indexName, docId);
    if (!existing) {
      throw new NotFoundError(`Document "${docId}" not found in index "${indexName}"`);
    }

    const patch: ChunkPatch = { updatedAt: this.now() };
    if (input.content !== undefined) {
      patch.content = input.content;
    }
    if (input.metadata !== undefined) {
      patch.metadata = input.metadata;
    }
    if (input.embedding !== undefined) {
      this.assertDimension(index, input.embedding);
      patch.embedding = input.embedding;
    } else if (input.content !== undefined) {
      patch.embedding = await this.embed(index, input.content);
    }

    const updated = await this.store.updateChunk(indexName, docId, patch);
    if (!updated) {
      throw new NotFoundError(`Document "${docId}" not found in index "${indexName}"`);
    }
    return updated;
  }

  /** Removes the chunk and its incident edges. A second delete is `NotFound`. */
  async deleteDocument(indexName: string, docId: string): Promise<void> {
    await this.requireIndex(indexName);
    const deleted = await this.store.deleteChunk(indexName, docId);
    if (!deleted) {
      throw new NotFoundError(`Document "${docId}" not found in index "${indexName}"`);
    }
  }

  private async requireIndex(indexName: string): Promise<RagIndex> {
    const index = await this.store.getIndex(indexName);
    if (!index) {
      throw new NotFoundError(`Index "${indexName}" not found`);
    }
    return index;
  }

  private async resolveEmbedding(
    index: RagIndex,
    content: string,
    supplied: number[] | undefined
  ): Promise<number[]> {
    if (supplied !== undefined) {
      this.assertDimension(index, supplied);
      return supplied;
    }
    return this.embed(index, content);
  }

  private async embed(index: RagIndex, content: string): Promise<number[]> {
    const embedding = await this.embeddings.embed(content, { dimension: index.dimension });
    this.assertDimension(index, embedding);
    return embedding;
  }

  private assertDimension(index: RagIndex, embedding: number[]): void {
    if (embedding.length !== index.dimension) {
      throw new DimensionMismatchError(index.dimension, embedding.length);
    }
  }
}
