import type { IndexStore, Page, RagIndex, RagIndexPatch } from "@chunkgraph/shared";
import { ConflictError, NotFoundError } from "../errors/AppError.js";

export interface CreateIndexInput {
  name: string;
  dimension?: number;
  description?: string | null;
}

export interface ListIndexesInput {
  page: number;
  pageSize: number;
}

export class IndexRegistry {
  constructor(
    private readonly store: IndexStore,
    private readonly defaultDimension: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(input: CreateIndexInput): Promise<RagIndex> {
    const timestamp = this.now();
    const created = await this.store.createIndex({
      name: input.name,
      dimension: input.dimension ?? this.defaultDimension,
      description: input.description ?? null,
      createdAt: timestamp,
      updatedAt: timestamp
    });
    if (!created) {
      throw new ConflictError(`Index "${input.name}" already exists`);
    }
    return created;
  }

  async get(name: string): Promise<RagIndex> {
    const index = await this.store.getIndex(name);
    if (!index) {
      throw new NotFoundError(`Index "${name}" not found`);
    }
    return index;
  }

  async list(input: ListIndexesInput): Promise<Page<RagIndex>> {
    return this.store.listIndexes({
      offset: (input.page - 1) * input.pageSize,
      limit: input.pageSize
    });
  }

  async update(name: string, patch: RagIndexPatch): Promise<RagIndex> {
    const updated = await this.store.updateIndex(name, patch, this.now());
    if (!updated) {
      throw new NotFoundError(`Index "${name}" not found`);
    }
    return updated;
  }

  /** Removes the index together with its chunks and relationship edges. */
  async delete(name: string): Promise<void> {
    const deleted = await this.store.deleteIndex(name);
    if (!deleted) {
      throw new NotFoundError(`Index "${name}" not found`);
    }
  }
}
