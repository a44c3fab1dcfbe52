import neo4j, {
  Neo4jError,
  isNode,
  isRelationship,
  type Driver,
  type Integer,
  type ManagedTransaction,
  type Node,
  type Record as Neo4jRecord,
  type Relationship,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  AbstractRagStore,
  CandidateQuery,
  Chunk,
  ChunkPatch,
  IndexAnalytics,
  Page,
  PageRequest,
  RagIndex,
  RagIndexPatch,
  RelationshipEdge,
  RelationshipKey,
  RelationshipUpsertResult
} from "@chunkgraph/shared";
import type { AppConfig } from "../config.js";
import { parseStoredMetadata } from "../utils/metadata.js";
import { StoreUnavailableError } from "./storeErrors.js";

export interface Neo4jRagStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  maxConnectionPoolSize?: number;
}

type AccessMode = "READ" | "WRITE";

const CONSTRAINT_VIOLATION = "Neo.ClientError.Schema.ConstraintValidationFailed";
const ENTITY_NOT_FOUND = "Neo.ClientError.Statement.EntityNotFound";

export class Neo4jRagStore implements AbstractRagStore {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jRagStoreConfig) {}

  static fromConfig(
    config: Pick<AppConfig, "NEO4J_URI" | "NEO4J_USER" | "NEO4J_PASSWORD" | "NEO4J_DATABASE">
  ): Neo4jRagStore {
    return new Neo4jRagStore({
      uri: config.NEO4J_URI,
      user: config.NEO4J_USER,
      password: config.NEO4J_PASSWORD,
      database: config.NEO4J_DATABASE
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    const driverConfig =
      this.config.maxConnectionPoolSize !== undefined
        ? { maxConnectionPoolSize: this.config.maxConnectionPoolSize }
        : {};
    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password),
      driverConfig
    );

    try {
      await this.driver.verifyConnectivity();
      await this.ensureSchema();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  // Indexes --------------------------------------------------------------

  async createIndex(index: RagIndex): Promise<RagIndex | null> {
    try {
      return await this.withTransaction("WRITE", async (tx) => {
        const existing = await tx.run(
          `
          MATCH (i:RagIndex {name: $name})
          RETURN count(i) AS found
          `,
          { name: index.name }
        );
        if (this.toNumber(existing.records[0]?.get("found")) > 0) {
          return null;
        }

        const result = await tx.run(
          `
          CREATE (i:RagIndex {name: $index.name})
          SET
            i.dimension = $index.dimension,
            i.description = $index.description,
            i.created_at = $index.createdAt,
            i.updated_at = $index.updatedAt
          RETURN i
          `,
          { index: this.serializeIndex(index) }
        );
        return this.mapFirst(result.records, "i", (node) => this.mapIndex(node));
      });
    } catch (error) {
      if (this.hasCode(error, CONSTRAINT_VIOLATION)) {
        return null;
      }
      throw error;
    }
  }

  async getIndex(name: string): Promise<RagIndex | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (i:RagIndex {name: $name})
        RETURN i
        LIMIT 1
        `,
        { name }
      );
      return this.mapFirst(result.records, "i", (node) => this.mapIndex(node));
    });
  }

  async listIndexes(page?: PageRequest): Promise<Page<RagIndex>> {
    const offset = Math.max(0, page?.offset ?? 0);
    const limit = page ? Math.max(1, page.limit) : null;

    return this.withTransaction("READ", async (tx) => {
      const countResult = await tx.run(`MATCH (i:RagIndex) RETURN count(i) AS total`);
      const total = this.toNumber(countResult.records[0]?.get("total"));

      const result = await tx.run(
        `
        MATCH (i:RagIndex)
        RETURN i
        ORDER BY i.name ASC
        SKIP $offset
        ${limit === null ? "" : "LIMIT $limit"}
        `,
        {
          offset: neo4j.int(offset),
          limit: neo4j.int(limit ?? 0)
        }
      );

      return {
        items: this.mapAll(result.records, "i", (node) => this.mapIndex(node)),
        total
      };
    });
  }

  async updateIndex(name: string, patch: RagIndexPatch, updatedAt: Date): Promise<RagIndex | null> {
    return this.withTransaction("WRITE", async (tx) => {
      const result = await tx.run(
        `
        MATCH (i:RagIndex {name: $name})
        SET
          i.description = CASE WHEN $hasDescription THEN $description ELSE i.description END,
          i.updated_at = $updatedAt
        RETURN i
        `,
        {
          name,
          hasDescription: patch.description !== undefined,
          description: patch.description ?? null,
          updatedAt: updatedAt.toISOString()
        }
      );
      return this.mapFirst(result.records, "i", (node) => this.mapIndex(node));
    });
  }

  async deleteIndex(name: string): Promise<boolean> {
    return this.withTransaction("WRITE", async (tx) => {
      // Taking the write lock on the index node first serializes this delete
      // with chunk inserts, which lock the same node when linking HAS_CHUNK.
      const locked = await tx.run(
        `
        MATCH (i:RagIndex {name: $name})
        SET i.deleting = true
        RETURN count(i) AS found
        `,
        { name }
      );
      if (this.toNumber(locked.records[0]?.get("found")) === 0) {
        return false;
      }

      await tx.run(
        `
        MATCH (c:RagChunk {index_name: $name})
        DETACH DELETE c
        `,
        { name }
      );
      await tx.run(
        `
        MATCH (i:RagIndex {name: $name})
        DETACH DELETE i
        `,
        { name }
      );
      return true;
    });
  }

  // Chunks ---------------------------------------------------------------

  async insertChunk(chunk: Chunk): Promise<Chunk | null> {
    try {
      return await this.withTransaction("WRITE", async (tx) => {
        const result = await tx.run(
          `
          MATCH (i:RagIndex {name: $chunk.indexName})
          WHERE i.deleting IS NULL
          CREATE (c:RagChunk {index_name: $chunk.indexName, doc_id: $chunk.docId})
          SET
            c.content = $chunk.content,
            c.metadata = $chunk.metadata,
            c.embedding = $chunk.embedding,
            c.created_at = $chunk.createdAt,
            c.updated_at = $chunk.updatedAt
          CREATE (i)-[:HAS_CHUNK]->(c)
          RETURN c
          `,
          { chunk: this.serializeChunk(chunk) }
        );
        return this.mapFirst(result.records, "c", (node) => this.mapChunk(node));
      });
    } catch (error) {
      // The index was deleted between our MATCH and the HAS_CHUNK write.
      if (this.hasCode(error, ENTITY_NOT_FOUND)) {
        return null;
      }
      throw error;
    }
  }

  async getChunk(indexName: string, docId: string): Promise<Chunk | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (:RagIndex {name: $indexName})-[:HAS_CHUNK]->(c:RagChunk {doc_id: $docId})
        RETURN c
        LIMIT 1
        `,
        { indexName, docId }
      );
      return this.mapFirst(result.records, "c", (node) => this.mapChunk(node));
    });
  }

  async listChunks(indexName: string): Promise<Chunk[] | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (i:RagIndex {name: $indexName})
        OPTIONAL MATCH (i)-[:HAS_CHUNK]->(c:RagChunk)
        RETURN c
        ORDER BY c.updated_at DESC, c.doc_id ASC
        `,
        { indexName }
      );
      if (result.records.length === 0) {
        return null;
      }
      return this.mapAll(result.records, "c", (node) => this.mapChunk(node));
    });
  }

  async updateChunk(indexName: string, docId: string, patch: ChunkPatch): Promise<Chunk | null> {
    const assignments = ["c.updated_at = $updatedAt"];
    const params: Record<string, unknown> = {
      indexName,
      docId,
      updatedAt: patch.updatedAt.toISOString()
    };
    if (patch.content !== undefined) {
      assignments.push("c.content = $content");
      params.content = patch.content;
    }
    if (patch.metadata !== undefined) {
      assignments.push("c.metadata = $metadata");
      params.metadata = JSON.stringify(patch.metadata);
    }
    if (patch.embedding !== undefined) {
      assignments.push("c.embedding = $embedding");
      params.embedding = patch.embedding;
    }

    return this.withTransaction("WRITE", async (tx) => {
      const result = await tx.run(
        `
        MATCH (:RagIndex {name: $indexName})-[:HAS_CHUNK]->(c:RagChunk {doc_id: $docId})
        SET ${assignments.join(", ")}
        RETURN c
        `,
        params
      );
      return this.mapFirst(result.records, "c", (node) => this.mapChunk(node));
    });
  }

  async deleteChunk(indexName: string, docId: string): Promise<boolean> {
    return this.withTransaction("WRITE", async (tx) => {
      const result = await tx.run(
        `
        MATCH (:RagIndex {name: $indexName})-[:HAS_CHUNK]->(c:RagChunk {doc_id: $docId})
        DETACH DELETE c
        RETURN count(*) AS deleted
        `,
        { indexName, docId }
      );
      return this.toNumber(result.records[0]?.get("deleted")) > 0;
    });
  }

  // Candidates -----------------------------------------------------------

  /**
   * Cosine top-N, then term matches ranked the way the engine scores keywords
   * (1 per content hit, 0.5 per metadata-only hit), then recent chunks as fill.
   */
  async findCandidates(indexName: string, query: CandidateQuery): Promise<Chunk[] | null> {
    const limit = Math.max(1, query.limit);

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (i:RagIndex {name: $indexName})
        CALL {
          WITH i
          MATCH (i)-[:HAS_CHUNK]->(c:RagChunk)
          WHERE $embedding IS NOT NULL
            AND c.embedding IS NOT NULL
            AND size(c.embedding) = size($embedding)
          WITH c, vector.similarity.cosine(c.embedding, $embedding) AS similarity
          WHERE similarity IS NOT NULL
          ORDER BY similarity DESC
          LIMIT $limit
          RETURN collect(c) AS vectorHits
        }
        CALL {
          WITH i
          MATCH (i)-[:HAS_CHUNK]->(c:RagChunk)
          WHERE size($terms) > 0
            AND any(term IN $terms WHERE
              toLower(c.content) CONTAINS term OR toLower(coalesce(c.metadata, '')) CONTAINS term)
          WITH c, reduce(score = 0.0, term IN $terms |
            score + CASE
              WHEN toLower(c.content) CONTAINS term THEN 1.0
              WHEN toLower(coalesce(c.metadata, '')) CONTAINS term THEN 0.5
              ELSE 0.0
            END) AS lexicalScore
          ORDER BY lexicalScore DESC, c.updated_at DESC
          LIMIT $limit
          RETURN collect(c) AS lexicalHits
        }
        CALL {
          WITH i
          MATCH (i)-[:HAS_CHUNK]->(c:RagChunk)
          WITH c
          ORDER BY c.updated_at DESC
          LIMIT $limit
          RETURN collect(c) AS recentChunks
        }
        WITH vectorHits + [c IN lexicalHits WHERE NOT c IN vectorHits] AS ranked, recentChunks
        RETURN ranked + [c IN recentChunks WHERE NOT c IN ranked][0..$fill] AS chunks
        `,
        {
          indexName,
          embedding: query.embedding ?? null,
          terms: query.terms.map((term) => term.toLowerCase()),
          limit: neo4j.int(limit),
          fill: neo4j.int(limit)
        }
      );

      const record = result.records[0];
      if (!record) {
        return null;
      }
      const raw: unknown = record.get("chunks");
      if (!Array.isArray(raw)) {
        return [];
      }
      return raw.filter(isNode).map((node) => this.mapChunk(node));
    });
  }

  async getChunksByIds(indexName: string, docIds: string[]): Promise<Chunk[]> {
    if (docIds.length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (:RagIndex {name: $indexName})-[:HAS_CHUNK]->(c:RagChunk)
        WHERE c.doc_id IN $docIds
        RETURN c
        `,
        { indexName, docIds }
      );
      return this.mapAll(result.records, "c", (node) => this.mapChunk(node));
    });
  }

  // Relationships ----------------------------------------------------------

  async upsertRelationship(
    key: RelationshipKey,
    reason: string,
    now: Date
  ): Promise<RelationshipUpsertResult | null> {
    return this.withTransaction("WRITE", async (tx) => {
      const result = await tx.run(
        `
        MATCH (i:RagIndex {name: $indexName})
        MATCH (i)-[:HAS_CHUNK]->(source:RagChunk {doc_id: $sourceDocId})
        MATCH (i)-[:HAS_CHUNK]->(target:RagChunk {doc_id: $targetDocId})
        OPTIONAL MATCH (source)-[existing:RELATES_TO {rel_type: $relType}]->(target)
        WITH source, target, existing IS NULL AS created
        MERGE (source)-[r:RELATES_TO {rel_type: $relType}]->(target)
        ON CREATE SET
          r.index_name = $indexName,
          r.reason = $reason,
          r.created_at = $now,
          r.updated_at = $now
        ON MATCH SET
          r.reason = $reason,
          r.updated_at = $now
        RETURN r, source.doc_id AS sourceDocId, target.doc_id AS targetDocId, created
        `,
        {
          indexName: key.indexName,
          sourceDocId: key.sourceDocId,
          targetDocId: key.targetDocId,
          relType: key.relType,
          reason,
          now: now.toISOString()
        }
      );

      const record = result.records[0];
      if (!record) {
        return null;
      }
      const edge = this.mapEdgeRecord(record, key.indexName);
      if (!edge) {
        return null;
      }
      return { edge, created: record.get("created") === true };
    });
  }

  async deleteRelationship(key: RelationshipKey): Promise<boolean> {
    return this.withTransaction("WRITE", async (tx) => {
      const result = await tx.run(
        `
        MATCH (i:RagIndex {name: $indexName})
        MATCH (i)-[:HAS_CHUNK]->(:RagChunk {doc_id: $sourceDocId})
              -[r:RELATES_TO {rel_type: $relType}]->
              (:RagChunk {doc_id: $targetDocId})<-[:HAS_CHUNK]-(i)
        DELETE r
        RETURN count(*) AS deleted
        `,
        {
          indexName: key.indexName,
          sourceDocId: key.sourceDocId,
          targetDocId: key.targetDocId,
          relType: key.relType
        }
      );
      return this.toNumber(result.records[0]?.get("deleted")) > 0;
    });
  }

  async getRelationshipsForChunks(
    indexName: string,
    docIds: string[]
  ): Promise<RelationshipEdge[]> {
    if (docIds.length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (i:RagIndex {name: $indexName})-[:HAS_CHUNK]->(c:RagChunk)
        WHERE c.doc_id IN $docIds
        MATCH (c)-[r:RELATES_TO]-(other:RagChunk)<-[:HAS_CHUNK]-(i)
        WITH DISTINCT r
        RETURN r, startNode(r).doc_id AS sourceDocId, endNode(r).doc_id AS targetDocId
        ORDER BY r.created_at ASC
        `,
        { indexName, docIds }
      );
      return this.collectEdges(result.records, indexName);
    });
  }

  async getAnalytics(indexName: string, sampleSize: number): Promise<IndexAnalytics | null> {
    return this.withTransaction("READ", async (tx) => {
      const chunkResult = await tx.run(
        `
        MATCH (i:RagIndex {name: $indexName})
        OPTIONAL MATCH (i)-[:HAS_CHUNK]->(c:RagChunk)
        RETURN i.name AS name, count(c) AS chunkCount
        `,
        { indexName }
      );
      const chunkRow = chunkResult.records[0];
      if (!chunkRow) {
        return null;
      }

      const distributionResult = await tx.run(
        `
        MATCH (i:RagIndex {name: $indexName})-[:HAS_CHUNK]->(:RagChunk)-[r:RELATES_TO]->(:RagChunk)<-[:HAS_CHUNK]-(i)
        RETURN r.rel_type AS relType, count(r) AS relCount
        ORDER BY relType ASC
        `,
        { indexName }
      );

      const relTypeDistribution: Record<string, number> = {};
      let edgeCount = 0;
      for (const record of distributionResult.records) {
        const relType = this.toString(record.get("relType"), "RELATES_TO");
        const count = this.toNumber(record.get("relCount"));
        relTypeDistribution[relType] = count;
        edgeCount += count;
      }

      let sampleEdges: RelationshipEdge[] = [];
      if (sampleSize > 0 && edgeCount > 0) {
        const sampleResult = await tx.run(
          `
          MATCH (i:RagIndex {name: $indexName})-[:HAS_CHUNK]->(s:RagChunk)-[r:RELATES_TO]->(t:RagChunk)<-[:HAS_CHUNK]-(i)
          RETURN r, s.doc_id AS sourceDocId, t.doc_id AS targetDocId
          ORDER BY r.created_at ASC, s.doc_id ASC, t.doc_id ASC
          LIMIT $sampleSize
          `,
          { indexName, sampleSize: neo4j.int(sampleSize) }
        );
        sampleEdges = this.collectEdges(sampleResult.records, indexName);
      }

      return {
        indexName,
        chunkCount: this.toNumber(chunkRow.get("chunkCount")),
        edgeCount,
        relTypeDistribution,
        sampleEdges
      };
    });
  }

  // Internals --------------------------------------------------------------

  private async ensureSchema(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT rag_index_name_unique IF NOT EXISTS FOR (i:RagIndex) REQUIRE i.name IS UNIQUE`
      );
      await session.run(
        `
        CREATE CONSTRAINT rag_chunk_id_unique IF NOT EXISTS
        FOR (c:RagChunk) REQUIRE (c.index_name, c.doc_id) IS UNIQUE
        `
      );
      await session.run(
        `CREATE INDEX rag_chunk_index_name_idx IF NOT EXISTS FOR (c:RagChunk) ON (c.index_name)`
      );
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const session = this.openSession(accessMode);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private withTransaction<T>(
    accessMode: AccessMode,
    work: (tx: ManagedTransaction) => Promise<T>
  ): Promise<T> {
    return this.withSession(accessMode, (session) =>
      accessMode === "READ" ? session.executeRead(work) : session.executeWrite(work)
    );
  }

  private openSession(accessMode: AccessMode): Session {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    return this.getDriver().session(sessionConfig);
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new StoreUnavailableError("Neo4jRagStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private hasCode(error: unknown, code: string): boolean {
    return error instanceof Neo4jError && error.code === code;
  }

  private mapFirst<T>(records: Neo4jRecord[], key: string, map: (node: Node) => T): T | null {
    const value: unknown = records[0]?.get(key);
    return isNode(value) ? map(value) : null;
  }

  private mapAll<T>(records: Neo4jRecord[], key: string, map: (node: Node) => T): T[] {
    const items: T[] = [];
    for (const record of records) {
      const value: unknown = record.get(key);
      if (isNode(value)) {
        items.push(map(value));
      }
    }
    return items;
  }

  private collectEdges(records: Neo4jRecord[], indexName: string): RelationshipEdge[] {
    const edges: RelationshipEdge[] = [];
    for (const record of records) {
      const edge = this.mapEdgeRecord(record, indexName);
      if (edge) {
        edges.push(edge);
      }
    }
    return edges;
  }

  private mapEdgeRecord(record: Neo4jRecord, indexName: string): RelationshipEdge | null {
    const value: unknown = record.get("r");
    if (!isRelationship(value)) {
      return null;
    }
    return this.mapEdge(
      value,
      indexName,
      this.toString(record.get("sourceDocId"), ""),
      this.toString(record.get("targetDocId"), "")
    );
  }

  private mapIndex(node: Node): RagIndex {
    const props: Record<string, unknown> = node.properties;
    return {
      name: this.toString(props.name, ""),
      dimension: this.toNumber(props.dimension, 0),
      description: this.toOptionalString(props.description) ?? null,
      createdAt: this.toDate(props.created_at, new Date(0)),
      updatedAt: this.toDate(props.updated_at, new Date(0))
    };
  }

  private mapChunk(node: Node): Chunk {
    const props: Record<string, unknown> = node.properties;
    const chunk: Chunk = {
      docId: this.toString(props.doc_id, node.elementId),
      indexName: this.toString(props.index_name, ""),
      content: this.toString(props.content, ""),
      metadata: parseStoredMetadata(props.metadata),
      createdAt: this.toDate(props.created_at, new Date(0)),
      updatedAt: this.toDate(props.updated_at, new Date(0))
    };

    const embedding = this.toOptionalNumberArray(props.embedding);
    if (embedding) {
      chunk.embedding = embedding;
    }

    return chunk;
  }

  private mapEdge(
    relationship: Relationship,
    indexName: string,
    sourceDocId: string,
    targetDocId: string
  ): RelationshipEdge {
    const props: Record<string, unknown> = relationship.properties;
    return {
      indexName,
      sourceDocId,
      targetDocId,
      relType: this.toString(props.rel_type, "RELATES_TO"),
      reason: this.toString(props.reason, ""),
      createdAt: this.toDate(props.created_at, new Date(0)),
      updatedAt: this.toDate(props.updated_at ?? props.created_at, new Date(0))
    };
  }

  private serializeIndex(index: RagIndex): Record<string, unknown> {
    return {
      name: index.name,
      dimension: neo4j.int(index.dimension),
      description: index.description,
      createdAt: index.createdAt.toISOString(),
      updatedAt: index.updatedAt.toISOString()
    };
  }

  private serializeChunk(chunk: Chunk): Record<string, unknown> {
    return {
      docId: chunk.docId,
      indexName: chunk.indexName,
      content: chunk.content,
      metadata: JSON.stringify(chunk.metadata),
      embedding: chunk.embedding ?? null,
      createdAt: chunk.createdAt.toISOString(),
      updatedAt: chunk.updatedAt.toISOString()
    };
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toOptionalString(value: unknown): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    return undefined;
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return (value as Integer).toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }

  private toOptionalNumberArray(value: unknown): number[] | undefined {
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.map((item: unknown) => this.toNumber(item));
  }

  private toDate(value: unknown, fallback: Date): Date {
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      return value;
    }

    if (typeof value === "string" || typeof value === "number") {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }

    return fallback;
  }
}
