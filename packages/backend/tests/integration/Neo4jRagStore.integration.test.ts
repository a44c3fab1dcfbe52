import { randomUUID } from "node:crypto";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { Chunk, RagIndex } from "@chunkgraph/shared";
import { Neo4jRagStore } from "../../src/store/Neo4jRagStore.js";

// Runs against an existing Neo4j 5.18+ server, e.g. NEO4J_TEST_URI=bolt://localhost:7687
const uri = process.env.NEO4J_TEST_URI ?? "";

function makeIndex(name: string): RagIndex {
  const now = new Date();
  return { name, dimension: 3, description: null, createdAt: now, updatedAt: now };
}

function makeChunk(
  indexName: string,
  docId: string,
  content: string,
  embedding: number[],
  now = new Date()
): Chunk {
  return {
    docId,
    indexName,
    content,
    metadata: { source: "integration" },
    embedding,
    createdAt: now,
    updatedAt: now
  };
}

describe.skipIf(uri === "")("Neo4jRagStore integration", () => {
  let store: Neo4jRagStore;
  const indexName = `it-${randomUUID()}`;
  const rankedIndexName = `it-${randomUUID()}`;

  beforeAll(async () => {
    store = new Neo4jRagStore({
      uri,
      user: process.env.NEO4J_TEST_USER ?? "neo4j",
      password: process.env.NEO4J_TEST_PASSWORD ?? "test-secret"
    });
    await store.connect();
  });

  afterAll(async () => {
    await store.deleteIndex(indexName);
    await store.deleteIndex(rankedIndexName);
    await store.disconnect();
  });

  it("stores chunks and edges under one index and cascades deletes", async () => {
    expect(await store.createIndex(makeIndex(indexName))).not.toBeNull();
    expect(await store.createIndex(makeIndex(indexName))).toBeNull();

    await store.insertChunk(makeChunk(indexName, "a", "alpha launch plan", [1, 0, 0]));
    await store.insertChunk(makeChunk(indexName, "b", "beta rollout", [0, 1, 0]));

    const fetched = await store.getChunk(indexName, "a");
    expect(fetched?.metadata).toEqual({ source: "integration" });
    expect(fetched?.embedding).toEqual([1, 0, 0]);

    const first = await store.upsertRelationship(
      { indexName, sourceDocId: "a", targetDocId: "b", relType: "PRECEDES" },
      "r1",
      new Date()
    );
    const second = await store.upsertRelationship(
      { indexName, sourceDocId: "a", targetDocId: "b", relType: "PRECEDES" },
      "r2",
      new Date()
    );
    expect(first?.created).toBe(true);
    expect(second?.created).toBe(false);
    expect(second?.edge.reason).toBe("r2");

    const candidates = await store.findCandidates(indexName, {
      embedding: [1, 0, 0],
      terms: ["beta"],
      limit: 1
    });
    expect(candidates?.map((chunk) => chunk.docId).sort()).toEqual(["a", "b"]);

    const analytics = await store.getAnalytics(indexName, 5);
    expect(analytics?.chunkCount).toBe(2);
    expect(analytics?.relTypeDistribution).toEqual({ PRECEDES: 1 });

    expect(await store.deleteChunk(indexName, "b")).toBe(true);
    expect(await store.getRelationshipsForChunks(indexName, ["a"])).toEqual([]);

    expect(await store.deleteIndex(indexName)).toBe(true);
    expect(await store.listChunks(indexName)).toBeNull();
    expect(await store.getAnalytics(indexName, 5)).toBeNull();
  });

  it("keeps the strongest vector and keyword matches when candidates are capped", async () => {
    await store.createIndex(makeIndex(rankedIndexName));
    const chunks = [
      makeChunk(rankedIndexName, "both-terms", "quarterly report q3", [0, 1, 0], new Date("2024-01-01")),
      makeChunk(rankedIndexName, "one-term", "weekly report", [0, 1, 0], new Date("2024-06-01")),
      makeChunk(rankedIndexName, "zero-vector", "unrelated", [0, 0, 0], new Date("2024-07-01")),
      makeChunk(rankedIndexName, "nearest", "also unrelated", [1, 0, 0], new Date("2023-01-01"))
    ];
    for (const chunk of chunks) {
      await store.insertChunk(chunk);
    }

    const candidates = await store.findCandidates(rankedIndexName, {
      embedding: [1, 0, 0],
      terms: ["report", "q3"],
      limit: 1
    });

    expect(candidates?.slice(0, 2).map((chunk) => chunk.docId)).toEqual(["nearest", "both-terms"]);
  });
});
