import request from "supertest";
import { describe, expect, it } from "vitest";
import type { AnswerRequest, AnswerSynthesizer } from "../../src/services/embeddingTypes.js";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

async function seed(ctx: TestApp, indexName: string, chunks: Array<{ content: string; source: string }>) {
  await request(ctx.app).post("/api/indexes").send({ name: indexName, dimension: 1536 }).expect(201);
  for (const chunk of chunks) {
    await request(ctx.app)
      .post(`/api/indexes/${indexName}/documents`)
      .send({ content: chunk.content, metadata: { source: chunk.source } })
      .expect(201);
  }
}

const alphaChunks = [
  { content: "alpha strategy insights for the coming quarter", source: "alpha" },
  { content: "alpha roadmap milestones and delivery dates", source: "alpha" }
];

describe("search api", () => {
  it("returns only chunks of the requested index", async () => {
    const ctx = createTestApp();
    await seed(ctx, "alpha", alphaChunks);
    await seed(ctx, "beta", [{ content: "alpha strategy notes kept by the beta team", source: "beta" }]);

    const response = await request(ctx.app)
      .post("/api/search")
      .send({ index_name: "alpha", query: "alpha", keywords: ["alpha", "strategy"], top_k: 5 });

    expect(response.status).toBe(200);
    expect(response.body.chunks).toHaveLength(2);
    for (const chunk of response.body.chunks) {
      expect(chunk.metadata).toEqual({ source: "alpha" });
    }
    expect(response.body.answer).toBeUndefined();
  });

  it("returns every chunk when top_k exceeds the index size", async () => {
    const ctx = createTestApp();
    await seed(
      ctx,
      "notes",
      ["one", "two", "three", "four"].map((word) => ({ content: `shared ${word}`, source: "notes" }))
    );

    const response = await request(ctx.app)
      .post("/api/search")
      .send({ index_name: "notes", query: "shared", top_k: 6 });

    expect(response.status).toBe(200);
    expect(response.body.chunks).toHaveLength(4);
    const ids = new Set(response.body.chunks.map((chunk: { doc_id: string }) => chunk.doc_id));
    expect(ids.size).toBe(4);
  });

  it("answers with an empty list for an empty index", async () => {
    const synthesize = async (): Promise<string> => "never";
    const ctx = createTestApp({ overrides: { answerSynthesizer: { synthesize } } });
    await request(ctx.app).post("/api/indexes").send({ name: "empty" }).expect(201);

    const response = await request(ctx.app).post("/api/search").send({ index_name: "empty", query: "anything" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ chunks: [] });
  });

  it("rejects an out of range top_k", async () => {
    const ctx = createTestApp();
    await seed(ctx, "alpha", alphaChunks);

    const response = await request(ctx.app)
      .post("/api/search")
      .send({ index_name: "alpha", query: "alpha", top_k: 0 });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_ERROR");
    expect(response.body.error).toBe("top_k must be an integer between 1 and 100");
  });

  it("returns 404 for an unknown index", async () => {
    const ctx = createTestApp();

    const response = await request(ctx.app).post("/api/search").send({ index_name: "ghost", query: "alpha" });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Index "ghost" not found', code: "NOT_FOUND" });
  });

  it("attaches a synthesized answer grounded on the hits", async () => {
    const requests: AnswerRequest[] = [];
    const answerSynthesizer: AnswerSynthesizer = {
      async synthesize(answerRequest) {
        requests.push(answerRequest);
        return "Alpha is focused on strategy.";
      }
    };
    const ctx = createTestApp({ overrides: { answerSynthesizer } });
    await seed(ctx, "alpha", alphaChunks);

    const response = await request(ctx.app)
      .post("/api/search")
      .send({ index_name: "alpha", query: "alpha strategy", top_k: 1 });

    expect(response.status).toBe(200);
    expect(response.body.answer).toBe("Alpha is focused on strategy.");
    expect(response.body.chunks).toHaveLength(1);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.query).toBe("alpha strategy");
    expect(requests[0]?.chunks.map((chunk) => chunk.content)).toEqual([response.body.chunks[0].content]);
  });

  it("omits the answer when synthesis fails", async () => {
    const answerSynthesizer: AnswerSynthesizer = {
      async synthesize() {
        throw new Error("model unavailable");
      }
    };
    const ctx = createTestApp({ overrides: { answerSynthesizer } });
    await seed(ctx, "alpha", alphaChunks);

    const response = await request(ctx.app).post("/api/search").send({ index_name: "alpha", query: "alpha" });

    expect(response.status).toBe(200);
    expect(response.body.chunks).toHaveLength(2);
    expect(response.body).not.toHaveProperty("answer");
  });
});
