import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { createTestApp, TEST_DIMENSION, type TestApp } from "../helpers/testApp.js";

describe("indexes api", () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  it("creates an index and rejects a duplicate name", async () => {
    const created = await request(ctx.app)
      .post("/api/indexes")
      .send({ name: "alpha", description: "Alpha docs", dimension: 1536 });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ name: "alpha", description: "Alpha docs", dimension: 1536 });
    expect(typeof created.body.created_at).toBe("string");

    const duplicate = await request(ctx.app).post("/api/indexes").send({ name: "alpha" });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({ error: 'Index "alpha" already exists', code: "CONFLICT" });
  });

  it("defaults the dimension from configuration", async () => {
    const created = await request(ctx.app).post("/api/indexes").send({ name: "beta" });

    expect(created.status).toBe(201);
    expect(created.body.dimension).toBe(TEST_DIMENSION);
    expect(created.body.description).toBeNull();
  });

  it("lists indexes by name with paging headers", async () => {
    for (const name of ["gamma", "alpha", "beta"]) {
      await request(ctx.app).post("/api/indexes").send({ name });
    }

    const response = await request(ctx.app).get("/api/indexes").query({ page: 1, pageSize: 2 });

    expect(response.status).toBe(200);
    expect(response.headers["x-total-count"]).toBe("3");
    expect(response.headers["x-page"]).toBe("1");
    expect(response.headers["x-page-size"]).toBe("2");
    expect(response.body.map((index: { name: string }) => index.name)).toEqual(["alpha", "beta"]);
  });

  it("updates the description and refuses immutable fields", async () => {
    await request(ctx.app).post("/api/indexes").send({ name: "alpha", description: "old" });

    const updated = await request(ctx.app).put("/api/indexes/alpha").send({ description: "new" });
    expect(updated.status).toBe(200);
    expect(updated.body.description).toBe("new");

    const rejected = await request(ctx.app).put("/api/indexes/alpha").send({ dimension: 3 });
    expect(rejected.status).toBe(400);
    expect(rejected.body.code).toBe("VALIDATION_ERROR");

    const fetched = await request(ctx.app).get("/api/indexes/alpha");
    expect(fetched.body.dimension).toBe(TEST_DIMENSION);
  });

  it("returns 404 for an absent index", async () => {
    const fetched = await request(ctx.app).get("/api/indexes/missing");
    expect(fetched.status).toBe(404);
    expect(fetched.body).toEqual({ error: 'Index "missing" not found', code: "NOT_FOUND" });

    const updated = await request(ctx.app).put("/api/indexes/missing").send({ description: "x" });
    expect(updated.status).toBe(404);
  });

  it("cascades an index delete to its chunks and edges", async () => {
    await request(ctx.app).post("/api/indexes").send({ name: "doomed" });
    const docIds: string[] = [];
    for (const content of ["one", "two", "three"]) {
      const created = await request(ctx.app).post("/api/indexes/doomed/documents").send({ content });
      docIds.push(created.body.doc_id);
    }
    for (const [source, target] of [
      [docIds[0], docIds[1]],
      [docIds[1], docIds[2]]
    ]) {
      const declared = await request(ctx.app)
        .post("/api/indexes/doomed/relationships")
        .send({ source_doc_id: source, target_doc_id: target, rel_type: "NEXT" });
      expect(declared.status).toBe(201);
    }
    expect(ctx.store.edgeCount()).toBe(2);

    const deleted = await request(ctx.app).delete("/api/indexes/doomed");
    expect(deleted.status).toBe(204);

    expect((await request(ctx.app).get("/api/indexes/doomed/documents")).status).toBe(404);
    expect((await request(ctx.app).get("/api/indexes/doomed/analytics")).status).toBe(404);
    expect((await request(ctx.app).delete("/api/indexes/doomed")).status).toBe(404);
    expect(ctx.store.edgeCount()).toBe(0);
  });
});
