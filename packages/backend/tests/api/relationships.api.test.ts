import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

describe("relationships api", () => {
  let ctx: TestApp;
  let a: string;
  let b: string;
  let c: string;

  beforeEach(async () => {
    ctx = createTestApp();
    await request(ctx.app).post("/api/indexes").send({ name: "kb" });
    const ids: string[] = [];
    for (const content of ["service a", "service b", "service c"]) {
      const created = await request(ctx.app).post("/api/indexes/kb/documents").send({ content });
      ids.push(created.body.doc_id);
    }
    [a = "", b = "", c = ""] = ids;
  });

  it("declares idempotently, keeping the last reason", async () => {
    const first = await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: b, rel_type: "DEPENDS_ON", reason: "r1" });
    const second = await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: b, rel_type: "DEPENDS_ON", reason: "r2" });

    expect(first.status).toBe(201);
    expect(first.body.created).toBe(true);
    expect(second.status).toBe(200);
    expect(second.body.created).toBe(false);
    expect(second.body.relationship).toMatchObject({
      index_name: "kb",
      source_doc_id: a,
      target_doc_id: b,
      rel_type: "DEPENDS_ON",
      reason: "r2"
    });

    const analytics = await request(ctx.app).get("/api/indexes/kb/analytics");
    expect(analytics.body.edge_count).toBe(1);
    expect(analytics.body.sample_edges[0].reason).toBe("r2");
  });

  it("rejects invalid relationship types and unknown endpoints", async () => {
    const invalid = await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: b, rel_type: "depends on" });
    expect(invalid.status).toBe(400);
    expect(invalid.body.code).toBe("VALIDATION_ERROR");

    const missing = await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: "ghost", rel_type: "DEPENDS_ON" });
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe('Document "ghost" not found in index "kb"');
  });

  it("lists the edges of a chunk and removes an edge", async () => {
    await request(ctx.app)
      .post("/api/indexes/kb/relationships/batch")
      .send({
        relationships: [
          { source_doc_id: a, target_doc_id: b, rel_type: "CALLS" },
          { source_doc_id: c, target_doc_id: a, rel_type: "CALLS" }
        ]
      })
      .expect(201);

    const listed = await request(ctx.app).get(`/api/indexes/kb/documents/${a}/relationships`);
    expect(listed.status).toBe(200);
    expect(listed.body.doc_id).toBe(a);
    expect(listed.body.outgoing.map((edge: { target_doc_id: string }) => edge.target_doc_id)).toEqual([b]);
    expect(listed.body.incoming.map((edge: { source_doc_id: string }) => edge.source_doc_id)).toEqual([c]);

    const key = { source_doc_id: a, target_doc_id: b, rel_type: "CALLS" };
    expect((await request(ctx.app).delete("/api/indexes/kb/relationships").send(key)).status).toBe(204);
    expect((await request(ctx.app).delete("/api/indexes/kb/relationships").send(key)).status).toBe(404);
  });

  it("drops incident edges when a chunk is deleted", async () => {
    await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: b, rel_type: "CALLS" });
    await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: b, target_doc_id: c, rel_type: "CALLS" });

    await request(ctx.app).delete(`/api/indexes/kb/documents/${b}`).expect(204);

    const analytics = await request(ctx.app).get("/api/indexes/kb/analytics");
    expect(analytics.body).toEqual({
      index_name: "kb",
      chunk_count: 2,
      edge_count: 0,
      rel_type_distribution: {},
      sample_edges: []
    });
  });

  it("reports a partially failed bulk declaration with 207", async () => {
    const response = await request(ctx.app)
      .post("/api/indexes/kb/relationships/batch")
      .send({
        relationships: [
          { source_doc_id: a, target_doc_id: b, rel_type: "CALLS" },
          { source_doc_id: a, target_doc_id: "ghost", rel_type: "CALLS" }
        ]
      });

    expect(response.status).toBe(207);
    expect(response.body.created).toBe(1);
    expect(response.body.results[0].result.created).toBe(true);
    expect(response.body.results[1].error.code).toBe("NOT_FOUND");
  });

  it("marks reconfirmed edges in a bulk declaration", async () => {
    await request(ctx.app)
      .post("/api/indexes/kb/relationships")
      .send({ source_doc_id: a, target_doc_id: b, rel_type: "CALLS", reason: "old" })
      .expect(201);

    const response = await request(ctx.app)
      .post("/api/indexes/kb/relationships/batch")
      .send({
        relationships: [
          { source_doc_id: a, target_doc_id: b, rel_type: "CALLS", reason: "new" },
          { source_doc_id: b, target_doc_id: c, rel_type: "CALLS" }
        ]
      });

    expect(response.status).toBe(201);
    expect(response.body.created).toBe(2);
    expect(response.body.failed).toBe(0);
    expect(
      response.body.results.map((item: { status: string; result: { created: boolean } }) => [
        item.status,
        item.result.created
      ])
    ).toEqual([
      ["created", false],
      ["created", true]
    ]);
    expect(response.body.results[0].result.relationship.reason).toBe("new");
  });

  it("summarizes relationship types in analytics", async () => {
    for (const [source, target, relType] of [
      [a, b, "CALLS"],
      [b, c, "CALLS"],
      [c, a, "OWNS"]
    ]) {
      await request(ctx.app)
        .post("/api/indexes/kb/relationships")
        .send({ source_doc_id: source, target_doc_id: target, rel_type: relType });
    }

    const analytics = await request(ctx.app).get("/api/indexes/kb/analytics");

    expect(analytics.status).toBe(200);
    expect(analytics.body.chunk_count).toBe(3);
    expect(analytics.body.edge_count).toBe(3);
    expect(analytics.body.rel_type_distribution).toEqual({ CALLS: 2, OWNS: 1 });
  });
});
