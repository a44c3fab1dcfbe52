import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createHealthRouter } from "../../src/routes/health.js";
import { createTestApp } from "../helpers/testApp.js";

describe("health api", () => {
  it("returns ok when dependencies are healthy", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkNeo4j: async () => "ok",
        checkEmbedding: async () => "ok",
        startTime: Date.now() - 5_000
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ neo4j: "ok", embedding: "ok" });
    expect(response.body.uptimeSec).toBeGreaterThanOrEqual(5);
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("returns degraded when one dependency fails", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkNeo4j: async () => "failed",
        checkEmbedding: async () => "not_configured"
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({
      neo4j: "failed",
      embedding: "not_configured"
    });
  });

  it("probes the store and the embedding provider of the running app", async () => {
    const ctx = createTestApp();

    const response = await request(ctx.app).get("/api/health");

    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ neo4j: "ok", embedding: "ok" });
    expect(ctx.store.connectCalls).toBe(1);
  });

  it("reports the store as failed while it cannot connect", async () => {
    const ctx = createTestApp();
    ctx.store.failConnect = true;

    const response = await request(ctx.app).get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({ neo4j: "failed", embedding: "ok" });
  });

  it("reports an unconfigured embedding provider", async () => {
    const ctx = createTestApp({ env: { EMBEDDING_PROVIDER: "openai", EMBEDDING_API_KEY: "" } });

    const response = await request(ctx.app).get("/api/health");

    expect(response.body.status).toBe("ok");
    expect(response.body.checks.embedding).toBe("not_configured");
  });
});
