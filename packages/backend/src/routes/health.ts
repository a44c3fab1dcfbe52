import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@chunkgraph/shared";
import { asyncHandler } from "../middleware/asyncHandler.js";

interface CreateHealthRouterOptions {
  checkNeo4j: () => Promise<ServiceConnectionStatus>;
  checkEmbedding: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions): Router {
  const startTime = options.startTime ?? Date.now();
  const healthRouter = Router();

  healthRouter.get(
    "/",
    asyncHandler(async (_req, res) => {
      const [neo4j, embedding] = await Promise.all([options.checkNeo4j(), options.checkEmbedding()]);
      const status: HealthResponse["status"] =
        neo4j === "failed" || embedding === "failed" ? "degraded" : "ok";

      const mem = process.memoryUsage();
      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
        checks: {
          neo4j,
          embedding
        },
        memoryUsage: {
          rss: mem.rss,
          heapUsed: mem.heapUsed,
          heapTotal: mem.heapTotal
        }
      };
      res.json(response);
    })
  );

  return healthRouter;
}
