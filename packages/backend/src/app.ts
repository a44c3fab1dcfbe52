import cors from "cors";
import express, { type Express } from "express";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createDocumentsRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import { createIndexesRouter } from "./routes/indexes.js";
import { createRelationshipsRouter } from "./routes/relationships.js";
import { createSearchRouter } from "./routes/search.js";
import {
  checkEmbeddingConnection,
  checkNeo4jConnection,
  isEmbeddingConfigured,
  isNeo4jConfigured
} from "./runtime/connectivity.js";
import type { RuntimeContainer } from "./runtime/container.js";

export function createApp(container: RuntimeContainer): Express {
  const { config, ensureStoreConnected } = container;
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: config.CORS_ORIGIN,
      exposedHeaders: ["x-total-count", "x-page", "x-page-size"]
    })
  );
  app.use(express.json({ limit: config.JSON_BODY_LIMIT }));
  app.use(createApiRateLimiter(config));

  app.use(
    "/api/health",
    createHealthRouter({
      checkNeo4j: () =>
        checkNeo4jConnection({
          store: container.store,
          ensureStoreConnected,
          configured: isNeo4jConfigured(config)
        }),
      checkEmbedding: () =>
        checkEmbeddingConnection({
          embeddings: container.embeddings,
          configured: isEmbeddingConfigured(config)
        })
    })
  );
  app.use(
    "/api/indexes/:name/documents",
    createDocumentsRouter({ chunkStore: container.chunkStore, ensureStoreConnected })
  );
  app.use(
    "/api/indexes/:name",
    createRelationshipsRouter({ relationshipGraph: container.relationshipGraph, ensureStoreConnected })
  );
  app.use(
    "/api/indexes",
    createIndexesRouter({ registry: container.indexRegistry, ensureStoreConnected })
  );
  app.use(
    "/api/search",
    createSearchRouter({
      searchEngine: container.searchEngine,
      answerSynthesizer: container.answerSynthesizer,
      ensureStoreConnected
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
