import { Router } from "express";
import { z } from "zod";
import type { SearchResponse } from "@chunkgraph/shared";
import { CancelledError } from "../errors/AppError.js";
import { asyncHandler, requireStore } from "../middleware/asyncHandler.js";
import { validate } from "../middleware/validator.js";
import type { AnswerSynthesizer } from "../services/embeddingTypes.js";
import type { HybridSearchEngine } from "../search/HybridSearchEngine.js";
import { logger } from "../utils/logger.js";
import { indexNameSchema } from "./schemas.js";
import { toSearchChunkResponse } from "./serializers.js";

const searchBodySchema = z.object({
  index_name: indexNameSchema,
  query: z.string().max(10_000),
  keywords: z.array(z.string().max(200)).max(50).optional(),
  top_k: z.number().optional(),
  strategy: z.enum(["vector", "hybrid", "graph"]).optional()
});

export interface CreateSearchRouterOptions {
  searchEngine: HybridSearchEngine;
  answerSynthesizer?: AnswerSynthesizer | null;
  ensureStoreConnected: () => Promise<void>;
}

export function createSearchRouter(options: CreateSearchRouterOptions): Router {
  const { searchEngine, answerSynthesizer } = options;
  const searchRouter = Router();

  searchRouter.post(
    "/",
    requireStore(options.ensureStoreConnected),
    validate({ body: searchBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof searchBodySchema> = req.body;

      // a closed socket before the response is written means the client left
      const controller = new AbortController();
      const onClose = (): void => {
        if (!res.writableFinished) {
          controller.abort(new CancelledError("Client closed the request"));
        }
      };
      res.on("close", onClose);

      try {
        const hits = await searchEngine.search(
          {
            indexName: body.index_name,
            query: body.query,
            ...(body.keywords !== undefined ? { keywords: body.keywords } : {}),
            ...(body.top_k !== undefined ? { topK: body.top_k } : {}),
            ...(body.strategy !== undefined ? { strategy: body.strategy } : {})
          },
          { signal: controller.signal }
        );

        const response: SearchResponse = { chunks: hits.map(toSearchChunkResponse) };
        if (answerSynthesizer && hits.length > 0) {
          try {
            response.answer = await answerSynthesizer.synthesize(
              { query: body.query, chunks: hits.map((hit) => hit.chunk) },
              { signal: controller.signal }
            );
          } catch (error) {
            logger.warn({ err: error, indexName: body.index_name }, "Answer synthesis failed");
          }
        }
        res.json(response);
      } finally {
        res.off("close", onClose);
      }
    })
  );

  return searchRouter;
}
