import { Router } from "express";
import { z } from "zod";
import type { IndexResponse } from "@chunkgraph/shared";
import { asyncHandler, requireStore } from "../middleware/asyncHandler.js";
import { validate } from "../middleware/validator.js";
import type { IndexRegistry } from "../services/IndexRegistry.js";
import { indexNameSchema, indexParamsSchema } from "./schemas.js";
import { setPageHeaders, toIndexResponse } from "./serializers.js";

const createIndexBodySchema = z.object({
  name: indexNameSchema,
  description: z.string().max(500).nullable().optional(),
  dimension: z.number().int().min(1).max(16_384).optional()
});

// name and dimension are immutable, so unknown keys are rejected outright
const updateIndexBodySchema = z
  .object({
    description: z.string().max(500).nullable().optional()
  })
  .strict();

const listIndexesQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20)
});

export interface CreateIndexesRouterOptions {
  registry: IndexRegistry;
  ensureStoreConnected: () => Promise<void>;
}

export function createIndexesRouter(options: CreateIndexesRouterOptions): Router {
  const { registry } = options;
  const indexesRouter = Router();

  indexesRouter.use(requireStore(options.ensureStoreConnected));

  indexesRouter.post(
    "/",
    validate({ body: createIndexBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof createIndexBodySchema> = req.body;
      const index = await registry.create({
        name: body.name,
        ...(body.dimension !== undefined ? { dimension: body.dimension } : {}),
        ...(body.description !== undefined ? { description: body.description } : {})
      });
      const response: IndexResponse = toIndexResponse(index);
      res.status(201).json(response);
    })
  );

  indexesRouter.get(
    "/",
    validate({ query: listIndexesQuerySchema }),
    asyncHandler(async (req, res) => {
      const { page, pageSize } = req.query as unknown as z.infer<typeof listIndexesQuerySchema>;
      const result = await registry.list({ page, pageSize });
      setPageHeaders(res, result.total, page, pageSize);
      const response: IndexResponse[] = result.items.map(toIndexResponse);
      res.json(response);
    })
  );

  indexesRouter.get(
    "/:name",
    validate({ params: indexParamsSchema }),
    asyncHandler(async (req, res) => {
      const index = await registry.get(req.params.name ?? "");
      res.json(toIndexResponse(index));
    })
  );

  indexesRouter.put(
    "/:name",
    validate({ params: indexParamsSchema, body: updateIndexBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof updateIndexBodySchema> = req.body;
      const index = await registry.update(
        req.params.name ?? "",
        body.description !== undefined ? { description: body.description } : {}
      );
      res.json(toIndexResponse(index));
    })
  );

  indexesRouter.delete(
    "/:name",
    validate({ params: indexParamsSchema }),
    asyncHandler(async (req, res) => {
      await registry.delete(req.params.name ?? "");
      res.status(204).send();
    })
  );

  return indexesRouter;
}
