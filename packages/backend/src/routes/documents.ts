import { Router } from "express";
import { z } from "zod";
import type { DocumentResponse } from "@chunkgraph/shared";
import { asyncHandler, requireStore } from "../middleware/asyncHandler.js";
import { validate } from "../middleware/validator.js";
import type { ChunkStore, CreateDocumentInput, UpdateDocumentInput } from "../services/ChunkStore.js";
import {
  createDocumentBodySchema,
  documentParamsSchema,
  embeddingSchema,
  indexParamsSchema,
  metadataSchema,
  pageQuerySchema,
  type PageQuery
} from "./schemas.js";
import { sendBatchOutcomes, setPageHeaders, toDocumentResponse } from "./serializers.js";

const batchCreateBodySchema = z.object({
  documents: z.array(createDocumentBodySchema).min(1).max(500)
});

const updateDocumentBodySchema = z
  .object({
    content: z.string().min(1).optional(),
    metadata: metadataSchema.optional(),
    embedding: embeddingSchema.optional()
  })
  .strict();

type CreateDocumentBody = z.infer<typeof createDocumentBodySchema>;

function toCreateInput(body: CreateDocumentBody): CreateDocumentInput {
  const input: CreateDocumentInput = { content: body.content };
  if (body.metadata !== undefined) {
    input.metadata = body.metadata;
  }
  if (body.embedding !== undefined) {
    input.embedding = body.embedding;
  }
  return input;
}

export interface CreateDocumentsRouterOptions {
  chunkStore: ChunkStore;
  ensureStoreConnected: () => Promise<void>;
}

/** Mounted below `/indexes/:name/documents`. */
export function createDocumentsRouter(options: CreateDocumentsRouterOptions): Router {
  const { chunkStore } = options;
  const documentsRouter = Router({ mergeParams: true });

  documentsRouter.use(requireStore(options.ensureStoreConnected));

  documentsRouter.post(
    "/",
    validate({ params: indexParamsSchema, body: createDocumentBodySchema }),
    asyncHandler(async (req, res) => {
      const body: CreateDocumentBody = req.body;
      const chunk = await chunkStore.createDocument(req.params.name ?? "", toCreateInput(body));
      const response: DocumentResponse = toDocumentResponse(chunk);
      res.status(201).json(response);
    })
  );

  documentsRouter.post(
    "/batch",
    validate({ params: indexParamsSchema, body: batchCreateBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof batchCreateBodySchema> = req.body;
      const outcomes = await chunkStore.createDocuments(
        req.params.name ?? "",
        body.documents.map(toCreateInput)
      );
      sendBatchOutcomes(res, outcomes, toDocumentResponse);
    })
  );

  documentsRouter.get(
    "/",
    validate({ params: indexParamsSchema, query: pageQuerySchema }),
    asyncHandler(async (req, res) => {
      const { page, pageSize } = req.query as unknown as PageQuery;
      const chunks = await chunkStore.listDocuments(req.params.name ?? "");

      const size = pageSize ?? Math.max(chunks.length, 1);
      const offset = (page - 1) * size;
      setPageHeaders(res, chunks.length, page, size);
      const response: DocumentResponse[] = chunks.slice(offset, offset + size).map(toDocumentResponse);
      res.json(response);
    })
  );

  documentsRouter.get(
    "/:doc_id",
    validate({ params: documentParamsSchema }),
    asyncHandler(async (req, res) => {
      const chunk = await chunkStore.getDocument(req.params.name ?? "", req.params.doc_id ?? "");
      res.json(toDocumentResponse(chunk));
    })
  );

  documentsRouter.put(
    "/:doc_id",
    validate({ params: documentParamsSchema, body: updateDocumentBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof updateDocumentBodySchema> = req.body;
      const input: UpdateDocumentInput = {};
      if (body.content !== undefined) {
        input.content = body.content;
      }
      if (body.metadata !== undefined) {
        input.metadata = body.metadata;
      }
      if (body.embedding !== undefined) {
        input.embedding = body.embedding;
      }

      const chunk = await chunkStore.updateDocument(
        req.params.name ?? "",
        req.params.doc_id ?? "",
        input
      );
      res.json(toDocumentResponse(chunk));
    })
  );

  documentsRouter.delete(
    "/:doc_id",
    validate({ params: documentParamsSchema }),
    asyncHandler(async (req, res) => {
      await chunkStore.deleteDocument(req.params.name ?? "", req.params.doc_id ?? "");
      res.status(204).send();
    })
  );

  return documentsRouter;
}
