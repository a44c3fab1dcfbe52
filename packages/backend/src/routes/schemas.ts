import { z } from "zod";
import type { ChunkMetadata } from "@chunkgraph/shared";
import { isMetadataObject } from "../utils/metadata.js";

// returns the parsed object itself, so own "__proto__" keys are kept
export const metadataSchema = z.custom<ChunkMetadata>(isMetadataObject, {
  message: "metadata must be an object of JSON values with finite numbers"
});

export const embeddingSchema = z.array(z.number().finite()).min(1);

export const indexNameSchema = z.string().trim().min(1).max(120);

export const docIdSchema = z.string().min(1).max(128);

export const relTypeSchema = z
  .string()
  .regex(/^[A-Za-z0-9_]{1,64}$/, "rel_type must be 1-64 characters of letters, digits or underscore");

export const indexParamsSchema = z.object({
  name: indexNameSchema
});

export const documentParamsSchema = z.object({
  name: indexNameSchema,
  doc_id: docIdSchema
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(1000).optional()
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

export const createDocumentBodySchema = z.object({
  content: z.string().min(1),
  metadata: metadataSchema.optional(),
  embedding: embeddingSchema.optional()
});

export const relationshipKeyBodySchema = z.object({
  source_doc_id: docIdSchema,
  target_doc_id: docIdSchema,
  rel_type: relTypeSchema
});

export const declareRelationshipBodySchema = relationshipKeyBodySchema.extend({
  reason: z.string().max(2000).optional()
});
