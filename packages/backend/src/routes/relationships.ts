import { Router } from "express";
import { z } from "zod";
import type {
  AnalyticsResponse,
  DeclareRelationshipResponse,
  DocumentRelationshipsResponse,
  RelationshipUpsertResult
} from "@chunkgraph/shared";
import { asyncHandler, requireStore } from "../middleware/asyncHandler.js";
import { validate } from "../middleware/validator.js";
import type { DeclareRelationshipInput, RelationshipGraph } from "../services/RelationshipGraph.js";
import {
  declareRelationshipBodySchema,
  documentParamsSchema,
  indexParamsSchema,
  relationshipKeyBodySchema
} from "./schemas.js";
import { sendBatchOutcomes, toAnalyticsResponse, toRelationshipResponse } from "./serializers.js";

type DeclareRelationshipBody = z.infer<typeof declareRelationshipBodySchema>;

const batchDeclareBodySchema = z.object({
  relationships: z.array(declareRelationshipBodySchema).min(1).max(1000)
});

function toDeclareInput(body: DeclareRelationshipBody): DeclareRelationshipInput {
  const input: DeclareRelationshipInput = {
    sourceDocId: body.source_doc_id,
    targetDocId: body.target_doc_id,
    relType: body.rel_type
  };
  if (body.reason !== undefined) {
    input.reason = body.reason;
  }
  return input;
}

function toDeclareResponse(result: RelationshipUpsertResult): DeclareRelationshipResponse {
  return {
    created: result.created,
    relationship: toRelationshipResponse(result.edge)
  };
}

export interface CreateRelationshipsRouterOptions {
  relationshipGraph: RelationshipGraph;
  ensureStoreConnected: () => Promise<void>;
}

/** Mounted below `/indexes/:name`; serves edges and analytics of one index. */
export function createRelationshipsRouter(options: CreateRelationshipsRouterOptions): Router {
  const { relationshipGraph } = options;
  const relationshipsRouter = Router({ mergeParams: true });

  relationshipsRouter.use(requireStore(options.ensureStoreConnected));

  relationshipsRouter.post(
    "/relationships",
    validate({ params: indexParamsSchema, body: declareRelationshipBodySchema }),
    asyncHandler(async (req, res) => {
      const body: DeclareRelationshipBody = req.body;
      const result = await relationshipGraph.declareRelationship(
        req.params.name ?? "",
        toDeclareInput(body)
      );
      res.status(result.created ? 201 : 200).json(toDeclareResponse(result));
    })
  );

  relationshipsRouter.post(
    "/relationships/batch",
    validate({ params: indexParamsSchema, body: batchDeclareBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof batchDeclareBodySchema> = req.body;
      const outcomes = await relationshipGraph.declareRelationships(
        req.params.name ?? "",
        body.relationships.map(toDeclareInput)
      );
      sendBatchOutcomes(res, outcomes, toDeclareResponse);
    })
  );

  relationshipsRouter.delete(
    "/relationships",
    validate({ params: indexParamsSchema, body: relationshipKeyBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.infer<typeof relationshipKeyBodySchema> = req.body;
      await relationshipGraph.removeRelationship(req.params.name ?? "", {
        sourceDocId: body.source_doc_id,
        targetDocId: body.target_doc_id,
        relType: body.rel_type
      });
      res.status(204).send();
    })
  );

  relationshipsRouter.get(
    "/documents/:doc_id/relationships",
    validate({ params: documentParamsSchema }),
    asyncHandler(async (req, res) => {
      const relationships = await relationshipGraph.listRelationships(
        req.params.name ?? "",
        req.params.doc_id ?? ""
      );
      const response: DocumentRelationshipsResponse = {
        doc_id: relationships.docId,
        outgoing: relationships.outgoing.map(toRelationshipResponse),
        incoming: relationships.incoming.map(toRelationshipResponse)
      };
      res.json(response);
    })
  );

  relationshipsRouter.get(
    "/analytics",
    validate({ params: indexParamsSchema }),
    asyncHandler(async (req, res) => {
      const analytics = await relationshipGraph.analytics(req.params.name ?? "");
      const response: AnalyticsResponse = toAnalyticsResponse(analytics);
      res.json(response);
    })
  );

  return relationshipsRouter;
}
