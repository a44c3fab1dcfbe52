import type { RequestHandler } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@chunkgraph/shared";

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

export function formatZodIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const response: ApiErrorResponse = {
          error: "Validation failed",
          code: "VALIDATION_ERROR",
          details: formatZodIssues(error)
        };
        res.status(400).json(response);
        return;
      }

      next(error);
    }
  };
};
