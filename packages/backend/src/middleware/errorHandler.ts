import type { ErrorRequestHandler, RequestHandler } from "express";
import { Neo4jError } from "neo4j-driver";
import type { ApiErrorResponse } from "@chunkgraph/shared";
import { isAppError } from "../errors/AppError.js";
import { StoreUnavailableError } from "../store/storeErrors.js";
import { logger } from "../utils/logger.js";

const UNAVAILABLE_NEO4J_CODES = new Set([
  "ServiceUnavailable",
  "SessionExpired",
  "Neo.TransientError.General.DatabaseUnavailable"
]);

export const notFoundHandler: RequestHandler = (_req, res) => {
  const response: ApiErrorResponse = { error: "Route not found", code: "NOT_FOUND" };
  res.status(404).json(response);
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isAppError(err)) {
    if (err.status >= 500) {
      logger.warn({ err, url: req.originalUrl }, "Upstream failure");
    }
    const response: ApiErrorResponse = { error: err.message, code: err.code };
    if (err.details !== undefined) {
      response.details = err.details;
    }
    res.status(err.status).json(response);
    return;
  }

  if (
    err instanceof StoreUnavailableError ||
    (err instanceof Neo4jError && UNAVAILABLE_NEO4J_CODES.has(err.code))
  ) {
    logger.error({ err }, "Graph store unavailable");
    const response: ApiErrorResponse = {
      error: "Graph store unavailable",
      code: "STORE_UNAVAILABLE"
    };
    res.status(503).json(response);
    return;
  }

  const clientStatus = getClientErrorStatus(err);
  if (clientStatus !== null) {
    const response: ApiErrorResponse = {
      error: err instanceof Error ? err.message : "Bad request",
      code: "VALIDATION_ERROR"
    };
    res.status(clientStatus).json(response);
    return;
  }

  logger.error({ err }, "Unhandled error");
  const response: ApiErrorResponse = { error: "Internal server error", code: "INTERNAL_ERROR" };
  res.status(500).json(response);
};

// body-parser errors carry an http status and `expose: true`
function getClientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !("status" in err) || !("expose" in err)) {
    return null;
  }
  const { status, expose } = err;
  if (typeof status === "number" && status >= 400 && status < 500 && expose === true) {
    return status;
  }
  return null;
}
