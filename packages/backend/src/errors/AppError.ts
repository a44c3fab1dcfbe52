import type { ApiErrorCode } from "@chunkgraph/shared";

export abstract class AppError extends Error {
  abstract readonly code: ApiErrorCode;
  abstract readonly status: number;

  constructor(
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConflictError extends AppError {
  readonly code = "CONFLICT";
  readonly status = 409;
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
}

export class DimensionMismatchError extends AppError {
  readonly code = "DIMENSION_MISMATCH";
  readonly status = 422;

  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Embedding has ${actual} dimensions, index expects ${expected}`, {
      expected,
      actual
    });
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 400;
}

export class UpstreamTimeoutError extends AppError {
  readonly code = "UPSTREAM_TIMEOUT";
  readonly status = 504;
}

export class UpstreamError extends AppError {
  readonly code = "UPSTREAM_ERROR";
  readonly status = 502;
}

export class PartialFailureError extends AppError {
  readonly code = "PARTIAL_FAILURE";
  readonly status = 207;
}

export class CancelledError extends AppError {
  readonly code = "CANCELLED";
  readonly status = 499;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): { code: ApiErrorCode; message: string } {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error)
  };
}
