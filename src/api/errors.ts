import type { Context } from "hono";
import { ZodError } from "zod";
import { PipelineError, ValidationFailedError, type PipelineErrorCode } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "api-errors" });

type ErrorStatus = 400 | 403 | 404 | 422 | 429 | 500 | 502;

const STATUS_BY_CODE: Record<PipelineErrorCode, ErrorStatus> = {
  ACCESS_DENIED: 403,
  RATE_LIMITED: 429,
  REQUEST_FAILED: 502,
  VALIDATION_FAILED: 422,
  EXTRACTION_FALLBACK: 500,
};

/** Raised by handlers for a malformed request body. */
export class BadRequestError extends Error {}

export class NotFoundError extends Error {}

export function toErrorResponse(c: Context, err: unknown): Response {
  if (err instanceof ZodError) {
    return c.json(
      {
        error: {
          code: "VALIDATION_FAILED",
          message: "Validation failed",
          issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
        },
      },
      422
    );
  }

  if (err instanceof ValidationFailedError) {
    return c.json({ error: { code: err.code, message: err.message, issues: err.issues } }, 422);
  }

  if (err instanceof PipelineError) {
    return c.json({ error: { code: err.code, message: err.message } }, STATUS_BY_CODE[err.code]);
  }

  if (err instanceof BadRequestError) {
    return c.json({ error: { code: "BAD_REQUEST", message: err.message } }, 400);
  }

  if (err instanceof NotFoundError) {
    return c.json({ error: { code: "NOT_FOUND", message: err.message } }, 404);
  }

  log.error({ err, path: c.req.path }, "Unhandled API error");
  return c.json({ error: { code: "INTERNAL_ERROR", message: "Internal error" } }, 500);
}
