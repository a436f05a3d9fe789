export type PipelineErrorCode =
  | "ACCESS_DENIED"
  | "RATE_LIMITED"
  | "REQUEST_FAILED"
  | "VALIDATION_FAILED"
  | "EXTRACTION_FALLBACK";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The repository cannot be read with the configured credentials. */
export class AccessDeniedError extends PipelineError {
  constructor(readonly repo: string, options?: { cause?: unknown }) {
    super("ACCESS_DENIED", `Cannot access repository ${repo}`, options);
  }
}

/** The API kept rejecting requests for rate limiting after the retry. */
export class RateLimitedError extends PipelineError {
  constructor(readonly url: string) {
    super("RATE_LIMITED", `Rate limit still exceeded after retry: ${url}`);
  }
}

/** Non-2xx answer that is not a rate-limit rejection. */
export class RequestFailedError extends PipelineError {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super("REQUEST_FAILED", `Request to ${url} failed with status ${status}`, options);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationFailedError extends PipelineError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super("VALIDATION_FAILED", message);
  }
}

export class ExtractionFallbackError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXTRACTION_FALLBACK", message, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
