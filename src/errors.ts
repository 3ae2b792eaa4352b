/**
 * Error types shared by the crawl, chunk and retrieval pipeline.
 *
 * Per-page failures (`FetchFailureError`, `ExtractionEmptyError`) are recorded
 * and skipped by the crawler; the rest surface to the caller.
 */

export type ErrorCode =
  | "INVALID_CONFIGURATION"
  | "UNREACHABLE_ROOT"
  | "FETCH_FAILURE"
  | "EXTRACTION_EMPTY"
  | "COLLABORATOR_FAILURE";

export class SiteQaError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidConfigurationError extends SiteQaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_CONFIGURATION", details);
  }
}

export class UnreachableRootError extends SiteQaError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Base URL is unreachable: ${url} (${reason})`, "UNREACHABLE_ROOT", { url }, { cause });
    this.url = url;
  }
}

export class FetchFailureError extends SiteQaError {
  readonly url: string;
  readonly status?: number;
  readonly transient: boolean;

  constructor(url: string, message: string, options: { status?: number; transient: boolean; cause?: unknown }) {
    super(message, "FETCH_FAILURE", { url, status: options.status }, { cause: options.cause });
    this.url = url;
    this.status = options.status;
    this.transient = options.transient;
  }
}

export class ExtractionEmptyError extends SiteQaError {
  constructor(url: string) {
    super(`No readable text extracted from ${url}`, "EXTRACTION_EMPTY", { url });
  }
}

export type CollaboratorService = "embedder" | "vector_store" | "llm";
export type FailureKind = "transient" | "permanent";

export class CollaboratorError extends SiteQaError {
  readonly service: CollaboratorService;
  readonly kind: FailureKind;

  constructor(
    service: CollaboratorService,
    kind: FailureKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, "COLLABORATOR_FAILURE", { service, kind, status: options?.status }, { cause: options?.cause });
    this.service = service;
    this.kind = kind;
  }
}

/** HTTP statuses worth retrying: timeouts, rate limits and server errors. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

const TRANSIENT_MESSAGE = /network|timeout|timed out|econnreset|econnrefused|socket hang up|fetch failed/i;

export function isTransientError(error: unknown): boolean {
  if (error instanceof CollaboratorError) {
    return error.kind === "transient";
  }
  if (error instanceof FetchFailureError) {
    return error.transient;
  }
  if (error instanceof SiteQaError) {
    return false;
  }
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TimeoutError" || TRANSIENT_MESSAGE.test(error.message);
  }
  return false;
}

/**
 * Wrap an unknown failure from an external service, keeping an existing
 * classification when there is one.
 */
export function toCollaboratorError(service: CollaboratorService, error: unknown, action: string): CollaboratorError {
  if (error instanceof CollaboratorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const kind: FailureKind = isTransientError(error) ? "transient" : "permanent";
  return new CollaboratorError(service, kind, `${action} failed: ${message}`, { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
