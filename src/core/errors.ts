export type PipelineStage = "auth" | "fetch" | "parse" | "download";

export type PipelineErrorCode =
  | "CACHE_CORRUPT"
  | "LOGIN_FAILED"
  | "EXTRACTION_TIMEOUT"
  | "INCOMPLETE_HEADERS"
  | "AUTH_REJECTED"
  | "NETWORK_ERROR"
  | "SERVER_ERROR"
  | "REPORT_FORMAT";

/**
 * Base class for every failure the pipeline surfaces. `stage` tells the
 * operator which part of the run broke; `code` is stable for callers.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly code: PipelineErrorCode;

  constructor(stage: PipelineStage, code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
    this.code = code;
  }
}

export class CacheCorruptError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", "CACHE_CORRUPT", message, options);
  }
}

export class LoginFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", "LOGIN_FAILED", message, options);
  }
}

export class ExtractionTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super("auth", "EXTRACTION_TIMEOUT", `No authenticated API request observed within ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

export class IncompleteHeaderSetError extends PipelineError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("auth", "INCOMPLETE_HEADERS", `Captured header set is missing: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class AuthRejectedError extends PipelineError {
  constructor(message: string) {
    super("fetch", "AUTH_REJECTED", message);
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fetch", "NETWORK_ERROR", message, options);
  }
}

export class ServerError extends PipelineError {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super("fetch", "SERVER_ERROR", message);
    this.statusCode = statusCode;
  }
}

export class ReportFormatError extends PipelineError {
  constructor(message: string) {
    super("parse", "REPORT_FORMAT", message);
  }
}

const REMEDIATION: Record<PipelineErrorCode, string> = {
  CACHE_CORRUPT: "the header cache will be rebuilt on the next run",
  LOGIN_FAILED: "check PORTAL_USERNAME / PORTAL_PASSWORD, or supply AUTH_TOKEN",
  EXTRACTION_TIMEOUT: "re-run with --force-refresh, raise NETWORK_IDLE_TIMEOUT_MS, or supply AUTH_TOKEN",
  INCOMPLETE_HEADERS: "re-run with --force-refresh or supply AUTH_TOKEN",
  AUTH_REJECTED: "re-run with --force-refresh, or replace AUTH_TOKEN if one is configured",
  NETWORK_ERROR: "check connectivity to the report API and retry",
  SERVER_ERROR: "the report API returned an error; retry later",
  REPORT_FORMAT: "the report API answered with an unexpected body; inspect the logs",
};

export function describeFailure(error: unknown): string {
  if (error instanceof PipelineError) {
    return `[${error.stage}] ${error.message} (${REMEDIATION[error.code]})`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
