// ============================================================================
// Host Error Taxonomy
// ============================================================================

export type HostErrorCode =
  | "host_unavailable"
  | "document_not_found"
  | "stale_handle"
  | "not_owned"
  | "read_only"
  | "platform_call_failed";

export type HostErrorDetails = Record<string, string | number | boolean | null>;

// Base class for every typed failure the session surfaces to the tool layer.
export class HostError extends Error {
  readonly code: HostErrorCode;
  readonly details: HostErrorDetails;

  constructor(code: HostErrorCode, message: string, details: HostErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, string | number | boolean | null> {
    return { error: this.message, error_type: this.code, ...this.details };
  }
}

// Handle missing or binding initialization failed; recoverable with start().
export class HostUnavailableError extends HostError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("host_unavailable", `Host application is not available: ${reason}`, { reason }, options);
  }
}

export class DocumentNotFoundError extends HostError {
  readonly path: string;

  constructor(path: string) {
    super("document_not_found", `Document not found: ${path}`, { path });
    this.path = path;
  }
}

// Liveness probe failed. Recovered inside the session, not expected by callers.
export class StaleHandleError extends HostError {
  constructor(what: string, options?: { cause?: unknown }) {
    super("stale_handle", `Handle no longer responds: ${what}`, { handle: what }, options);
  }
}

export class NotOwnedError extends HostError {
  readonly path: string;

  constructor(path: string) {
    super(
      "not_owned",
      `Document was not opened by this session and will not be closed without force: ${path}`,
      { path }
    );
    this.path = path;
  }
}

// A mutating operation reached a document the session holds open read-only.
export class ReadOnlyDocumentError extends HostError {
  readonly path: string;

  constructor(path: string) {
    super("read_only", `Document is open read-only and cannot be modified: ${path}`, { path });
    this.path = path;
  }
}

export class PlatformCallFailedError extends HostError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const message = describeError(cause);
    super(
      "platform_call_failed",
      `Platform call failed during ${operation}: ${message}`,
      { operation, platform_error: message },
      { cause }
    );
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Run a binding call, keeping typed errors and wrapping everything else.
export async function platformCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof HostError) {
      throw error;
    }
    throw new PlatformCallFailedError(operation, error);
  }
}
