/**
 * Error taxonomy shared by the engines, stores and remote adapters.
 */

export type SyncErrorCode =
  | "configuration"
  | "remote_unreachable"
  | "remote_rejected"
  | "not_found"
  | "malformed_remote_response";

/**
 * Base class for every error erpsync raises on purpose.
 */
export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration. Raised before any I/O.
 */
export class ConfigurationError extends SyncError {
  readonly code = "configuration";
}

/**
 * Network or connection-level failure, including request timeouts. Always retryable.
 */
export class RemoteUnreachable extends SyncError {
  readonly code = "remote_unreachable";
}

/**
 * The remote endpoint answered with an application-level error status.
 */
export class RemoteRejected extends SyncError {
  readonly code = "remote_rejected";

  constructor(
    readonly statusCode: number,
    readonly body: string
  ) {
    super(`Remote endpoint responded ${statusCode}: ${truncate(body, 500)}`);
  }
}

/**
 * No local record with the given identifier.
 */
export class NotFound extends SyncError {
  readonly code = "not_found";

  constructor(readonly localId: string) {
    super(`Record not found: ${localId}`);
  }
}

/**
 * Success status, but the body lacks what the caller needs (e.g. no identifier on create).
 */
export class MalformedRemoteResponse extends SyncError {
  readonly code = "malformed_remote_response";
}

/**
 * Render any thrown value for logs and pass reports.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
