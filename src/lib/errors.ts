/**
 * Typed error hierarchy for the embedding pipeline
 *
 * Every error carries a `kind` discriminator so callers can branch on the
 * failure without string matching. The pipeline treats these kinds
 * differently: path, source, decode, probe and backend errors abort a run,
 * upload errors are logged and the run continues.
 *
 * Usage:
 * ```ts
 * import { InvalidPathError, isTypedError } from './lib/errors.js';
 *
 * throw new InvalidPathError('S3 path must start with s3://', 'bucket/key');
 *
 * if (isTypedError(error) && error.kind === 'UPLOAD') { ... }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'INVALID_PATH'
  | 'SOURCE_UNAVAILABLE'
  | 'JSON_DECODE'
  | 'REMOTE_PROBE'
  | 'UPLOAD'
  | 'CREDENTIALS'
  | 'EMBEDDING_BACKEND'
  | 'CONFIGURATION';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Error thrown when a storage locator is not of the form `s3://bucket/key`
 */
export class InvalidPathError extends Error implements TypedError {
  readonly kind = 'INVALID_PATH' as const;

  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = 'InvalidPathError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, InvalidPathError.prototype);
  }
}

/**
 * Error thrown when an input source cannot be opened or read
 */
export class SourceUnavailableError extends Error implements TypedError {
  readonly kind = 'SOURCE_UNAVAILABLE' as const;

  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SourceUnavailableError';
    Object.setPrototypeOf(this, SourceUnavailableError.prototype);
  }
}

/**
 * Error thrown when an input line is not a JSON object
 */
export class JsonDecodeError extends Error implements TypedError {
  readonly kind = 'JSON_DECODE' as const;

  constructor(
    message: string,
    readonly lineNumber: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JsonDecodeError';
    Object.setPrototypeOf(this, JsonDecodeError.prototype);
  }
}

/**
 * Error thrown when a remote existence check fails for a reason other
 * than "not found". The storage client's error is kept as `cause`.
 */
export class RemoteProbeError extends Error implements TypedError {
  readonly kind = 'REMOTE_PROBE' as const;

  constructor(
    message: string,
    readonly bucket: string,
    readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteProbeError';
    Object.setPrototypeOf(this, RemoteProbeError.prototype);
  }
}

/** Why an upload did not happen */
export type UploadFailureReason =
  | 'missing-local-file'
  | 'missing-credentials'
  | 'partial-credentials'
  | 'remote';

/**
 * Error describing a failed upload. Uploads never throw this; it is
 * returned in the upload result and logged.
 */
export class UploadError extends Error implements TypedError {
  readonly kind = 'UPLOAD' as const;

  constructor(
    message: string,
    readonly reason: UploadFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UploadError';
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/** Which part of the storage credentials is missing */
export type CredentialsProblem = 'missing' | 'partial';

/**
 * Error thrown by the storage client when credentials are absent or
 * only half configured
 */
export class CredentialsError extends Error implements TypedError {
  readonly kind = 'CREDENTIALS' as const;

  constructor(
    message: string,
    readonly problem: CredentialsProblem
  ) {
    super(message);
    this.name = 'CredentialsError';
    Object.setPrototypeOf(this, CredentialsError.prototype);
  }
}

/**
 * Error thrown when the embedding backend cannot be reached or answers
 * with something other than a vector
 */
export class EmbeddingBackendError extends Error implements TypedError {
  readonly kind = 'EMBEDDING_BACKEND' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingBackendError';
    Object.setPrototypeOf(this, EmbeddingBackendError.prototype);
  }
}

/**
 * Error thrown when options or environment do not validate
 */
export class ConfigurationError extends Error implements TypedError {
  readonly kind = 'CONFIGURATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard to check if an error is one of the typed pipeline errors
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Single-line summary of any thrown value, used for the top-level fatal
 * message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return isTypedError(error) ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Extract a Node.js system error code (`ENOENT`, `EACCES`, ...) if present
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
