/**
 * Uploader error classes: one class per failure kind
 *
 * Separated from types (which should be shapes only).
 */

export type UploaderErrorCode =
  | "CONFIG"
  | "TEMPLATE"
  | "ENCODING"
  | "WRITE"
  | "FETCH"
  | "INVALIDATION"
  | "CANCELLED";

/**
 * Base class for every error the uploader reports
 */
export class UploaderError extends Error {
  public readonly code: UploaderErrorCode;

  constructor(
    code: UploaderErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UploaderError";
    this.code = code;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid configuration, rejected before any work starts
 */
export class ConfigError extends UploaderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

/**
 * Template could not be parsed or rendered
 */
export class TemplateError extends UploaderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TEMPLATE", message, options);
    this.name = "TemplateError";
  }
}

export class EncodingError extends UploaderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODING", message, options);
    this.name = "EncodingError";
  }
}

/**
 * Store write (or store release) failed
 */
export class WriteError extends UploaderError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("WRITE", message, options);
    this.name = "WriteError";
    this.path = path;
  }
}

/**
 * Document source failure; aborts before the pipeline starts
 */
export class FetchError extends UploaderError {
  public readonly status?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super("FETCH", message, options);
    this.name = "FetchError";
    this.status = options?.status;
  }
}

/**
 * CDN invalidation failed after uploads succeeded
 */
export class InvalidationError extends UploaderError {
  public readonly distributionId: string;

  constructor(
    distributionId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("INVALIDATION", message, options);
    this.name = "InvalidationError";
    this.distributionId = distributionId;
  }
}

/**
 * Run stopped by a termination signal before it could complete
 */
export class CancelledError extends UploaderError {
  constructor(message = "run cancelled", options?: { cause?: unknown }) {
    super("CANCELLED", message, options);
    this.name = "CancelledError";
  }
}

/**
 * Normalize any thrown value into an UploaderError
 *
 * UploaderErrors pass through; anything else is wrapped with the given factory.
 */
export function toUploaderError(
  error: unknown,
  wrap: (message: string, cause: unknown) => UploaderError,
): UploaderError {
  if (error instanceof UploaderError) {
    return error;
  }
  return wrap(errorMessage(error), error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
