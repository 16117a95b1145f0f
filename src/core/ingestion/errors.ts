export type IngestionErrorKind =
  | "AuthError"
  | "RateLimitError"
  | "TransientNetworkError"
  | "SourceApiError"
  | "WriteError"
  | "WatermarkConflictError"
  | "NotifyError"
  | "InvalidWindowError";

export type IngestionErrorOptions = {
  status?: number;
  requestUrl?: string;
  code?: string;
  cause?: unknown;
};

/**
 * Base class of every failure the ingestion pipeline classifies.
 * `kind` drives the retry policy table and the operator-facing error body.
 */
export abstract class IngestionError extends Error {
  abstract readonly kind: IngestionErrorKind;
  readonly status?: number;
  readonly requestUrl?: string;
  readonly code?: string;

  constructor(message: string, options: IngestionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.status = options.status;
    this.requestUrl = options.requestUrl;
    this.code = options.code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthError extends IngestionError {
  readonly kind = "AuthError";

  constructor(message: string, options?: IngestionErrorOptions) {
    super(message, options);
    this.name = "AuthError";
  }
}

export class RateLimitError extends IngestionError {
  readonly kind = "RateLimitError";
  readonly retryAfterMs?: number;

  constructor(message: string, options: IngestionErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, options);
    this.name = "RateLimitError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class TransientNetworkError extends IngestionError {
  readonly kind = "TransientNetworkError";
  readonly isTimeout: boolean;

  constructor(message: string, options: IngestionErrorOptions & { isTimeout?: boolean } = {}) {
    super(message, options);
    this.name = "TransientNetworkError";
    this.isTimeout = options.isTimeout ?? false;
  }
}

export class SourceApiError extends IngestionError {
  readonly kind = "SourceApiError";

  constructor(message: string, options?: IngestionErrorOptions) {
    super(message, options);
    this.name = "SourceApiError";
  }
}

export class WriteError extends IngestionError {
  readonly kind = "WriteError";

  constructor(message: string, options?: IngestionErrorOptions) {
    super(message, options);
    this.name = "WriteError";
  }
}

export class WatermarkConflictError extends IngestionError {
  readonly kind = "WatermarkConflictError";

  constructor(message: string, options?: IngestionErrorOptions) {
    super(message, options);
    this.name = "WatermarkConflictError";
  }
}

export class NotifyError extends IngestionError {
  readonly kind = "NotifyError";

  constructor(message: string, options?: IngestionErrorOptions) {
    super(message, options);
    this.name = "NotifyError";
  }
}

export class InvalidWindowError extends IngestionError {
  readonly kind = "InvalidWindowError";

  constructor(message: string) {
    super(message);
    this.name = "InvalidWindowError";
  }
}

export const isIngestionError = (value: unknown): value is IngestionError => value instanceof IngestionError;

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
