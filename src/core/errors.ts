import type { ErrorInfo, ErrorKind, PlatformName } from "./types.js";

interface PublishingErrorOptions {
  platform?: PlatformName;
  cause?: unknown;
}

export abstract class PublishingError extends Error {
  abstract readonly kind: Exclude<ErrorKind, "UnknownError">;
  readonly platform?: PlatformName;

  constructor(message: string, options: PublishingErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.platform = options.platform;
  }
}

export class AuthenticationError extends PublishingError {
  readonly kind = "AuthenticationError" as const;
  override readonly name = "AuthenticationError";
}

export class UnsupportedCapabilityError extends PublishingError {
  readonly kind = "UnsupportedCapabilityError" as const;
  override readonly name = "UnsupportedCapabilityError";
}

export class MediaUploadError extends PublishingError {
  readonly kind = "MediaUploadError" as const;
  override readonly name = "MediaUploadError";
}

export class RateLimitError extends PublishingError {
  readonly kind = "RateLimitError" as const;
  override readonly name = "RateLimitError";
  readonly retryAfterMs?: number;

  constructor(message: string, options: PublishingErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class NetworkError extends PublishingError {
  readonly kind = "NetworkError" as const;
  override readonly name = "NetworkError";
}

export class NotFoundError extends PublishingError {
  readonly kind = "NotFoundError" as const;
  override readonly name = "NotFoundError";
}

export class SchedulingPersistenceError extends PublishingError {
  readonly kind = "SchedulingPersistenceError" as const;
  override readonly name = "SchedulingPersistenceError";
}

export class PostValidationError extends PublishingError {
  readonly kind = "PostValidationError" as const;
  override readonly name = "PostValidationError";
}

/** A request the platform rejected for a reason retrying will not fix. */
export class PlatformApiError extends PublishingError {
  readonly kind = "PlatformApiError" as const;
  override readonly name = "PlatformApiError";
  readonly statusCode?: number;

  constructor(message: string, options: PublishingErrorOptions & { statusCode?: number } = {}) {
    super(message, options);
    this.statusCode = options.statusCode;
  }
}

export class NoMediaFoundError extends PublishingError {
  readonly kind = "NoMediaFoundError" as const;
  override readonly name = "NoMediaFoundError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof PublishingError) {
    return { kind: error.kind, message: error.message };
  }

  return { kind: "UnknownError", message: errorMessage(error) };
}
