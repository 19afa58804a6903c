import type { DomainError } from "../types/domain-error.js";

export type ApiErrorCode =
  | "bad_request"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "user_changed"
  | "user_required"
  | "validation_failed";

export interface ApiErrorOptions {
  readonly cause?: unknown;
  readonly details?: Record<string, unknown>;
}

/**
 * Error raised to the request boundary. The host pipeline maps `status` onto
 * the HTTP response; `message` is safe to send to the client.
 */
export class ApiError extends Error implements DomainError {
  readonly status: number;
  readonly code: ApiErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(status: number, code: ApiErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = options.details;
  }
}

export class BadRequestApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(400, "bad_request", message, options);
  }
}

export class ValidationApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(400, "validation_failed", message, options);
  }
}

export class UnauthorizedApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(401, "unauthorized", message, options);
  }
}

export class ForbiddenApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(403, "forbidden", message, options);
  }
}

export class NotFoundApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(404, "not_found", message, options);
  }
}

/** The precondition user ID does not match the session user (412). */
export class UserChangedApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(412, "user_changed", message, options);
  }
}

/** The request is missing the user ID precondition (428). */
export class UserRequiredApiError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(428, "user_required", message, options);
  }
}

export const isApiError = (value: unknown): value is ApiError => value instanceof ApiError;
