import type { ErrorCategory } from "./types/key.ts";

/**
 * Base class for every error raised by the balancer itself.
 */
export class KeyBalancerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "KeyBalancerError";
  }
}

/**
 * Failure of an operation run with a balanced key. Operations may throw the
 * subclasses so classification can read the status code directly.
 */
export class KeyCallError extends KeyBalancerError {
  readonly statusCode: number;
  readonly category: ErrorCategory;

  constructor(message: string, statusCode: number, category: ErrorCategory, options?: ErrorOptions) {
    super(message, options);
    this.name = "KeyCallError";
    this.statusCode = statusCode;
    this.category = category;
  }
}

export class AuthError extends KeyCallError {
  constructor(message = "Credential rejected", statusCode = 401, options?: ErrorOptions) {
    super(message, statusCode, "auth", options);
    this.name = "AuthError";
  }
}

export class RateLimitedError extends KeyCallError {
  constructor(message = "Rate limited", options?: ErrorOptions) {
    super(message, 429, "rate_limited", options);
    this.name = "RateLimitedError";
  }
}

export class ServerError extends KeyCallError {
  constructor(message = "Upstream server error", statusCode = 500, options?: ErrorOptions) {
    super(message, statusCode, "server", options);
    this.name = "ServerError";
  }
}

export class InsufficientKeysError extends KeyBalancerError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number, options?: ErrorOptions) {
    super(`Requested ${requested} keys but only ${available} are selectable`, options);
    this.name = "InsufficientKeysError";
    this.requested = requested;
    this.available = available;
  }
}

export class RetriesExhaustedError extends KeyBalancerError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Operation failed after ${attempts} attempts: ${reason}`, { cause });
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
  }
}

export class KeySourceError extends KeyBalancerError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Unable to read key source: ${path}`, options);
    this.name = "KeySourceError";
    this.path = path;
  }
}
