import { KeyCallError } from "../errors.ts";
import type { ErrorCategory, ErrorSignal } from "../types/key.ts";

const AUTH_CODES = new Set([400, 401, 403]);

const MESSAGE_PATTERNS: Array<{ pattern: RegExp; statusCode: number }> = [
  { pattern: /quota|rate[\s_-]?limit|too many requests/, statusCode: 429 },
  { pattern: /unauthori[sz]ed|invalid/, statusCode: 401 },
  { pattern: /forbidden/, statusCode: 403 },
  { pattern: /not found/, statusCode: 404 },
  { pattern: /server error|internal/, statusCode: 500 },
];

const DEFAULT_STATUS_CODE = 500;

/**
 * Map an HTTP-like status code onto the health category it triggers.
 */
export function categorize(statusCode: number): ErrorCategory {
  if (AUTH_CODES.has(statusCode)) {
    return "auth";
  }
  if (statusCode === 429) {
    return "rate_limited";
  }
  if (statusCode >= 500 && statusCode <= 599) {
    return "server";
  }
  return "unclassified";
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asStatusCode(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value >= 100 && value <= 599) {
    return value;
  }
  return null;
}

/**
 * Read a structured status code off a thrown value: `status`, `statusCode`,
 * numeric `code`, or the same fields on a nested `response`.
 */
export function extractStatusCode(error: unknown): number | null {
  if (!isObject(error)) {
    return null;
  }

  const direct =
    asStatusCode(error.statusCode) ?? asStatusCode(error.status) ?? asStatusCode(error.code);
  if (direct !== null) {
    return direct;
  }

  const response = error.response;
  if (isObject(response)) {
    return asStatusCode(response.status) ?? asStatusCode(response.statusCode);
  }
  return null;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Classify a failed call into an ErrorSignal.
 *
 * A structured status code wins; otherwise the message is matched against
 * known phrases, falling back to a generic 500.
 */
export function classifyError(error: unknown): ErrorSignal {
  const message = describe(error);

  if (error instanceof KeyCallError) {
    return { statusCode: error.statusCode, category: error.category, message };
  }

  const structured = extractStatusCode(error);
  if (structured !== null) {
    return { statusCode: structured, category: categorize(structured), message };
  }

  const lowerMessage = message.toLowerCase();
  const match = MESSAGE_PATTERNS.find(({ pattern }) => pattern.test(lowerMessage));
  const statusCode = match?.statusCode ?? DEFAULT_STATUS_CODE;
  return { statusCode, category: categorize(statusCode), message };
}

/**
 * Build an ErrorSignal from a bare status code.
 */
export function signalFromStatus(statusCode: number, message = `HTTP ${statusCode}`): ErrorSignal {
  return { statusCode, category: categorize(statusCode), message };
}
