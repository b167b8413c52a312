import { createHash } from "node:crypto";
import pino, { type LoggerOptions } from "pino";

const redactPaths = ["key", "value", "keys.*.value", "apiKey"];

export const loggerOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  redact: {
    paths: redactPaths,
    censor: "[secure]",
  },
  base: undefined,
};

export const logger = pino(loggerOptions);

/**
 * Shorten a credential for log lines and summaries.
 */
export function maskKey(value: string): string {
  return value.length > 8 ? `${value.slice(0, 8)}...` : value;
}

/**
 * Stable identifier for a credential: the masked prefix plus a short sha256
 * digest, so keys sharing a prefix stay distinct in logs and metric labels.
 */
export function keyId(value: string): string {
  const digest = createHash("sha256").update(value).digest("hex").slice(0, 8);
  return `${maskKey(value)}#${digest}`;
}
