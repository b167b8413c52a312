import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { KeySourceError } from "../errors.ts";
import type { KeyEntry } from "../types/key.ts";

const WEIGHT_SUFFIX = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

export interface KeySource {
  path: string;
  hash: string;
  entries: KeyEntry[];
}

/**
 * Parse a single `value[:weight]` line. The weight suffix is only honoured
 * when the text after the last colon is a non-negative number, so values
 * that themselves contain colons survive intact.
 */
export function parseKeyLine(line: string): KeyEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separator = trimmed.lastIndexOf(":");
  if (separator > 0) {
    const suffix = trimmed.slice(separator + 1).trim();
    const value = trimmed.slice(0, separator).trim();
    if (value && WEIGHT_SUFFIX.test(suffix)) {
      return { value, weight: Number(suffix) };
    }
  }

  return { value: trimmed, weight: 1 };
}

/**
 * Parse a key list, one credential per line. A value listed twice keeps its
 * first position and its last weight.
 */
export function parseKeySource(text: string): KeyEntry[] {
  const entries = new Map<string, KeyEntry>();
  for (const line of text.split(/\r?\n/)) {
    const entry = parseKeyLine(line);
    if (entry) {
      entries.set(entry.value, entry);
    }
  }
  return [...entries.values()];
}

export function hashContent(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export function readKeySource(path: string): KeySource {
  const absolute = resolve(path);
  let raw: string;
  try {
    raw = readFileSync(absolute, "utf8");
  } catch (error) {
    throw new KeySourceError(absolute, { cause: error });
  }
  return { path: absolute, hash: hashContent(raw), entries: parseKeySource(raw) };
}
