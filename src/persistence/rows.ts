import { z } from "zod";
import type { ImportHistoryEntry, PersistedKeyState } from "../types/key.ts";

export const keyStatusSchema = z.enum(["available", "degraded", "unavailable"]);

const nullableDate = z
  .string()
  .nullable()
  .transform((value) => (value ? new Date(value) : null));

const requiredDate = z.string().transform((value) => new Date(value));

/**
 * Shape shared by SQLite rows and JSON documents; timestamps are ISO strings.
 */
export const keyStateRowSchema = z.object({
  value: z.string().min(1),
  weight: z.number().nonnegative(),
  initial_weight: z.number().nonnegative(),
  status: keyStatusSchema,
  consecutive_errors: z.number().int().nonnegative(),
  consecutive_successes: z.number().int().nonnegative(),
  error_count: z.number().int().nonnegative(),
  last_used_at: nullableDate,
  last_error_at: nullableDate,
  last_error_code: z.number().int().nullable(),
  source: z.string(),
  added_at: requiredDate,
});

export type KeyStateRow = z.input<typeof keyStateRowSchema>;

export function rowToState(row: unknown): PersistedKeyState {
  const parsed = keyStateRowSchema.parse(row);
  return {
    value: parsed.value,
    weight: parsed.weight,
    initialWeight: parsed.initial_weight,
    status: parsed.status,
    consecutiveErrors: parsed.consecutive_errors,
    consecutiveSuccesses: parsed.consecutive_successes,
    errorCount: parsed.error_count,
    lastUsedAt: parsed.last_used_at,
    lastErrorAt: parsed.last_error_at,
    lastErrorCode: parsed.last_error_code,
    source: parsed.source,
    addedAt: parsed.added_at,
  };
}

export function stateToRow(state: PersistedKeyState): KeyStateRow {
  return {
    value: state.value,
    weight: state.weight,
    initial_weight: state.initialWeight,
    status: state.status,
    consecutive_errors: state.consecutiveErrors,
    consecutive_successes: state.consecutiveSuccesses,
    error_count: state.errorCount,
    last_used_at: state.lastUsedAt ? state.lastUsedAt.toISOString() : null,
    last_error_at: state.lastErrorAt ? state.lastErrorAt.toISOString() : null,
    last_error_code: state.lastErrorCode,
    source: state.source,
    added_at: state.addedAt.toISOString(),
  };
}

export const importRowSchema = z.object({
  value: z.string(),
  source: z.string(),
  imported_at: requiredDate,
});

export function rowToImport(row: unknown): ImportHistoryEntry {
  const parsed = importRowSchema.parse(row);
  return { value: parsed.value, source: parsed.source, importedAt: parsed.imported_at };
}

export const sourceHashRowSchema = z.object({ hash: z.string() });
