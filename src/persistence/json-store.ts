import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "../observability/logger.ts";
import type { ImportHistoryEntry, PersistedKeyState, UsageEvent } from "../types/key.ts";
import { keyStateRowSchema, rowToImport, rowToState, stateToRow } from "./rows.ts";
import type { KeyStateRow } from "./rows.ts";
import type { PersistedState, StateStore } from "./types.ts";

const USAGE_LIMIT = 1000;
const IMPORT_LIMIT = 1000;

const documentSchema = z.object({
  keys: z.array(z.unknown()).default([]),
  imports: z.array(z.unknown()).default([]),
  usage: z.array(z.unknown()).default([]),
  sources: z.record(z.string()).default({}),
});

const usageRowSchema = z.object({
  value: z.string(),
  used_at: z.string(),
  outcome: z.string(),
  status_code: z.number().nullable(),
});

type UsageRow = z.infer<typeof usageRowSchema>;

interface ImportRow {
  value: string;
  source: string;
  imported_at: string;
}

interface JsonDocument {
  keys: KeyStateRow[];
  imports: ImportRow[];
  usage: UsageRow[];
  sources: Record<string, string>;
}

function emptyDocument(): JsonDocument {
  return { keys: [], imports: [], usage: [], sources: {} };
}

function ensureDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * JsonStateStore persists key state in a single JSON file.
 * Serves as a fallback when SQLite is unavailable.
 */
export class JsonStateStore implements StateStore {
  private document: JsonDocument = emptyDocument();

  constructor(private readonly path: string) {
    ensureDir(path);
  }

  init(): void {
    if (!existsSync(this.path)) {
      this.write();
      return;
    }
    this.document = this.read();
  }

  load(): PersistedState {
    this.document = this.read();
    return { keys: this.document.keys.map(rowToState) };
  }

  upsertKeys(states: PersistedKeyState[]): void {
    if (states.length === 0) {
      return;
    }
    const index = new Map(this.document.keys.map((row, position) => [row.value, position]));
    states.forEach((state) => {
      const row = stateToRow(state);
      const position = index.get(state.value);
      if (position === undefined) {
        index.set(state.value, this.document.keys.length);
        this.document.keys.push(row);
      } else {
        this.document.keys[position] = row;
      }
    });
    this.write();
  }

  deleteKeys(values: string[]): void {
    if (values.length === 0) {
      return;
    }
    const removed = new Set(values);
    this.document.keys = this.document.keys.filter((row) => !removed.has(row.value));
    this.write();
  }

  recordImports(entries: ImportHistoryEntry[]): void {
    if (entries.length === 0) {
      return;
    }
    this.document.imports.push(
      ...entries.map((entry) => ({
        value: entry.value,
        source: entry.source,
        imported_at: entry.importedAt.toISOString(),
      })),
    );
    this.document.imports = this.document.imports.slice(-IMPORT_LIMIT);
    this.write();
  }

  recordUsage(events: UsageEvent[]): void {
    if (events.length === 0) {
      return;
    }
    this.document.usage.push(
      ...events.map((event) => ({
        value: event.value,
        used_at: event.timestamp.toISOString(),
        outcome: event.outcome,
        status_code: event.statusCode,
      })),
    );
    this.document.usage = this.document.usage.slice(-USAGE_LIMIT);
    this.write();
  }

  getImportHistory(limit: number): ImportHistoryEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.document.imports.slice(-limit).reverse().map(rowToImport);
  }

  getSourceHash(path: string): string | null {
    return this.document.sources[path] ?? null;
  }

  recordSourceHash(path: string, hash: string): void {
    this.document.sources[path] = hash;
    this.write();
  }

  close(): void {
    // Every mutation is written through; nothing to release.
  }

  private read(): JsonDocument {
    if (!existsSync(this.path)) {
      return emptyDocument();
    }
    const raw = readFileSync(this.path, "utf8");
    if (!raw.trim()) {
      return emptyDocument();
    }

    const parsed = documentSchema.parse(JSON.parse(raw));
    const keys: KeyStateRow[] = [];
    parsed.keys.forEach((row) => {
      const result = keyStateRowSchema.safeParse(row);
      if (result.success) {
        keys.push(stateToRow(rowToState(row)));
      } else {
        logger.warn({ path: this.path, issues: result.error.issues }, "Skipping invalid key row");
      }
    });

    return {
      keys,
      imports: parsed.imports.map((row) => {
        const entry = rowToImport(row);
        return {
          value: entry.value,
          source: entry.source,
          imported_at: entry.importedAt.toISOString(),
        };
      }),
      usage: parsed.usage.flatMap((row) => {
        const result = usageRowSchema.safeParse(row);
        return result.success ? [result.data] : [];
      }),
      sources: parsed.sources,
    };
  }

  private write(): void {
    writeFileSync(this.path, JSON.stringify(this.document, null, 2));
  }
}
