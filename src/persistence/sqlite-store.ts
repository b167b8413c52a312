import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { ImportHistoryEntry, PersistedKeyState, UsageEvent } from "../types/key.ts";
import { rowToImport, rowToState, sourceHashRowSchema, stateToRow } from "./rows.ts";
import type { PersistedState, StateStore } from "./types.ts";

const IN_MEMORY = ":memory:";
const BUSY_TIMEOUT_MS = 5_000;

function ensureDir(path: string): void {
  if (path === IN_MEMORY) {
    return;
  }
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

interface Statements {
  upsertKey: Database.Statement;
  deleteKey: Database.Statement;
  insertImport: Database.Statement;
  insertUsage: Database.Statement;
  selectImports: Database.Statement;
  selectSourceHash: Database.Statement;
  insertSourceHash: Database.Statement;
}

/**
 * SQLiteStateStore persists key state using a SQLite database.
 *
 * WAL mode plus a busy timeout lets several processes share one file; each
 * write batch runs in its own transaction so SQLite's single-writer lock
 * serializes row updates.
 */
export class SQLiteStateStore implements StateStore {
  private readonly db: Database.Database;
  private statements: Statements | null = null;

  constructor(private readonly path: string) {
    ensureDir(path);
    this.db = new Database(path);
  }

  init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS key_state (
        value TEXT PRIMARY KEY,
        weight REAL NOT NULL DEFAULT 1.0,
        initial_weight REAL NOT NULL DEFAULT 1.0,
        status TEXT NOT NULL DEFAULT 'available'
          CHECK (status IN ('available', 'degraded', 'unavailable')),
        consecutive_errors INTEGER NOT NULL DEFAULT 0,
        consecutive_successes INTEGER NOT NULL DEFAULT 0,
        error_count INTEGER NOT NULL DEFAULT 0,
        last_used_at TEXT,
        last_error_at TEXT,
        last_error_code INTEGER,
        source TEXT NOT NULL DEFAULT 'manual',
        added_at TEXT NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_key_state_status ON key_state(status);

      CREATE TABLE IF NOT EXISTS import_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        value TEXT NOT NULL,
        source TEXT NOT NULL,
        imported_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS usage_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        value TEXT NOT NULL,
        used_at TEXT NOT NULL,
        outcome TEXT NOT NULL,
        status_code INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_usage_value_time ON usage_history(value, used_at);

      CREATE TABLE IF NOT EXISTS source_files (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL,
        hash TEXT NOT NULL,
        recorded_at TEXT NOT NULL
      );
    `);

    this.statements = {
      // position keeps pool order stable across restarts; a new row takes the next slot
      upsertKey: this.db.prepare(
        `INSERT INTO key_state (value, weight, initial_weight, status, consecutive_errors,
           consecutive_successes, error_count, last_used_at, last_error_at, last_error_code,
           source, added_at, position, updated_at)
         VALUES (@value, @weight, @initial_weight, @status, @consecutive_errors,
           @consecutive_successes, @error_count, @last_used_at, @last_error_at, @last_error_code,
           @source, @added_at, (SELECT COALESCE(MAX(position), 0) + 1 FROM key_state), @updated_at)
         ON CONFLICT(value) DO UPDATE SET
           weight = excluded.weight,
           initial_weight = excluded.initial_weight,
           status = excluded.status,
           consecutive_errors = excluded.consecutive_errors,
           consecutive_successes = excluded.consecutive_successes,
           error_count = excluded.error_count,
           last_used_at = excluded.last_used_at,
           last_error_at = excluded.last_error_at,
           last_error_code = excluded.last_error_code,
           source = excluded.source,
           updated_at = excluded.updated_at`,
      ),
      deleteKey: this.db.prepare(`DELETE FROM key_state WHERE value = ?`),
      insertImport: this.db.prepare(
        `INSERT INTO import_history (value, source, imported_at) VALUES (?, ?, ?)`,
      ),
      insertUsage: this.db.prepare(
        `INSERT INTO usage_history (value, used_at, outcome, status_code) VALUES (?, ?, ?, ?)`,
      ),
      selectImports: this.db.prepare(
        `SELECT value, source, imported_at FROM import_history ORDER BY id DESC LIMIT ?`,
      ),
      selectSourceHash: this.db.prepare(
        `SELECT hash FROM source_files WHERE path = ? ORDER BY id DESC LIMIT 1`,
      ),
      insertSourceHash: this.db.prepare(
        `INSERT INTO source_files (path, hash, recorded_at) VALUES (?, ?, ?)`,
      ),
    };
  }

  load(): PersistedState {
    const rows = this.db
      .prepare(
        `SELECT value, weight, initial_weight, status, consecutive_errors, consecutive_successes,
           error_count, last_used_at, last_error_at, last_error_code, source, added_at
         FROM key_state ORDER BY position, value`,
      )
      .all();
    return { keys: rows.map(rowToState) };
  }

  upsertKeys(states: PersistedKeyState[]): void {
    if (states.length === 0) {
      return;
    }
    const { upsertKey } = this.prepared();
    const updatedAt = new Date().toISOString();
    this.db.transaction((batch: PersistedKeyState[]) => {
      batch.forEach((state) => {
        upsertKey.run({ ...stateToRow(state), updated_at: updatedAt });
      });
    })(states);
  }

  deleteKeys(values: string[]): void {
    if (values.length === 0) {
      return;
    }
    const { deleteKey } = this.prepared();
    this.db.transaction((batch: string[]) => {
      batch.forEach((value) => deleteKey.run(value));
    })(values);
  }

  recordImports(entries: ImportHistoryEntry[]): void {
    if (entries.length === 0) {
      return;
    }
    const { insertImport } = this.prepared();
    this.db.transaction((batch: ImportHistoryEntry[]) => {
      batch.forEach((entry) => {
        insertImport.run(entry.value, entry.source, entry.importedAt.toISOString());
      });
    })(entries);
  }

  recordUsage(events: UsageEvent[]): void {
    if (events.length === 0) {
      return;
    }
    const { insertUsage } = this.prepared();
    this.db.transaction((batch: UsageEvent[]) => {
      batch.forEach((event) => {
        insertUsage.run(event.value, event.timestamp.toISOString(), event.outcome, event.statusCode);
      });
    })(events);
  }

  getImportHistory(limit: number): ImportHistoryEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.prepared().selectImports.all(limit).map(rowToImport);
  }

  getSourceHash(path: string): string | null {
    const row = this.prepared().selectSourceHash.get(path);
    if (row === undefined) {
      return null;
    }
    return sourceHashRowSchema.parse(row).hash;
  }

  recordSourceHash(path: string, hash: string): void {
    this.prepared().insertSourceHash.run(path, hash, new Date().toISOString());
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private prepared(): Statements {
    if (!this.statements) {
      throw new Error(`SQLite store at ${this.path} used before init()`);
    }
    return this.statements;
  }
}
