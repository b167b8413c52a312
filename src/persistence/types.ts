import type { ImportHistoryEntry, PersistedKeyState, UsageEvent } from "../types/key.ts";

/**
 * PersistedState represents the snapshot loaded at startup.
 */
export interface PersistedState {
  keys: PersistedKeyState[];
}

/**
 * StateStore defines the interface for persisting key state.
 * Implementations include SQLite (primary) and JSON (fallback).
 */
export interface StateStore {
  /**
   * Initialize the storage backend (create tables, files, etc).
   */
  init(): void;

  load(): PersistedState;

  /**
   * Insert or replace key rows in a single write.
   */
  upsertKeys(states: PersistedKeyState[]): void;

  deleteKeys(values: string[]): void;

  recordImports(entries: ImportHistoryEntry[]): void;

  /**
   * Append usage telemetry. Never read back by the balancer.
   */
  recordUsage(events: UsageEvent[]): void;

  /**
   * Most recent imports first.
   */
  getImportHistory(limit: number): ImportHistoryEntry[];

  getSourceHash(path: string): string | null;

  recordSourceHash(path: string, hash: string): void;

  close(): void;
}
