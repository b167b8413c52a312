import { logger } from "../observability/logger.ts";
import type { PersistedState, StateStore } from "./types.ts";

const TRANSIENT_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED"];

/**
 * Lock contention from another connection. The write is retried later
 * instead of abandoning the primary store.
 */
export function isTransientStoreError(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "string" && TRANSIENT_CODES.some((prefix) => code.startsWith(prefix))) {
      return true;
    }
  }
  if (error instanceof Error) {
    return (
      TRANSIENT_CODES.some((prefix) => error.message.includes(prefix)) ||
      error.message.includes("database is locked")
    );
  }
  return false;
}

/**
 * ResilientStateStore writes to the primary store and permanently switches to
 * the fallback after the primary fails. Lock contention is rethrown so the
 * write-behind queue retries it against the primary.
 */
export class ResilientStateStore implements StateStore {
  private active: StateStore;

  constructor(
    private readonly primary: StateStore,
    private readonly fallback: StateStore,
  ) {
    this.active = primary;
  }

  get usingFallback(): boolean {
    return this.active === this.fallback;
  }

  init(): void {
    try {
      this.primary.init();
    } catch (error) {
      logger.error({ error }, "Primary persistence init failed; falling back to JSON store");
      this.switchToFallback();
    }
  }

  load(): PersistedState {
    try {
      return this.active.load();
    } catch (error) {
      if (this.usingFallback) {
        throw error;
      }
      logger.error({ error }, "Primary persistence load failed; using fallback state");
      this.switchToFallback();
      return this.fallback.load();
    }
  }

  upsertKeys(...args: Parameters<StateStore["upsertKeys"]>): void {
    this.write("upsert", (store) => store.upsertKeys(...args));
  }

  deleteKeys(...args: Parameters<StateStore["deleteKeys"]>): void {
    this.write("delete", (store) => store.deleteKeys(...args));
  }

  recordImports(...args: Parameters<StateStore["recordImports"]>): void {
    this.write("import history", (store) => store.recordImports(...args));
  }

  recordUsage(...args: Parameters<StateStore["recordUsage"]>): void {
    this.write("usage history", (store) => store.recordUsage(...args));
  }

  recordSourceHash(...args: Parameters<StateStore["recordSourceHash"]>): void {
    this.write("source hash", (store) => store.recordSourceHash(...args));
  }

  getImportHistory(limit: number): ReturnType<StateStore["getImportHistory"]> {
    try {
      return this.active.getImportHistory(limit);
    } catch (error) {
      logger.error({ error }, "Import history read failed; using fallback");
      return this.fallback.getImportHistory(limit);
    }
  }

  getSourceHash(path: string): string | null {
    try {
      return this.active.getSourceHash(path);
    } catch (error) {
      logger.error({ error }, "Source hash read failed; using fallback");
      return this.fallback.getSourceHash(path);
    }
  }

  close(): void {
    this.primary.close();
    if (this.usingFallback) {
      this.fallback.close();
    }
  }

  private write(operation: string, action: (store: StateStore) => void): void {
    if (this.usingFallback) {
      action(this.fallback);
      return;
    }
    try {
      action(this.primary);
    } catch (error) {
      if (isTransientStoreError(error)) {
        logger.warn({ error, operation }, "Primary persistence busy; write will be retried");
        throw error;
      }
      logger.error({ error, operation }, "Primary persistence write failed; delegating to fallback");
      this.switchToFallback();
      action(this.fallback);
    }
  }

  private switchToFallback(): void {
    if (this.usingFallback) {
      return;
    }
    this.fallback.init();
    this.active = this.fallback;
  }
}
