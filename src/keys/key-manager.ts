import { keyId, logger, maskKey } from "../observability/logger.ts";
import { forgetKeyHealth, observeKeyHealth, selectionCounter } from "../observability/metrics.ts";
import type { PersistedState, StateStore } from "../persistence/types.ts";
import type { WriteBehindQueue } from "../persistence/write-queue.ts";
import type { ReloadPolicy } from "../types/config.ts";
import type {
  ErrorSignal,
  ImportHistoryEntry,
  ImportResult,
  KeyEntry,
  KeyInfo,
  KeyRecord,
  KeySummary,
  PoolStats,
} from "../types/key.ts";
import { signalFromStatus } from "./error-classifier.ts";
import { HealthMonitor, type HealthTransition } from "./health-monitor.ts";
import { KeyPool, createKeyRecord, fromPersisted, toPersisted } from "./key-pool.ts";
import { KeySelector } from "./key-selector.ts";
import { readKeySource } from "./key-source.ts";
import { RecencyCache, capacityForPool } from "./recency-cache.ts";
import type { ImportOptions, KeyManagerOptions, MergeResult } from "./types.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * KeyManager owns the key pool and everything that mutates it:
 * - KeySelector: weighted selection without replacement
 * - RecencyCache: spreads load away from recently used keys
 * - HealthMonitor: weight and status transitions from call outcomes
 * - WriteBehindQueue: durable mirror of every change
 *
 * Every public method runs synchronously to completion, which makes each one
 * a critical section on the event loop: no caller can observe a half-rebuilt
 * weight table or a partially applied health transition.
 */
export class KeyManager {
  private readonly pool = new KeyPool();
  private readonly store: StateStore;
  private readonly writes: WriteBehindQueue;
  private readonly selector: KeySelector;
  private readonly monitor: HealthMonitor;
  private readonly cache: RecencyCache;
  private readonly cacheCapacityOverride: number | undefined;
  private readonly clock: () => Date;
  private reloadPolicy: ReloadPolicy;

  constructor(options: KeyManagerOptions) {
    this.store = options.store;
    this.writes = options.writes;
    this.selector = new KeySelector(options.random);
    this.monitor = new HealthMonitor(options.healthPolicy);
    this.cacheCapacityOverride = options.cacheCapacity;
    this.cache = new RecencyCache(options.cacheCapacity ?? capacityForPool(0));
    this.clock = options.clock ?? (() => new Date());
    this.reloadPolicy = options.reloadPolicy ?? "retain";
  }

  get size(): number {
    return this.pool.size;
  }

  setReloadPolicy(policy: ReloadPolicy): void {
    this.reloadPolicy = policy;
  }

  /**
   * Load persisted records, then merge the configured key list over them.
   * Persisted runtime state wins; the key list only contributes new keys and
   * configured weights.
   */
  bootstrap(persisted: PersistedState, entries: KeyEntry[] = [], source = "config"): MergeResult {
    persisted.keys.forEach((state) => {
      const record = fromPersisted(state);
      if (this.pool.add(record)) {
        this.observe(record);
      }
    });

    const result =
      entries.length > 0
        ? this.applyKeyEntries(entries, source)
        : { added: [], updated: 0, missing: 0 };

    this.resizeCache();
    logger.info(
      {
        persisted: persisted.keys.length,
        total: this.pool.size,
        selectable: this.pool.selectableCount(),
      },
      "Key pool bootstrapped",
    );
    return result;
  }

  /**
   * Merge a key list into the pool according to the reload policy.
   */
  applyKeyEntries(entries: KeyEntry[], source: string): MergeResult {
    const now = this.clock();
    const listed = new Set<string>();
    const added: string[] = [];
    let updated = 0;

    entries.forEach((entry) => {
      listed.add(entry.value);
      const existing = this.pool.get(entry.value);

      if (!existing) {
        const record = createKeyRecord(entry.value, { weight: entry.weight, source, now });
        this.pool.add(record);
        this.persist(record);
        added.push(entry.value);
        return;
      }

      if (Math.abs(existing.initialWeight - entry.weight) > 1e-9) {
        existing.initialWeight = entry.weight;
        if (existing.status !== "unavailable") {
          existing.weight = entry.weight;
        }
        this.pool.markDirty();
        this.persist(existing);
        updated += 1;
        logger.info(
          { keyId: keyId(existing.value), weight: entry.weight },
          "Updated configured weight for key",
        );
      }
    });

    const missing = this.pool.values().filter((record) => !listed.has(record.value));
    missing.forEach((record) => this.applyMissing(record));

    this.resizeCache();
    logger.info(
      { added: added.length, updated, missing: missing.length, policy: this.reloadPolicy },
      "Key list merged",
    );
    return { added, updated, missing: missing.length };
  }

  /**
   * Import a `value[:weight]` key file. Unchanged files are skipped unless
   * `force` is set.
   */
  importKeysFromFile(path: string, options: ImportOptions = {}): ImportResult {
    const source = options.source ?? "imported";
    const keySource = readKeySource(path);

    if (!options.force && this.readSourceHash(keySource.path) === keySource.hash) {
      logger.info({ path: keySource.path }, "Key file unchanged; skipping import");
      return { added: 0, updated: 0, missing: 0, skipped: true };
    }

    const result = this.applyKeyEntries(keySource.entries, source);
    const importedAt = this.clock();
    this.recordBookkeeping(() => {
      this.store.recordImports(result.added.map((value) => ({ value, source, importedAt })));
      this.store.recordSourceHash(keySource.path, keySource.hash);
    });

    return {
      added: result.added.length,
      updated: result.updated,
      missing: result.missing,
      skipped: false,
    };
  }

  addKey(value: string, weight = 1, source = "manual"): boolean {
    const trimmed = value.trim();
    if (!trimmed) {
      throw new RangeError("Key value must not be empty");
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new RangeError(`Key weight must be a non-negative number, got ${weight}`);
    }
    if (this.pool.has(trimmed)) {
      return false;
    }

    const now = this.clock();
    const record = createKeyRecord(trimmed, { weight, source, now });
    this.pool.add(record);
    this.persist(record);
    this.resizeCache();
    this.recordBookkeeping(() => {
      this.store.recordImports([{ value: trimmed, source, importedAt: now }]);
    });
    logger.info({ keyId: keyId(trimmed), weight, source }, "Key added");
    return true;
  }

  removeKey(value: string): boolean {
    const record = this.pool.remove(value);
    if (!record) {
      return false;
    }
    this.cache.delete(value);
    this.writes.delete(value);
    forgetKeyHealth(keyId(value));
    this.resizeCache();
    logger.info({ keyId: keyId(value) }, "Key removed");
    return true;
  }

  /**
   * Select `count` distinct keys, preferring keys outside the recency cache.
   *
   * @throws InsufficientKeysError when fewer than `count` keys are selectable
   */
  select(count = 1): string[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Key count must be a non-negative integer, got ${count}`);
    }
    if (count === 0) {
      return [];
    }

    const table = this.pool.table();
    const selected = this.selector.select(table, count, (record) => this.cache.has(record.value));

    const now = this.clock();
    selected.forEach((record) => {
      const recent = this.cache.touch(record.value, now.getTime());
      selectionCounter.inc({ recent: recent ? "true" : "false" });
      record.lastUsedAt = now;
      this.persist(record);
    });

    return selected.map((record) => record.value);
  }

  /**
   * Select keys for several batches in one atomic draw.
   */
  selectBatches(sizes: number[]): string[][] {
    sizes.forEach((size) => {
      if (!Number.isInteger(size) || size < 0) {
        throw new RangeError(`Batch size must be a non-negative integer, got ${size}`);
      }
    });
    const total = sizes.reduce((sum, size) => sum + size, 0);
    const keys = this.select(total);

    const batches: string[][] = [];
    let offset = 0;
    sizes.forEach((size) => {
      batches.push(keys.slice(offset, offset + size));
      offset += size;
    });
    return batches;
  }

  reportSuccess(value: string): boolean {
    const record = this.pool.get(value);
    if (!record) {
      logger.warn({ keyId: keyId(value) }, "Success reported for unknown key");
      return false;
    }

    const transition = this.monitor.recordSuccess(record);
    this.applyTransition(record, transition);
    this.writes.recordUsage({
      value,
      timestamp: this.clock(),
      outcome: "success",
      statusCode: null,
    });
    return true;
  }

  reportError(value: string, error: ErrorSignal | number): boolean {
    const record = this.pool.get(value);
    if (!record) {
      logger.warn({ keyId: keyId(value) }, "Error reported for unknown key");
      return false;
    }

    const signal = typeof error === "number" ? signalFromStatus(error) : error;
    const now = this.clock();
    const transition = this.monitor.recordFailure(record, signal, now);
    this.applyTransition(record, transition, signal);
    this.writes.recordUsage({
      value,
      timestamp: now,
      outcome: "error",
      statusCode: signal.statusCode,
    });
    return true;
  }

  /**
   * Restore every key to its configured weight and clear the recency cache.
   */
  resetAll(): void {
    this.pool.values().forEach((record) => {
      this.monitor.reset(record);
      this.persist(record);
    });
    this.pool.markDirty();
    this.cache.clear();
    logger.info({ total: this.pool.size }, "All keys reset");
  }

  resetKey(value: string): boolean {
    const record = this.pool.get(value);
    if (!record) {
      return false;
    }
    this.monitor.reset(record);
    this.pool.markDirty();
    this.cache.delete(value);
    this.persist(record);
    logger.info({ keyId: keyId(value) }, "Key reset");
    return true;
  }

  /**
   * Remove keys whose last use is older than `days`. Never-used keys stay.
   */
  cleanupStaleKeys(days: number): number {
    const cutoff = this.clock().getTime() - days * DAY_MS;
    const stale = this.pool
      .values()
      .filter((record) => record.lastUsedAt !== null && record.lastUsedAt.getTime() < cutoff);
    stale.forEach((record) => this.removeKey(record.value));
    if (stale.length > 0) {
      logger.info({ removed: stale.length, days }, "Removed stale keys");
    }
    return stale.length;
  }

  snapshotStats(): PoolStats {
    const records = this.pool.values();
    const count = (status: KeyRecord["status"]) =>
      records.filter((record) => record.status === status).length;
    const totalWeight = records.reduce((sum, record) => sum + record.weight, 0);

    return {
      total: records.length,
      available: count("available"),
      degraded: count("degraded"),
      unavailable: count("unavailable"),
      averageWeight: records.length > 0 ? totalWeight / records.length : 0,
      cacheHitRate: this.cache.hitRate(),
      cache: this.cache.stats(),
    };
  }

  listKeys(): KeySummary[] {
    return this.pool.values().map((record) => this.summarize(record));
  }

  getKeyInfo(value: string): KeyInfo | null {
    const record = this.pool.get(value);
    if (!record) {
      return null;
    }
    return { ...this.summarize(record), inCache: this.cache.has(value) };
  }

  getImportHistory(limit = 50): ImportHistoryEntry[] {
    return this.store.getImportHistory(limit);
  }

  /**
   * Total weight of the current weight table. Rebuilds the table if needed.
   */
  selectableWeight(): number {
    return this.pool.table().total;
  }

  private applyMissing(record: KeyRecord): void {
    switch (this.reloadPolicy) {
      case "retain":
        return;
      case "prune":
        this.removeKey(record.value);
        return;
      case "disable":
        if (record.status !== "unavailable") {
          record.status = "unavailable";
          record.weight = 0;
          this.pool.markDirty();
          this.persist(record);
          logger.info({ keyId: keyId(record.value) }, "Key missing from key list; disabled");
        }
        return;
    }
  }

  private applyTransition(
    record: KeyRecord,
    transition: HealthTransition,
    signal?: ErrorSignal,
  ): void {
    if (
      transition.previousStatus !== transition.status ||
      transition.previousWeight !== transition.weight
    ) {
      this.pool.markDirty();
    }

    if (transition.previousStatus !== transition.status) {
      const details = {
        keyId: keyId(record.value),
        from: transition.previousStatus,
        to: transition.status,
        statusCode: signal?.statusCode,
      };
      if (transition.status === "unavailable") {
        logger.warn(details, "Key disabled until reset");
      } else {
        logger.info(details, "Key health changed");
      }
    }

    this.persist(record);
  }

  private persist(record: KeyRecord): void {
    this.writes.save(toPersisted(record));
    this.observe(record);
  }

  private observe(record: KeyRecord): void {
    observeKeyHealth(keyId(record.value), record.weight, record.status);
  }

  private resizeCache(): void {
    this.cache.resize(this.cacheCapacityOverride ?? capacityForPool(this.pool.size));
  }

  private readSourceHash(path: string): string | null {
    try {
      return this.store.getSourceHash(path);
    } catch (error) {
      logger.error({ error, path }, "Failed to read key file hash");
      return null;
    }
  }

  private recordBookkeeping(action: () => void): void {
    try {
      action();
    } catch (error) {
      logger.error({ error }, "Failed to record import bookkeeping");
    }
  }

  private summarize(record: KeyRecord): KeySummary {
    return {
      key: maskKey(record.value),
      weight: Number(record.weight.toFixed(4)),
      initialWeight: record.initialWeight,
      status: record.status,
      errorCount: record.errorCount,
      consecutiveErrors: record.consecutiveErrors,
      consecutiveSuccesses: record.consecutiveSuccesses,
      lastUsedAt: record.lastUsedAt,
      lastErrorAt: record.lastErrorAt,
      lastErrorCode: record.lastErrorCode,
      source: record.source,
      addedAt: record.addedAt,
    };
  }
}
