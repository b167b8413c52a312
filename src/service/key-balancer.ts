import { KeyManager } from "../keys/key-manager.ts";
import type { HealthPolicy } from "../keys/health-monitor.ts";
import type { RandomSource } from "../keys/key-selector.ts";
import { logger } from "../observability/logger.ts";
import { JsonStateStore } from "../persistence/json-store.ts";
import { ResilientStateStore } from "../persistence/resilient-store.ts";
import { SQLiteStateStore } from "../persistence/sqlite-store.ts";
import type { StateStore } from "../persistence/types.ts";
import { WriteBehindQueue } from "../persistence/write-queue.ts";
import {
  RetryExecutor,
  type KeyHandle,
  type KeyOperation,
  type Sleeper,
} from "../retry/retry-executor.ts";
import type { ResolvedConfig, RetryConfig } from "../types/config.ts";
import type { ErrorSignal, ImportResult, PoolStats } from "../types/key.ts";
import { ConfigManager } from "./config-manager.ts";

export interface KeyBalancerOptions {
  /** Reuse an existing manager; otherwise one is built from `configPath`. */
  configManager?: ConfigManager;
  configPath?: string;
  watch?: boolean;
  /** Replaces the SQLite/JSON pair built from the persistence config. */
  store?: StateStore;
  healthPolicy?: Partial<HealthPolicy>;
  random?: RandomSource;
  clock?: () => Date;
  sleep?: Sleeper;
}

export interface KeyBalancer {
  readonly configManager: ConfigManager;
  readonly keyManager: KeyManager;
  readonly executor: RetryExecutor;
  readonly store: StateStore;
  readonly writes: WriteBehindQueue;
  select(count?: number): string[];
  reportSuccess(key: string): boolean;
  reportError(key: string, error: ErrorSignal | number): boolean;
  execute<T>(operation: KeyOperation<T>, retry?: Partial<RetryConfig>): Promise<T>;
  withKey<T>(operation: KeyOperation<T>): Promise<T>;
  wrap<A extends unknown[], T>(
    fn: (handle: KeyHandle, ...args: A) => Promise<T> | T,
    retry?: Partial<RetryConfig>,
  ): (...args: A) => Promise<T>;
  snapshotStats(): PoolStats;
  resetAll(): void;
  /** Re-read the configured key file, even when its content is unchanged. */
  reloadKeys(force?: boolean): ImportResult | null;
  close(): void;
}

function buildStore(config: ResolvedConfig): StateStore {
  const sqliteStore = new SQLiteStateStore(config.persistence.sqlitePath);
  const jsonStore = new JsonStateStore(config.persistence.fallbackJsonPath);
  return new ResilientStateStore(sqliteStore, jsonStore);
}

export function createKeyBalancer(options: KeyBalancerOptions = {}): KeyBalancer {
  const ownsConfigManager = options.configManager === undefined;
  const configManager =
    options.configManager ??
    new ConfigManager({ configPath: options.configPath, watch: options.watch });
  let config = configManager.getConfig();

  const store = options.store ?? buildStore(config);
  store.init();
  const persisted = store.load();

  const writes = new WriteBehindQueue(store, {
    flushIntervalMs: config.persistence.flushIntervalMs,
    retryDelayMs: config.persistence.retryDelayMs,
  });

  const keyManager = new KeyManager({
    store,
    writes,
    reloadPolicy: config.reloadPolicy,
    cacheCapacity: config.cache.capacity,
    healthPolicy: options.healthPolicy,
    random: options.random,
    clock: options.clock,
  });
  keyManager.bootstrap(persisted);

  const importConfiguredKeys = (force: boolean): ImportResult | null => {
    if (!config.keysFile) {
      return null;
    }
    return keyManager.importKeysFromFile(config.keysFile, { source: "config", force });
  };
  importConfiguredKeys(false);

  const executor = new RetryExecutor({
    keys: keyManager,
    retry: config.retry,
    sleep: options.sleep,
  });

  const unsubscribe = configManager.subscribe((updated) => {
    config = updated;
    keyManager.setReloadPolicy(updated.reloadPolicy);
    try {
      const result = importConfiguredKeys(false);
      if (result && !result.skipped) {
        logger.info(result, "Key file re-imported after configuration change");
      }
    } catch (error) {
      logger.error({ error, keysFile: updated.keysFile }, "Failed to re-import key file");
    }
  });

  let closed = false;

  logger.info(
    { keys: keyManager.size, keysFile: config.keysFile, reloadPolicy: config.reloadPolicy },
    "Key balancer started",
  );

  return {
    configManager,
    keyManager,
    executor,
    store,
    writes,
    select: (count = 1) => keyManager.select(count),
    reportSuccess: (key) => keyManager.reportSuccess(key),
    reportError: (key, error) => keyManager.reportError(key, error),
    // The latest reloaded retry config is the per-call default.
    execute: (operation, retry = {}) => executor.execute(operation, { ...config.retry, ...retry }),
    withKey: (operation) => executor.withKey(operation),
    wrap: (fn, retry = {}) => (...args) =>
      executor.execute((handle) => fn(handle, ...args), { ...config.retry, ...retry }),
    snapshotStats: () => keyManager.snapshotStats(),
    resetAll: () => keyManager.resetAll(),
    reloadKeys: (force = true) => importConfiguredKeys(force),
    close: () => {
      if (closed) {
        return;
      }
      closed = true;
      unsubscribe();
      if (ownsConfigManager) {
        configManager.close();
      }
      writes.close();
      store.close();
      logger.info("Key balancer closed");
    },
  };
}
