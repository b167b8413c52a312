export { createKeyBalancer } from "./service/key-balancer.ts";
export type { KeyBalancer, KeyBalancerOptions } from "./service/key-balancer.ts";
export { ConfigManager } from "./service/config-manager.ts";
export type { ConfigManagerOptions, ConfigUpdateHandler } from "./service/config-manager.ts";

export { KeyManager } from "./keys/key-manager.ts";
export type { ImportOptions, KeyManagerOptions, MergeResult } from "./keys/types.ts";
export { KeySelector } from "./keys/key-selector.ts";
export type { RandomSource } from "./keys/key-selector.ts";
export { CumulativeWeightTable } from "./keys/weight-table.ts";
export { RecencyCache, capacityForPool } from "./keys/recency-cache.ts";
export { HealthMonitor, DEFAULT_HEALTH_POLICY } from "./keys/health-monitor.ts";
export type { HealthPolicy, HealthTransition } from "./keys/health-monitor.ts";
export { categorize, classifyError, extractStatusCode } from "./keys/error-classifier.ts";
export { parseKeySource, readKeySource } from "./keys/key-source.ts";

export {
  RetryExecutor,
  DEFAULT_RETRY_CONFIG,
  backoffDelay,
} from "./retry/retry-executor.ts";
export type { KeyHandle, KeyOperation, Sleeper } from "./retry/retry-executor.ts";

export { SQLiteStateStore } from "./persistence/sqlite-store.ts";
export { JsonStateStore } from "./persistence/json-store.ts";
export { ResilientStateStore } from "./persistence/resilient-store.ts";
export { WriteBehindQueue } from "./persistence/write-queue.ts";
export type { WriteBehindOptions } from "./persistence/write-queue.ts";
export type { PersistedState, StateStore } from "./persistence/types.ts";

export { registry as metricsRegistry } from "./observability/metrics.ts";
export { keyId, logger, maskKey } from "./observability/logger.ts";

export * from "./errors.ts";
export type * from "./types/key.ts";
export type * from "./types/config.ts";
