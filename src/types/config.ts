export type ReloadPolicy = "retain" | "prune" | "disable";

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
}

export interface CacheConfig {
  /** Fixed recency cache capacity; derived from the pool size when absent. */
  capacity?: number;
}

export interface PersistedStateConfig {
  sqlitePath: string;
  fallbackJsonPath: string;
  flushIntervalMs: number;
  retryDelayMs: number;
}

export interface ResolvedConfig {
  keysFile: string | null;
  reloadPolicy: ReloadPolicy;
  retry: RetryConfig;
  cache: CacheConfig;
  persistence: PersistedStateConfig;
}
