import type { StateStore } from "../persistence/types.ts";
import type { WriteBehindQueue } from "../persistence/write-queue.ts";
import type { ReloadPolicy } from "../types/config.ts";
import type { HealthPolicy } from "./health-monitor.ts";
import type { RandomSource } from "./key-selector.ts";

/**
 * KeyManagerOptions defines what a KeyManager needs to run.
 */
export interface KeyManagerOptions {
  /** Read side of persistence and import bookkeeping. */
  store: StateStore;
  /** Every key state change goes through this queue. */
  writes: WriteBehindQueue;
  reloadPolicy?: ReloadPolicy;
  /** Fixed recency cache capacity; derived from the pool size when absent. */
  cacheCapacity?: number;
  healthPolicy?: Partial<HealthPolicy>;
  random?: RandomSource;
  clock?: () => Date;
}

export interface ImportOptions {
  source?: string;
  /** Re-apply the file even when its content hash is unchanged. */
  force?: boolean;
}

export interface MergeResult {
  added: string[];
  updated: number;
  missing: number;
}
