import type { CacheStats } from "../types/key.ts";

export const MIN_CACHE_CAPACITY = 100;
export const MAX_CACHE_CAPACITY = 1000;

/**
 * Default recency capacity for a pool of the given size: 100 below 100 keys,
 * otherwise a tenth of the pool capped at 1000.
 */
export function capacityForPool(poolSize: number): number {
  if (poolSize < MIN_CACHE_CAPACITY) {
    return MIN_CACHE_CAPACITY;
  }
  return Math.min(MAX_CACHE_CAPACITY, Math.max(1, Math.floor(poolSize * 0.1)));
}

/**
 * RecencyCache is a bounded LRU set of recently selected key values.
 * Map insertion order doubles as recency order: the first entry is the oldest.
 */
export class RecencyCache {
  private readonly entries = new Map<string, number>();
  private capacityValue: number;
  private hits = 0;
  private lookups = 0;

  constructor(capacity: number) {
    this.capacityValue = Math.max(1, Math.floor(capacity));
  }

  get capacity(): number {
    return this.capacityValue;
  }

  get size(): number {
    return this.entries.size;
  }

  has(value: string): boolean {
    return this.entries.has(value);
  }

  /**
   * Record a selection. Returns true when the value was already present.
   */
  touch(value: string, now = Date.now()): boolean {
    const present = this.entries.delete(value);
    this.entries.set(value, now);
    this.lookups += 1;
    if (present) {
      this.hits += 1;
    }
    this.evictOverflow();
    return present;
  }

  delete(value: string): void {
    this.entries.delete(value);
  }

  resize(capacity: number): void {
    this.capacityValue = Math.max(1, Math.floor(capacity));
    this.evictOverflow();
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.lookups = 0;
  }

  /** Oldest first. */
  values(): string[] {
    return [...this.entries.keys()];
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacityValue,
      hits: this.hits,
      lookups: this.lookups,
    };
  }

  hitRate(): number {
    return this.lookups > 0 ? this.hits / this.lookups : 0;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.capacityValue) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}
