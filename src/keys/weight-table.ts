import type { KeyRecord } from "../types/key.ts";

export function isSelectable(record: KeyRecord): boolean {
  return record.status !== "unavailable";
}

/**
 * Prefix sums of weight over the selectable keys, in pool order.
 */
export class CumulativeWeightTable {
  readonly entries: readonly KeyRecord[];
  readonly prefix: readonly number[];
  readonly total: number;

  private constructor(entries: KeyRecord[], prefix: number[], total: number) {
    this.entries = entries;
    this.prefix = prefix;
    this.total = total;
  }

  static build(records: readonly KeyRecord[]): CumulativeWeightTable {
    const entries: KeyRecord[] = [];
    const prefix: number[] = [];
    let running = 0;

    for (const record of records) {
      if (!isSelectable(record)) {
        continue;
      }
      running += Math.max(0, record.weight);
      entries.push(record);
      prefix.push(running);
    }

    return new CumulativeWeightTable(entries, prefix, running);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Index of the first prefix sum strictly greater than `target`.
   * Targets at or past the total resolve to the last positive-weight entry.
   */
  search(target: number): number {
    let low = 0;
    let high = this.prefix.length - 1;
    let found = -1;

    while (low <= high) {
      const mid = (low + high) >>> 1;
      const sum = this.prefix[mid] ?? 0;
      if (sum > target) {
        found = mid;
        high = mid - 1;
      } else {
        low = mid + 1;
      }
    }

    if (found >= 0) {
      return found;
    }
    return this.lastPositiveIndex();
  }

  /**
   * Draw one entry proportionally to weight using a uniform sample in [0, 1).
   * Returns null when the table carries no weight.
   */
  draw(sample: number): KeyRecord | null {
    if (this.total <= 0 || this.entries.length === 0) {
      return null;
    }
    const index = this.search(sample * this.total);
    return this.entries[index] ?? null;
  }

  private lastPositiveIndex(): number {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const entry = this.entries[index];
      if (entry && entry.weight > 0) {
        return index;
      }
    }
    return this.entries.length - 1;
  }
}
