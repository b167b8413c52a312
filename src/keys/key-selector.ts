import { InsufficientKeysError } from "../errors.ts";
import type { KeyRecord } from "../types/key.ts";
import type { CumulativeWeightTable } from "./weight-table.ts";

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

/** Rejected table draws tolerated before switching to an exact draw. */
const MAX_REJECTIONS = 16;

/**
 * KeySelector implements weighted random selection without replacement.
 * Keys with higher weights have proportionally higher selection probability;
 * recently used keys are skipped while enough fresh keys remain.
 */
export class KeySelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  /**
   * Select `count` distinct keys from the table.
   *
   * @param isRecent - Whether a key was handed out recently
   * @throws InsufficientKeysError when the table holds fewer than `count` keys
   */
  select(
    table: CumulativeWeightTable,
    count: number,
    isRecent: (record: KeyRecord) => boolean = () => false,
  ): KeyRecord[] {
    if (count === 0) {
      return [];
    }
    if (table.size < count) {
      throw new InsufficientKeysError(count, table.size);
    }

    const chosen = new Set<KeyRecord>();
    const selected: KeyRecord[] = [];
    // Zero-weight keys only count as fresh when the whole table carries no weight.
    const countsAsFresh = (record: KeyRecord): boolean =>
      !isRecent(record) && (table.total <= 0 || record.weight > 0);
    let freshRemaining = table.entries.filter(countsAsFresh).length;

    while (selected.length < count) {
      const needed = count - selected.length;
      const avoidRecent = freshRemaining >= needed;
      const eligible = (record: KeyRecord): boolean =>
        !chosen.has(record) && (!avoidRecent || !isRecent(record));

      const pick = this.drawOne(table, eligible);
      chosen.add(pick);
      selected.push(pick);
      if (countsAsFresh(pick)) {
        freshRemaining -= 1;
      }
    }

    return selected;
  }

  /**
   * Draw a single eligible key. Callers guarantee at least one eligible entry.
   */
  private drawOne(table: CumulativeWeightTable, eligible: (record: KeyRecord) => boolean): KeyRecord {
    if (table.total > 0) {
      for (let attempt = 0; attempt < MAX_REJECTIONS; attempt += 1) {
        const candidate = table.draw(this.random());
        if (candidate && eligible(candidate)) {
          return candidate;
        }
      }
    }

    const candidates = table.entries.filter(eligible);
    const mass = candidates.reduce((sum, record) => sum + Math.max(0, record.weight), 0);

    if (mass > 0) {
      const target = this.random() * mass;
      let running = 0;
      for (const candidate of candidates) {
        running += Math.max(0, candidate.weight);
        if (running > target) {
          return candidate;
        }
      }
      const last = candidates.findLast((record) => record.weight > 0);
      if (last) {
        return last;
      }
    }

    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    const fallback = candidates[index];
    if (!fallback) {
      throw new InsufficientKeysError(1, 0);
    }
    return fallback;
  }
}
