import { describe, expect, it } from "vitest";
import { InsufficientKeysError } from "../../src/errors.ts";
import { KeySelector } from "../../src/keys/key-selector.ts";
import { CumulativeWeightTable } from "../../src/keys/weight-table.ts";
import type { KeyRecord } from "../../src/types/key.ts";
import { record, seededRandom, sequence } from "../helpers/fixtures.ts";

const valuesOf = (records: KeyRecord[]) => records.map((entry) => entry.value);

describe("KeySelector", () => {
  const buildTable = () =>
    CumulativeWeightTable.build([record("key-a", 2), record("key-b", 1), record("key-c", 1)]);

  describe("select", () => {
    it("should return an empty list for a count of zero", () => {
      const selector = new KeySelector(sequence([0.1]));
      expect(selector.select(buildTable(), 0)).toEqual([]);
    });

    it("should throw when fewer keys are selectable than requested", () => {
      const table = CumulativeWeightTable.build([
        record("key-a"),
        record("key-b"),
        record("key-c", 1, "unavailable"),
      ]);
      const selector = new KeySelector(sequence([0.1]));

      expect(() => selector.select(table, 3)).toThrow(InsufficientKeysError);
      try {
        selector.select(table, 3);
      } catch (error) {
        expect(error).toBeInstanceOf(InsufficientKeysError);
        if (error instanceof InsufficientKeysError) {
          expect(error.requested).toBe(3);
          expect(error.available).toBe(2);
        }
      }
    });

    it("should pick the key whose prefix range contains the sample", () => {
      const table = buildTable();

      expect(valuesOf(new KeySelector(sequence([0.1])).select(table, 1))).toEqual(["key-a"]);
      expect(valuesOf(new KeySelector(sequence([0.6])).select(table, 1))).toEqual(["key-b"]);
      expect(valuesOf(new KeySelector(sequence([0.9])).select(table, 1))).toEqual(["key-c"]);
    });

    it("should return distinct keys even when the sampler keeps hitting a chosen key", () => {
      const selector = new KeySelector(sequence([0.1]));

      expect(valuesOf(selector.select(buildTable(), 3))).toEqual(["key-a", "key-b", "key-c"]);
    });

    it("should avoid recently used keys while enough fresh keys remain", () => {
      const selector = new KeySelector(sequence([0.1, 0.6]));
      const picked = selector.select(buildTable(), 1, (entry) => entry.value === "key-a");

      expect(valuesOf(picked)).toEqual(["key-b"]);
    });

    it("should fall back to recent keys when too few fresh keys remain", () => {
      const selector = new KeySelector(sequence([0.1]));
      const recent = new Set(["key-a", "key-b"]);
      const picked = selector.select(buildTable(), 2, (entry) => recent.has(entry.value));

      expect(valuesOf(picked)).toEqual(["key-a", "key-c"]);
    });

    it("should ignore zero-weight keys when counting fresh candidates", () => {
      const table = CumulativeWeightTable.build([record("key-a", 1), record("key-z", 0)]);
      const selector = new KeySelector(sequence([0.5]));
      const picked = selector.select(table, 1, (entry) => entry.value === "key-a");

      expect(valuesOf(picked)).toEqual(["key-a"]);
    });

    it("should still prefer fresh keys when the whole table has zero weight", () => {
      const table = CumulativeWeightTable.build([record("key-a", 0), record("key-b", 0)]);
      const selector = new KeySelector(sequence([0.1]));
      const picked = selector.select(table, 1, (entry) => entry.value === "key-a");

      expect(valuesOf(picked)).toEqual(["key-b"]);
    });

    it("should draw uniformly when every selectable key has zero weight", () => {
      const table = CumulativeWeightTable.build([
        record("key-a", 0),
        record("key-b", 0),
        record("key-c", 0),
      ]);
      const selector = new KeySelector(sequence([0.5]));

      expect(valuesOf(selector.select(table, 2))).toEqual(["key-b", "key-c"]);
    });

    it("should converge to the configured weights over many draws", () => {
      const selector = new KeySelector(seededRandom(7));
      const table = buildTable();
      const counts = new Map<string, number>();
      const draws = 10_000;

      for (let i = 0; i < draws; i += 1) {
        const [picked] = selector.select(table, 1);
        if (picked) {
          counts.set(picked.value, (counts.get(picked.value) ?? 0) + 1);
        }
      }

      expect((counts.get("key-a") ?? 0) / draws).toBeGreaterThan(0.45);
      expect((counts.get("key-a") ?? 0) / draws).toBeLessThan(0.55);
      expect((counts.get("key-b") ?? 0) / draws).toBeGreaterThan(0.2);
      expect((counts.get("key-b") ?? 0) / draws).toBeLessThan(0.3);
    });
  });
});
