import { vi } from "vitest";
import { createKeyRecord } from "../../src/keys/key-pool.ts";
import type { RandomSource } from "../../src/keys/key-selector.ts";
import type { StateStore } from "../../src/persistence/types.ts";
import type { KeyRecord, KeyStatus, PersistedKeyState } from "../../src/types/key.ts";

export const FIXED_NOW = new Date("2025-01-01T00:00:00Z");

/**
 * Replays the given samples in order, wrapping around at the end.
 */
export function sequence(samples: number[]): RandomSource {
  let index = 0;
  return () => {
    const sample = samples[index % samples.length] ?? 0;
    index += 1;
    return sample;
  };
}

/**
 * Deterministic uniform source (mulberry32) for statistical tests.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function record(
  value: string,
  weight = 1,
  status: KeyStatus = "available",
): KeyRecord {
  const created = createKeyRecord(value, { weight, now: FIXED_NOW });
  created.status = status;
  return created;
}

export function persistedState(
  value: string,
  overrides: Partial<Omit<PersistedKeyState, "value">> = {},
): PersistedKeyState {
  return { ...createKeyRecord(value, { weight: 1, source: "config", now: FIXED_NOW }), ...overrides };
}

export function createMockStore(keys: PersistedKeyState[] = []) {
  return {
    init: vi.fn<StateStore["init"]>(),
    load: vi.fn<StateStore["load"]>(() => ({ keys })),
    upsertKeys: vi.fn<StateStore["upsertKeys"]>(),
    deleteKeys: vi.fn<StateStore["deleteKeys"]>(),
    recordImports: vi.fn<StateStore["recordImports"]>(),
    recordUsage: vi.fn<StateStore["recordUsage"]>(),
    getImportHistory: vi.fn<StateStore["getImportHistory"]>(() => []),
    getSourceHash: vi.fn<StateStore["getSourceHash"]>(() => null),
    recordSourceHash: vi.fn<StateStore["recordSourceHash"]>(),
    close: vi.fn<StateStore["close"]>(),
  } satisfies StateStore;
}

export type MockStore = ReturnType<typeof createMockStore>;
