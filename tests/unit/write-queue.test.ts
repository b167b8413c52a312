import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResilientStateStore } from "../../src/persistence/resilient-store.ts";
import { WriteBehindQueue } from "../../src/persistence/write-queue.ts";
import type { UsageEvent } from "../../src/types/key.ts";
import { FIXED_NOW, createMockStore, persistedState, type MockStore } from "../helpers/fixtures.ts";

const usage = (value: string): UsageEvent => ({
  value,
  timestamp: FIXED_NOW,
  outcome: "success",
  statusCode: null,
});

describe("WriteBehindQueue", () => {
  let store: MockStore;
  let queue: WriteBehindQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    store = createMockStore();
    queue = new WriteBehindQueue(store, { flushIntervalMs: 100, retryDelayMs: 1000 });
  });

  afterEach(() => {
    queue.close();
    vi.useRealTimers();
  });

  it("should not write on the calling path", () => {
    queue.save(persistedState("key-a"));

    expect(store.upsertKeys).not.toHaveBeenCalled();
    expect(queue.pending).toBe(1);
  });

  it("should coalesce writes per key and keep first-enqueue order", () => {
    queue.save(persistedState("key-a", { weight: 0.9 }));
    queue.save(persistedState("key-b"));
    queue.save(persistedState("key-a", { weight: 0.8 }));

    vi.advanceTimersByTime(100);

    expect(store.upsertKeys).toHaveBeenCalledTimes(1);
    expect(store.upsertKeys).toHaveBeenCalledWith([
      persistedState("key-a", { weight: 0.8 }),
      persistedState("key-b"),
    ]);
    expect(queue.pending).toBe(0);
  });

  it("should requeue a failed batch and retry after the retry delay", () => {
    store.upsertKeys.mockImplementationOnce(() => {
      throw new Error("database is locked");
    });
    queue.save(persistedState("key-a"));

    vi.advanceTimersByTime(100);
    expect(store.upsertKeys).toHaveBeenCalledTimes(1);
    expect(queue.pending).toBe(1);

    vi.advanceTimersByTime(999);
    expect(store.upsertKeys).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    expect(store.upsertKeys).toHaveBeenCalledTimes(2);
    expect(store.upsertKeys).toHaveBeenLastCalledWith([persistedState("key-a")]);
    expect(queue.pending).toBe(0);
  });

  it("should retry lock contention against the primary store", () => {
    const fallback = createMockStore();
    const resilient = new ResilientStateStore(store, fallback);
    const contended = new WriteBehindQueue(resilient, { flushIntervalMs: 100, retryDelayMs: 1000 });
    store.upsertKeys.mockImplementationOnce(() => {
      throw Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" });
    });
    contended.save(persistedState("key-a"));

    vi.advanceTimersByTime(100);
    expect(contended.pending).toBe(1);

    vi.advanceTimersByTime(1000);
    expect(store.upsertKeys).toHaveBeenCalledTimes(2);
    expect(store.upsertKeys).toHaveBeenLastCalledWith([persistedState("key-a")]);
    expect(fallback.upsertKeys).not.toHaveBeenCalled();
    expect(resilient.usingFallback).toBe(false);
    expect(contended.pending).toBe(0);
    contended.close();
  });

  it("should let newer writes supersede a failed batch", () => {
    store.upsertKeys.mockImplementationOnce(() => {
      throw new Error("database is locked");
    });
    queue.save(persistedState("key-a", { weight: 0.9 }));
    vi.advanceTimersByTime(100);

    queue.save(persistedState("key-a", { weight: 0.5 }));
    vi.advanceTimersByTime(1000);

    expect(store.upsertKeys).toHaveBeenLastCalledWith([persistedState("key-a", { weight: 0.5 })]);
  });

  it("should turn a save followed by a delete into a delete", () => {
    queue.save(persistedState("key-a"));
    queue.delete("key-a");

    expect(queue.flush()).toBe(true);

    expect(store.deleteKeys).toHaveBeenCalledWith(["key-a"]);
    expect(store.upsertKeys).toHaveBeenCalledWith([]);
  });

  it("should drop the oldest usage events past the backlog limit", () => {
    queue = new WriteBehindQueue(store, {
      flushIntervalMs: 100,
      retryDelayMs: 1000,
      maxPendingUsage: 2,
    });
    queue.recordUsage(usage("key-a"));
    queue.recordUsage(usage("key-b"));
    queue.recordUsage(usage("key-c"));

    queue.flush();

    expect(store.recordUsage).toHaveBeenCalledWith([usage("key-b"), usage("key-c")]);
  });

  it("should flush on close and write through afterwards", () => {
    queue.save(persistedState("key-a"));

    expect(queue.close()).toBe(true);
    expect(store.upsertKeys).toHaveBeenCalledWith([persistedState("key-a")]);

    queue.save(persistedState("key-b"));
    expect(store.upsertKeys).toHaveBeenLastCalledWith([persistedState("key-b")]);
  });

  it("should report a failed final flush without scheduling retries", () => {
    store.upsertKeys.mockImplementation(() => {
      throw new Error("disk I/O error");
    });
    queue.save(persistedState("key-a"));

    expect(queue.close()).toBe(false);
    expect(queue.pending).toBe(1);
    expect(vi.getTimerCount()).toBe(0);

    store.upsertKeys.mockReset();
  });
});
