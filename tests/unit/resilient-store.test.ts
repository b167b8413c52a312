import { describe, expect, it } from "vitest";
import { ResilientStateStore, isTransientStoreError } from "../../src/persistence/resilient-store.ts";
import { createMockStore, persistedState } from "../helpers/fixtures.ts";

const failing = (message: string) => () => {
  throw new Error(message);
};

describe("ResilientStateStore", () => {
  it("should use the primary store when it is healthy", () => {
    const primaryStore = createMockStore();
    const fallbackStore = createMockStore();
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);

    resilientStore.init();
    resilientStore.load();
    resilientStore.upsertKeys([persistedState("key-a")]);

    expect(primaryStore.init).toHaveBeenCalledTimes(1);
    expect(primaryStore.load).toHaveBeenCalledTimes(1);
    expect(primaryStore.upsertKeys).toHaveBeenCalledTimes(1);

    expect(fallbackStore.init).not.toHaveBeenCalled();
    expect(fallbackStore.load).not.toHaveBeenCalled();
    expect(fallbackStore.upsertKeys).not.toHaveBeenCalled();
    expect(resilientStore.usingFallback).toBe(false);
  });

  it("should fall back to the secondary store when the primary fails to initialize", () => {
    const primaryStore = createMockStore();
    primaryStore.init.mockImplementation(failing("Primary store failed to initialize"));
    const fallbackStore = createMockStore([persistedState("key-a")]);
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);

    resilientStore.init();
    const state = resilientStore.load();

    expect(fallbackStore.init).toHaveBeenCalledTimes(1);
    expect(fallbackStore.load).toHaveBeenCalledTimes(1);
    expect(primaryStore.load).not.toHaveBeenCalled();
    expect(state.keys.map((key) => key.value)).toEqual(["key-a"]);
  });

  it("should switch to the fallback store for subsequent writes after a failure", () => {
    const primaryStore = createMockStore();
    primaryStore.upsertKeys.mockImplementation(failing("database disk image is malformed"));
    const fallbackStore = createMockStore();
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);
    resilientStore.init();

    const batch = [persistedState("key-a")];
    resilientStore.upsertKeys(batch);
    resilientStore.deleteKeys(["key-b"]);

    expect(fallbackStore.upsertKeys).toHaveBeenCalledWith(batch);
    expect(fallbackStore.deleteKeys).toHaveBeenCalledWith(["key-b"]);
    expect(primaryStore.deleteKeys).not.toHaveBeenCalled();
    expect(resilientStore.usingFallback).toBe(true);
  });

  it("should rethrow lock contention and keep writing to the primary", () => {
    const primaryStore = createMockStore();
    primaryStore.upsertKeys.mockImplementationOnce(failing("SQLITE_BUSY: database is locked"));
    const fallbackStore = createMockStore();
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);
    resilientStore.init();

    const batch = [persistedState("key-a")];
    expect(() => resilientStore.upsertKeys(batch)).toThrow("SQLITE_BUSY");
    resilientStore.upsertKeys(batch);
    resilientStore.upsertKeys(batch);

    expect(primaryStore.upsertKeys).toHaveBeenCalledTimes(3);
    expect(fallbackStore.upsertKeys).not.toHaveBeenCalled();
    expect(fallbackStore.init).not.toHaveBeenCalled();
    expect(resilientStore.usingFallback).toBe(false);
  });

  it("should treat busy and locked error codes as transient", () => {
    const withCode = (code: string) => Object.assign(new Error("contention"), { code });

    expect(isTransientStoreError(withCode("SQLITE_BUSY_SNAPSHOT"))).toBe(true);
    expect(isTransientStoreError(withCode("SQLITE_LOCKED"))).toBe(true);
    expect(isTransientStoreError(new Error("database disk image is malformed"))).toBe(false);
    expect(isTransientStoreError("SQLITE_BUSY")).toBe(false);
  });

  it("should load from the fallback when the primary load fails", () => {
    const primaryStore = createMockStore();
    primaryStore.load.mockImplementation(failing("no such table"));
    const fallbackStore = createMockStore([persistedState("key-a")]);
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);
    resilientStore.init();

    expect(resilientStore.load().keys).toHaveLength(1);
    expect(resilientStore.usingFallback).toBe(true);
  });

  it("should read history from the fallback when the primary read fails", () => {
    const primaryStore = createMockStore();
    primaryStore.getSourceHash.mockImplementation(failing("database is locked"));
    const fallbackStore = createMockStore();
    fallbackStore.getSourceHash.mockReturnValue("abc123");
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);

    expect(resilientStore.getSourceHash("/tmp/keys.txt")).toBe("abc123");
  });

  it("should close both stores once the fallback is active", () => {
    const primaryStore = createMockStore();
    primaryStore.init.mockImplementation(failing("unable to open database file"));
    const fallbackStore = createMockStore();
    const resilientStore = new ResilientStateStore(primaryStore, fallbackStore);
    resilientStore.init();

    resilientStore.close();

    expect(primaryStore.close).toHaveBeenCalledTimes(1);
    expect(fallbackStore.close).toHaveBeenCalledTimes(1);
  });
});
