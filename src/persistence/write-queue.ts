import { keyId, logger } from "../observability/logger.ts";
import type { PersistedKeyState, UsageEvent } from "../types/key.ts";
import type { StateStore } from "./types.ts";

export interface WriteBehindOptions {
  flushIntervalMs: number;
  retryDelayMs: number;
  /** Oldest usage events are dropped past this many unflushed entries. */
  maxPendingUsage?: number;
}

const DEFAULT_MAX_PENDING_USAGE = 10_000;

/**
 * WriteBehindQueue keeps durable writes off the selection and reporting path.
 *
 * Key rows coalesce per value (last write wins) and keep the order in which
 * each value was first queued. A background timer drains the queue; a failed
 * drain puts the batch back unless newer writes superseded it and retries
 * after `retryDelayMs`.
 */
export class WriteBehindQueue {
  private pendingKeys = new Map<string, PersistedKeyState>();
  private pendingDeletes = new Set<string>();
  private pendingUsage: UsageEvent[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private readonly maxPendingUsage: number;

  constructor(
    private readonly store: StateStore,
    private readonly options: WriteBehindOptions,
  ) {
    this.maxPendingUsage = options.maxPendingUsage ?? DEFAULT_MAX_PENDING_USAGE;
  }

  get pending(): number {
    return this.pendingKeys.size + this.pendingDeletes.size + this.pendingUsage.length;
  }

  save(state: PersistedKeyState): void {
    this.pendingDeletes.delete(state.value);
    this.pendingKeys.set(state.value, state);
    this.schedule(this.options.flushIntervalMs);
  }

  delete(value: string): void {
    this.pendingKeys.delete(value);
    this.pendingDeletes.add(value);
    this.schedule(this.options.flushIntervalMs);
  }

  recordUsage(event: UsageEvent): void {
    this.pendingUsage.push(event);
    if (this.pendingUsage.length > this.maxPendingUsage) {
      const dropped = this.pendingUsage.length - this.maxPendingUsage;
      this.pendingUsage.splice(0, dropped);
      logger.warn({ dropped }, "Usage history backlog full; dropped oldest events");
    }
    this.schedule(this.options.flushIntervalMs);
  }

  /**
   * Drain everything queued so far. Returns false when the store rejected
   * the batch; the batch stays queued in that case.
   */
  flush(): boolean {
    if (this.pending === 0) {
      return true;
    }

    const keys = this.pendingKeys;
    const deletes = this.pendingDeletes;
    const usage = this.pendingUsage;
    this.pendingKeys = new Map();
    this.pendingDeletes = new Set();
    this.pendingUsage = [];

    try {
      this.store.deleteKeys([...deletes]);
      this.store.upsertKeys([...keys.values()]);
      this.store.recordUsage(usage);
      logger.debug(
        { keys: keys.size, deletes: deletes.size, usage: usage.length },
        "Flushed pending state writes",
      );
      return true;
    } catch (error) {
      logger.error(
        {
          error,
          keyIds: [...keys.keys()].map(keyId),
          deletes: deletes.size,
          usage: usage.length,
        },
        "Failed to flush key state; will retry",
      );
      this.requeue(keys, deletes, usage);
      return false;
    }
  }

  /**
   * Stop the background timer and flush what is left.
   */
  close(): boolean {
    this.closed = true;
    this.clearTimer();
    const flushed = this.flush();
    if (!flushed) {
      logger.error({ pending: this.pending }, "Pending key state could not be flushed on close");
    }
    return flushed;
  }

  private requeue(
    keys: Map<string, PersistedKeyState>,
    deletes: Set<string>,
    usage: UsageEvent[],
  ): void {
    const merged = new Map<string, PersistedKeyState>();
    keys.forEach((state, value) => {
      if (!this.pendingKeys.has(value) && !this.pendingDeletes.has(value)) {
        merged.set(value, state);
      }
    });
    this.pendingKeys.forEach((state, value) => merged.set(value, state));
    this.pendingKeys = merged;

    deletes.forEach((value) => {
      if (!this.pendingKeys.has(value)) {
        this.pendingDeletes.add(value);
      }
    });

    this.pendingUsage = [...usage, ...this.pendingUsage];
    if (!this.closed) {
      this.schedule(this.options.retryDelayMs);
    }
  }

  private schedule(delayMs: number): void {
    if (this.closed) {
      this.flush();
      return;
    }
    if (this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, delayMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
