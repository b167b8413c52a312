import { setTimeout as sleep } from "node:timers/promises";
import { InsufficientKeysError, RetriesExhaustedError } from "../errors.ts";
import { classifyError } from "../keys/error-classifier.ts";
import type { KeyManager } from "../keys/key-manager.ts";
import { keyId, logger } from "../observability/logger.ts";
import { attemptCounter, operationDuration } from "../observability/metrics.ts";
import type { RetryConfig } from "../types/config.ts";

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
};

/**
 * What an operation receives for one attempt.
 */
export interface KeyHandle {
  key: string;
  attempt: number;
}

export type KeyOperation<T> = (handle: KeyHandle) => Promise<T> | T;

export type Sleeper = (ms: number) => Promise<void>;

export interface RetryExecutorOptions {
  keys: KeyManager;
  retry?: Partial<RetryConfig>;
  sleep?: Sleeper;
}

export function validateRetryConfig(config: RetryConfig): RetryConfig {
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${config.maxRetries}`);
  }
  if (!(config.baseDelayMs > 0)) {
    throw new RangeError(`baseDelayMs must be positive, got ${config.baseDelayMs}`);
  }
  if (!(config.backoffFactor > 0)) {
    throw new RangeError(`backoffFactor must be positive, got ${config.backoffFactor}`);
  }
  return config;
}

/**
 * Delay before the attempt following `attempt` (zero-based).
 */
export function backoffDelay(config: RetryConfig, attempt: number): number {
  return config.baseDelayMs * config.backoffFactor ** attempt;
}

/**
 * RetryExecutor runs caller operations with a balanced key, reporting every
 * outcome and rotating to a freshly selected key on failure.
 *
 * No pool state is held while the operation runs; only the synchronous
 * select and report calls touch the pool.
 */
export class RetryExecutor {
  private readonly keys: KeyManager;
  private readonly defaults: RetryConfig;
  private readonly sleep: Sleeper;

  constructor(options: RetryExecutorOptions) {
    this.keys = options.keys;
    this.defaults = validateRetryConfig({ ...DEFAULT_RETRY_CONFIG, ...options.retry });
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  get retryConfig(): RetryConfig {
    return { ...this.defaults };
  }

  /**
   * Run `operation` until it succeeds or `maxRetries + 1` attempts have failed.
   *
   * @throws InsufficientKeysError when no key can be acquired (not retried);
   *   after a failed attempt it carries that failure as `cause`
   * @throws RetriesExhaustedError carrying the last failure as `cause`
   */
  async execute<T>(operation: KeyOperation<T>, retry: Partial<RetryConfig> = {}): Promise<T> {
    const config = validateRetryConfig({ ...this.defaults, ...retry });
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= config.maxRetries; attempt += 1) {
      const key = attempt === 0 ? this.acquire() : this.reacquire(lastError);
      try {
        return await this.attempt(operation, { key, attempt });
      } catch (error) {
        lastError = error;
        if (attempt < config.maxRetries) {
          const delay = backoffDelay(config, attempt);
          logger.warn(
            { keyId: keyId(key), attempt: attempt + 1, maxAttempts: config.maxRetries + 1, delay },
            "Operation failed; retrying with another key",
          );
          await this.sleep(delay);
        }
      }
    }

    logger.error({ attempts: config.maxRetries + 1 }, "Operation failed on every attempt");
    throw new RetriesExhaustedError(config.maxRetries + 1, lastError);
  }

  /**
   * Acquire one key for a single attempt. Success or failure is reported on
   * every exit path, then the outcome is passed through unchanged.
   */
  async withKey<T>(operation: KeyOperation<T>): Promise<T> {
    return this.attempt(operation, { key: this.acquire(), attempt: 0 });
  }

  /**
   * Bind an operation to the executor, decorator style: the returned function
   * takes the remaining arguments and runs through `execute`.
   */
  wrap<A extends unknown[], T>(
    fn: (handle: KeyHandle, ...args: A) => Promise<T> | T,
    retry: Partial<RetryConfig> = {},
  ): (...args: A) => Promise<T> {
    return (...args: A) => this.execute((handle) => fn(handle, ...args), retry);
  }

  private acquire(): string {
    const [key] = this.keys.select(1);
    if (key === undefined) {
      throw new InsufficientKeysError(1, 0);
    }
    return key;
  }

  private reacquire(lastError: unknown): string {
    try {
      return this.acquire();
    } catch (error) {
      if (error instanceof InsufficientKeysError) {
        logger.error({ available: error.available }, "No selectable key left for retry");
        throw new InsufficientKeysError(error.requested, error.available, { cause: lastError });
      }
      throw error;
    }
  }

  private async attempt<T>(operation: KeyOperation<T>, handle: KeyHandle): Promise<T> {
    const endTimer = operationDuration.startTimer();
    try {
      const result = await operation(handle);
      endTimer({ result: "success" });
      attemptCounter.inc({ result: "success", category: "none" });
      this.keys.reportSuccess(handle.key);
      return result;
    } catch (error) {
      endTimer({ result: "error" });
      const signal = classifyError(error);
      attemptCounter.inc({ result: "error", category: signal.category });
      this.keys.reportError(handle.key, signal);
      throw error;
    }
  }
}
