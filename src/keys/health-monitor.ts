import type { ErrorSignal, KeyRecord, KeyStatus } from "../types/key.ts";

export interface HealthPolicy {
  /** Multiplier applied on success, capped at the key's initial weight. */
  successGrowth: number;
  rateLimitDecay: number;
  serverErrorDecay: number;
  /** Consecutive successes that promote a degraded key back to available. */
  recoverySuccesses: number;
}

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  successGrowth: 1.1,
  rateLimitDecay: 0.8,
  serverErrorDecay: 0.9,
  recoverySuccesses: 3,
};

export interface HealthTransition {
  previousStatus: KeyStatus;
  status: KeyStatus;
  previousWeight: number;
  weight: number;
}

/**
 * HealthMonitor applies call outcomes to a key record.
 *
 * available ⇄ degraded on transient errors and sustained success;
 * any state → unavailable on auth errors. Unavailable is terminal until the
 * record is reset.
 */
export class HealthMonitor {
  private readonly policy: HealthPolicy;

  constructor(policy: Partial<HealthPolicy> = {}) {
    this.policy = { ...DEFAULT_HEALTH_POLICY, ...policy };
  }

  recordSuccess(record: KeyRecord): HealthTransition {
    const previousStatus = record.status;
    const previousWeight = record.weight;

    record.consecutiveErrors = 0;
    record.consecutiveSuccesses += 1;

    if (record.status !== "unavailable") {
      record.weight = Math.min(record.weight * this.policy.successGrowth, record.initialWeight);
      if (
        record.status === "degraded" &&
        record.consecutiveSuccesses >= this.policy.recoverySuccesses
      ) {
        record.status = "available";
      }
    }

    return { previousStatus, status: record.status, previousWeight, weight: record.weight };
  }

  recordFailure(record: KeyRecord, signal: ErrorSignal, now: Date = new Date()): HealthTransition {
    const previousStatus = record.status;
    const previousWeight = record.weight;

    record.consecutiveSuccesses = 0;
    record.consecutiveErrors += 1;
    record.errorCount += 1;
    record.lastErrorAt = now;
    record.lastErrorCode = signal.statusCode;

    switch (signal.category) {
      case "auth":
        record.weight = 0;
        record.status = "unavailable";
        break;
      case "rate_limited":
        this.degrade(record, this.policy.rateLimitDecay);
        break;
      case "server":
      case "unclassified":
        this.degrade(record, this.policy.serverErrorDecay);
        break;
    }

    return { previousStatus, status: record.status, previousWeight, weight: record.weight };
  }

  /**
   * Restore a record to its configured weight and a clean available state.
   */
  reset(record: KeyRecord): HealthTransition {
    const previousStatus = record.status;
    const previousWeight = record.weight;
    record.weight = record.initialWeight;
    record.status = "available";
    record.consecutiveErrors = 0;
    record.consecutiveSuccesses = 0;
    return { previousStatus, status: record.status, previousWeight, weight: record.weight };
  }

  private degrade(record: KeyRecord, factor: number): void {
    if (record.status === "unavailable") {
      return;
    }
    record.weight *= factor;
    record.status = "degraded";
  }
}
