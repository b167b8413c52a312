import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { KeyStatus } from "../types/key.ts";

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: "key_balancer_" });

export const keyWeightGauge = new Gauge({
  name: "key_balancer_key_weight",
  help: "Current selection weight per API key",
  labelNames: ["key"],
  registers: [registry],
});

export const keyStatusGauge = new Gauge({
  name: "key_balancer_key_status",
  help: "Health status per API key (0 available, 1 degraded, 2 unavailable)",
  labelNames: ["key"],
  registers: [registry],
});

export const selectionCounter = new Counter({
  name: "key_balancer_selections_total",
  help: "Keys handed out by the weighted selector",
  labelNames: ["recent"],
  registers: [registry],
});

export const attemptCounter = new Counter({
  name: "key_balancer_attempts_total",
  help: "Operation attempts run by the retry executor",
  labelNames: ["result", "category"],
  registers: [registry],
});

export const operationDuration = new Histogram({
  name: "key_balancer_operation_duration_seconds",
  help: "Duration histogram for operations run with a balanced key",
  labelNames: ["result"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

const STATUS_VALUE: Record<KeyStatus, number> = {
  available: 0,
  degraded: 1,
  unavailable: 2,
};

export function observeKeyHealth(id: string, weight: number, status: KeyStatus): void {
  keyWeightGauge.set({ key: id }, weight);
  keyStatusGauge.set({ key: id }, STATUS_VALUE[status]);
}

export function forgetKeyHealth(id: string): void {
  keyWeightGauge.remove({ key: id });
  keyStatusGauge.remove({ key: id });
}
