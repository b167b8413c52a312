export type KeyStatus = "available" | "degraded" | "unavailable";

export type ErrorCategory = "auth" | "rate_limited" | "server" | "unclassified";

/**
 * Durable row for a single key. The in-memory KeyRecord carries the same
 * fields; stores only ever receive copies.
 */
export interface PersistedKeyState {
  value: string;
  weight: number;
  initialWeight: number;
  status: KeyStatus;
  consecutiveErrors: number;
  consecutiveSuccesses: number;
  errorCount: number;
  lastUsedAt: Date | null;
  lastErrorAt: Date | null;
  lastErrorCode: number | null;
  source: string;
  addedAt: Date;
}

export type KeyRecord = Readonly<Pick<PersistedKeyState, "value">> &
  Omit<PersistedKeyState, "value">;

export interface ErrorSignal {
  statusCode: number;
  category: ErrorCategory;
  message: string;
}

export interface KeyEntry {
  value: string;
  weight: number;
}

export interface KeySummary {
  key: string;
  weight: number;
  initialWeight: number;
  status: KeyStatus;
  errorCount: number;
  consecutiveErrors: number;
  consecutiveSuccesses: number;
  lastUsedAt: Date | null;
  lastErrorAt: Date | null;
  lastErrorCode: number | null;
  source: string;
  addedAt: Date;
}

export interface KeyInfo extends KeySummary {
  inCache: boolean;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  lookups: number;
}

export interface PoolStats {
  total: number;
  available: number;
  degraded: number;
  unavailable: number;
  averageWeight: number;
  cacheHitRate: number;
  cache: CacheStats;
}

export type UsageOutcome = "success" | "error";

export interface UsageEvent {
  value: string;
  timestamp: Date;
  outcome: UsageOutcome;
  statusCode: number | null;
}

export interface ImportHistoryEntry {
  value: string;
  source: string;
  importedAt: Date;
}

export interface ImportResult {
  added: number;
  updated: number;
  missing: number;
  skipped: boolean;
}
