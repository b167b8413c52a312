import type { KeyRecord, PersistedKeyState } from "../types/key.ts";
import { CumulativeWeightTable, isSelectable } from "./weight-table.ts";

export interface NewKeyOptions {
  weight?: number;
  source?: string;
  now?: Date;
}

export function createKeyRecord(value: string, options: NewKeyOptions = {}): KeyRecord {
  const weight = Math.max(0, options.weight ?? 1);
  return {
    value,
    weight,
    initialWeight: weight,
    status: "available",
    consecutiveErrors: 0,
    consecutiveSuccesses: 0,
    errorCount: 0,
    lastUsedAt: null,
    lastErrorAt: null,
    lastErrorCode: null,
    source: options.source ?? "manual",
    addedAt: options.now ?? new Date(),
  };
}

export function toPersisted(record: KeyRecord): PersistedKeyState {
  return { ...record };
}

export function fromPersisted(state: PersistedKeyState): KeyRecord {
  return { ...state };
}

/**
 * KeyPool keeps every known key in a stable insertion order, together with
 * the lazily rebuilt cumulative weight table over its selectable members.
 */
export class KeyPool {
  private readonly records: KeyRecord[] = [];
  private readonly byValue = new Map<string, KeyRecord>();
  private cachedTable: CumulativeWeightTable | null = null;

  get size(): number {
    return this.records.length;
  }

  has(value: string): boolean {
    return this.byValue.has(value);
  }

  get(value: string): KeyRecord | undefined {
    return this.byValue.get(value);
  }

  /**
   * Append a record. Returns false when the value is already pooled.
   */
  add(record: KeyRecord): boolean {
    if (this.byValue.has(record.value)) {
      return false;
    }
    this.records.push(record);
    this.byValue.set(record.value, record);
    this.markDirty();
    return true;
  }

  remove(value: string): KeyRecord | undefined {
    const record = this.byValue.get(value);
    if (!record) {
      return undefined;
    }
    this.byValue.delete(value);
    const index = this.records.indexOf(record);
    if (index >= 0) {
      this.records.splice(index, 1);
    }
    this.markDirty();
    return record;
  }

  values(): readonly KeyRecord[] {
    return this.records;
  }

  selectableCount(): number {
    return this.records.filter(isSelectable).length;
  }

  /**
   * Invalidate the weight table after any weight, status or membership change.
   */
  markDirty(): void {
    this.cachedTable = null;
  }

  isDirty(): boolean {
    return this.cachedTable === null;
  }

  table(): CumulativeWeightTable {
    if (!this.cachedTable) {
      this.cachedTable = CumulativeWeightTable.build(this.records);
    }
    return this.cachedTable;
  }
}
