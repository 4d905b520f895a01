import { StorageBackend, TableName, UsabilityRecordMap } from '../types/usability';

export interface ReadOptions {
  /** Return at most this many rows, counted from the first inserted */
  limit?: number;
}

/**
 * Append-only storage for the four usability tables.
 *
 * Rows come back in insertion order. Faults are not retried; they reject the
 * returned promise and the caller decides what to show.
 */
export interface UsabilityStore {
  readonly backend: StorageBackend;
  append<K extends TableName>(table: K, record: UsabilityRecordMap[K]): Promise<void>;
  readAll<K extends TableName>(table: K, options?: ReadOptions): Promise<UsabilityRecordMap[K][]>;
}

export function normalizeLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) return undefined;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Row limit must be a positive integer, got ${limit}`);
  }
  return limit;
}
