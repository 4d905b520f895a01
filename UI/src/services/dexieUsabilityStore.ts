import Dexie, { type DexieOptions, type Table } from 'dexie';
import { TableName, UsabilityRecordMap } from '../types/usability';
import { ReadOptions, UsabilityStore, normalizeLimit } from './usabilityStore';
import { StoredRow, decodeRow, encodeRow } from './usabilitySchema';

export interface DexieStoreOptions {
  databaseName: string;
  /** Injected IndexedDB implementation; defaults to the browser's */
  indexedDB?: DexieOptions['indexedDB'];
  IDBKeyRange?: DexieOptions['IDBKeyRange'];
}

/** Auto-incrementing key keeps insertion order for reads */
export class UsabilityDatabase extends Dexie {
  consent!: Table<StoredRow, number>;
  demographics!: Table<StoredRow, number>;
  tasks!: Table<StoredRow, number>;
  exit!: Table<StoredRow, number>;

  constructor(options: DexieStoreOptions) {
    super(
      options.databaseName,
      options.indexedDB && options.IDBKeyRange
        ? { indexedDB: options.indexedDB, IDBKeyRange: options.IDBKeyRange }
        : undefined
    );
    this.version(1).stores({
      consent: '++id',
      demographics: '++id',
      tasks: '++id',
      exit: '++id',
    });
  }
}

export class DexieUsabilityStore implements UsabilityStore {
  readonly backend = 'database' as const;
  private db: UsabilityDatabase;

  constructor(options: DexieStoreOptions) {
    this.db = new UsabilityDatabase(options);
  }

  async append<K extends TableName>(table: K, record: UsabilityRecordMap[K]): Promise<void> {
    await this.db[table].add(encodeRow(table, record));
  }

  async readAll<K extends TableName>(table: K, options: ReadOptions = {}): Promise<UsabilityRecordMap[K][]> {
    const limit = normalizeLimit(options.limit);
    const source = this.db[table];
    const rows = limit === undefined ? await source.toArray() : await source.limit(limit).toArray();
    return rows.map((row) => decodeRow(table, row));
  }

  close(): void {
    this.db.close();
  }
}
