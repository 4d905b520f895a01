import { TableName, UsabilityRecordMap } from '../types/usability';
import { csvLine, parseCsvRecords } from './csv';
import { StorageError } from './storageError';
import { TABLE_COLUMNS, encodeRow, decodeRow } from './usabilitySchema';
import { ReadOptions, UsabilityStore, normalizeLimit } from './usabilityStore';

/** Minimal named-text-file surface the CSV store writes through */
export interface TextFileSystem {
  read(fileName: string): string | null;
  write(fileName: string, content: string): void;
}

export function localStorageFileSystem(storage: Storage, keyPrefix: string): TextFileSystem {
  return {
    read: (fileName) => storage.getItem(`${keyPrefix}${fileName}`),
    write: (fileName, content) => storage.setItem(`${keyPrefix}${fileName}`, content),
  };
}

/**
 * One CSV file per table. The header row is written when a file is created;
 * an existing file is appended to as-is once it parses cleanly.
 */
export class CsvUsabilityStore implements UsabilityStore {
  readonly backend = 'csv' as const;

  constructor(
    private files: TextFileSystem,
    private fileNames: Record<TableName, string>
  ) {}

  fileNameFor(table: TableName): string {
    return this.fileNames[table];
  }

  async append<K extends TableName>(table: K, record: UsabilityRecordMap[K]): Promise<void> {
    const columns = TABLE_COLUMNS[table];
    const row = encodeRow(table, record);
    const line = csvLine(columns.map((column) => row[column]));
    const fileName = this.fileNameFor(table);
    const existing = this.files.read(fileName);

    if (!existing || existing.trim() === '') {
      this.files.write(fileName, `${csvLine([...columns])}\n${line}\n`);
      return;
    }

    this.parseFile(table, existing);
    const separator = existing.endsWith('\n') ? '' : '\n';
    this.files.write(fileName, `${existing}${separator}${line}\n`);
  }

  async readAll<K extends TableName>(table: K, options: ReadOptions = {}): Promise<UsabilityRecordMap[K][]> {
    const limit = normalizeLimit(options.limit);
    const content = this.files.read(this.fileNameFor(table));
    if (!content) return [];

    const rows = this.parseFile(table, content);
    const selected = limit === undefined ? rows : rows.slice(0, limit);
    return selected.map((row) => decodeRow(table, row));
  }

  private parseFile(table: TableName, content: string): Record<string, string>[] {
    try {
      return parseCsvRecords(content);
    } catch (error) {
      throw new StorageError(`${this.fileNameFor(table)} is not valid CSV`, table, error);
    }
  }
}
