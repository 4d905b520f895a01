import { STORAGE_CONFIG } from '../config/usabilityConfig';
import { TableName, UsabilityRecordMap } from '../types/usability';
import { toCsv } from './csv';
import { TABLE_COLUMNS, TABLE_NAMES, encodeRow } from './usabilitySchema';
import { UsabilityStore } from './usabilityStore';

export type UsabilityExportTables = Record<TableName, string>;

export function tableToCsv<K extends TableName>(table: K, records: UsabilityRecordMap[K][]): string {
  return toCsv(
    TABLE_COLUMNS[table],
    records.map((record) => encodeRow(table, record))
  );
}

export async function buildUsabilityExportTables(store: UsabilityStore): Promise<UsabilityExportTables> {
  const [consent, demographics, tasks, exit] = await Promise.all([
    store.readAll('consent'),
    store.readAll('demographics'),
    store.readAll('tasks'),
    store.readAll('exit'),
  ]);

  return {
    consent: tableToCsv('consent', consent),
    demographics: tableToCsv('demographics', demographics),
    tasks: tableToCsv('tasks', tasks),
    exit: tableToCsv('exit', exit),
  };
}

export function triggerDownload(content: string, filename: string, mimeType: string): void {
  const blob = new Blob([content], { type: mimeType });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  anchor.click();
  URL.revokeObjectURL(url);
}

export async function exportUsabilityTables(store: UsabilityStore, tables: readonly TableName[] = TABLE_NAMES): Promise<void> {
  const content = await buildUsabilityExportTables(store);
  tables.forEach((table) => {
    triggerDownload(content[table], STORAGE_CONFIG.csvFileNames[table], 'text/csv');
  });
}
