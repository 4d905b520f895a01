/**
 * Column layout of the four usability tables and the conversions between
 * in-memory records and stored rows.
 */

import { isFamiliarity, isTaskLabel, isTaskOutcome } from '../config/usabilityConfig';
import { TableName, UsabilityRecordMap } from '../types/usability';
import { StorageError } from './storageError';

export type CellValue = string | number | boolean | null;
export type StoredRow = Record<string, CellValue>;

export const TABLE_NAMES: readonly TableName[] = ['consent', 'demographics', 'tasks', 'exit'];

export const TABLE_COLUMNS: Record<TableName, readonly string[]> = {
  consent: ['timestamp', 'consent_given'],
  demographics: ['timestamp', 'name', 'age', 'occupation', 'familiarity'],
  tasks: ['timestamp', 'task_name', 'success', 'duration_seconds', 'notes'],
  exit: ['timestamp', 'satisfaction', 'difficulty', 'open_feedback'],
};

type RowEncoders = { [K in TableName]: (record: UsabilityRecordMap[K]) => StoredRow };
type RowDecoders = { [K in TableName]: (row: Record<string, unknown>) => UsabilityRecordMap[K] };

const encoders: RowEncoders = {
  consent: (record) => ({
    timestamp: record.timestamp,
    consent_given: record.consentGiven,
  }),
  demographics: (record) => ({
    timestamp: record.timestamp,
    name: record.name,
    age: record.age,
    occupation: record.occupation,
    familiarity: record.familiarity,
  }),
  tasks: (record) => ({
    timestamp: record.timestamp,
    task_name: record.taskName,
    success: record.outcome,
    duration_seconds: record.durationSeconds,
    notes: record.notes,
  }),
  exit: (record) => ({
    timestamp: record.timestamp,
    satisfaction: record.satisfaction,
    difficulty: record.difficulty,
    open_feedback: record.openFeedback,
  }),
};

function readText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

function readNumber(table: TableName, column: string, value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(readText(value).trim() || NaN);
  if (!Number.isFinite(parsed)) {
    throw new StorageError(`Column ${column} is not numeric: ${readText(value)}`, table, value);
  }
  return parsed;
}

function readNullableNumber(table: TableName, column: string, value: unknown): number | null {
  if (value === null || value === undefined || readText(value).trim() === '') return null;
  return readNumber(table, column, value);
}

function readBoolean(table: TableName, column: string, value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  const normalized = readText(value).trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new StorageError(`Column ${column} is not a boolean: ${readText(value)}`, table, value);
}

function readEnum<T extends string>(
  table: TableName,
  column: string,
  value: unknown,
  guard: (candidate: unknown) => candidate is T
): T {
  if (guard(value)) return value;
  throw new StorageError(`Column ${column} has unexpected value: ${readText(value)}`, table, value);
}

const decoders: RowDecoders = {
  consent: (row) => ({
    timestamp: readText(row.timestamp),
    consentGiven: readBoolean('consent', 'consent_given', row.consent_given),
  }),
  demographics: (row) => ({
    timestamp: readText(row.timestamp),
    name: readText(row.name),
    age: readNumber('demographics', 'age', row.age),
    occupation: readText(row.occupation),
    familiarity: readEnum('demographics', 'familiarity', row.familiarity, isFamiliarity),
  }),
  tasks: (row) => ({
    timestamp: readText(row.timestamp),
    taskName: readEnum('tasks', 'task_name', row.task_name, isTaskLabel),
    outcome: readEnum('tasks', 'success', row.success, isTaskOutcome),
    durationSeconds: readNullableNumber('tasks', 'duration_seconds', row.duration_seconds),
    notes: readText(row.notes),
  }),
  exit: (row) => ({
    timestamp: readText(row.timestamp),
    satisfaction: readNumber('exit', 'satisfaction', row.satisfaction),
    difficulty: readNumber('exit', 'difficulty', row.difficulty),
    openFeedback: readText(row.open_feedback),
  }),
};

export function encodeRow<K extends TableName>(table: K, record: UsabilityRecordMap[K]): StoredRow {
  const encode: (record: UsabilityRecordMap[K]) => StoredRow = encoders[table];
  return encode(record);
}

export function decodeRow<K extends TableName>(table: K, row: Record<string, unknown>): UsabilityRecordMap[K] {
  const decode: (row: Record<string, unknown>) => UsabilityRecordMap[K] = decoders[table];
  return decode(row);
}
