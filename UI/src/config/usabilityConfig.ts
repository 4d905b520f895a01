/**
 * Usability study configuration.
 *
 * Environment values are substituted by the bundler at build time.
 */

import { Familiarity, StorageBackend, TableName, TaskLabel, TaskOutcome } from '../types/usability';

function parseBackend(raw: string | undefined): StorageBackend {
  return raw?.trim().toLowerCase() === 'csv' ? 'csv' : 'database';
}

function parseRowLimit(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

const CSV_FILE_NAMES: Record<TableName, string> = {
  consent: 'consent_data.csv',
  demographics: 'demographic_data.csv',
  tasks: 'task_data.csv',
  exit: 'exit_data.csv',
};

export const STORAGE_CONFIG = {
  /** Which store backs the forms: IndexedDB tables or CSV files */
  backend: parseBackend(process.env.REACT_APP_STORAGE_BACKEND),
  /** IndexedDB database name */
  databaseName: process.env.REACT_APP_DATABASE_NAME || 'usability_data',
  /** localStorage key prefix for the CSV files */
  csvKeyPrefix: 'usability_files/',
  csvFileNames: CSV_FILE_NAMES,
};

export const REPORT_CONFIG = {
  /** Caps rows shown in the report grids; aggregates always use every row */
  gridRowLimit: parseRowLimit(process.env.REACT_APP_REPORT_ROW_LIMIT),
};

export const TASK_LABELS: readonly TaskLabel[] = [
  'Task 1: Wait for User Input',
  'Task 2: Process Data',
  'Task 3: Save to Database',
  'Task 4: Fetch Data from API',
  'Task 5: Execute a Scheduled Task',
  'Task 6: Log System Events',
  'Task 7: Retry on Failure',
  'Task 8: Trigger Alert on Timeout',
  'Task 9: Cache Expiry',
  'Task 10: Generate Report',
];

export const TASK_OUTCOMES: readonly TaskOutcome[] = ['No', 'Yes', 'Partial'];

export const FAMILIARITY_LEVELS: readonly Familiarity[] = [
  'Not Familiar',
  'Somewhat Familiar',
  'Very Familiar',
];

export const AGE_RANGE = { min: 0, max: 100 } as const;
export const RATING_RANGE = { min: 1, max: 5 } as const;

export function isTaskLabel(value: unknown): value is TaskLabel {
  return TASK_LABELS.some((label) => label === value);
}

export function isTaskOutcome(value: unknown): value is TaskOutcome {
  return TASK_OUTCOMES.some((outcome) => outcome === value);
}

export function isFamiliarity(value: unknown): value is Familiarity {
  return FAMILIARITY_LEVELS.some((level) => level === value);
}
