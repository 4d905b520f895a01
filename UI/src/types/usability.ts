export type TableName = 'consent' | 'demographics' | 'tasks' | 'exit';

export type StorageBackend = 'database' | 'csv';

export type Familiarity = 'Not Familiar' | 'Somewhat Familiar' | 'Very Familiar';

export type TaskOutcome = 'No' | 'Yes' | 'Partial';

export type TaskLabel =
  | 'Task 1: Wait for User Input'
  | 'Task 2: Process Data'
  | 'Task 3: Save to Database'
  | 'Task 4: Fetch Data from API'
  | 'Task 5: Execute a Scheduled Task'
  | 'Task 6: Log System Events'
  | 'Task 7: Retry on Failure'
  | 'Task 8: Trigger Alert on Timeout'
  | 'Task 9: Cache Expiry'
  | 'Task 10: Generate Report';

export interface ConsentRecord {
  timestamp: string;
  consentGiven: boolean;
}

export interface DemographicRecord {
  timestamp: string;
  name: string;
  age: number;
  occupation: string;
  familiarity: Familiarity;
}

export interface TaskRecord {
  timestamp: string;
  taskName: TaskLabel;
  outcome: TaskOutcome;
  /** Seconds between timer start and stop; null when the timer was never stopped */
  durationSeconds: number | null;
  notes: string;
}

export interface ExitRecord {
  timestamp: string;
  satisfaction: number;
  difficulty: number;
  openFeedback: string;
}

export interface UsabilityRecordMap {
  consent: ConsentRecord;
  demographics: DemographicRecord;
  tasks: TaskRecord;
  exit: ExitRecord;
}

export type UsabilityRecord = UsabilityRecordMap[TableName];

// Raw form state as held by the pages, before validation ***
export interface ConsentDraft {
  agreed: boolean;
}

export interface DemographicDraft {
  name: string;
  age: string;
  occupation: string;
  familiarity: string;
}

export interface TaskDraft {
  taskName: string;
  outcome: TaskOutcome | null;
  notes: string;
}

export interface ExitDraft {
  satisfaction: number;
  difficulty: number;
  openFeedback: string;
}

export type ValidationResult<T> =
  | { ok: true; record: T }
  | { ok: false; message: string };

export interface OutcomeCount {
  outcome: TaskOutcome;
  count: number;
}

export interface OutcomeShare {
  task: TaskLabel;
  total: number;
  No: number;
  Yes: number;
  Partial: number;
}

export interface TaskDurationSummary {
  task: TaskLabel;
  meanSeconds: number;
  timedAttempts: number;
}

export interface ExitScoreSummary {
  responses: number;
  meanSatisfaction: number;
  meanDifficulty: number;
}

export interface UsabilityReport {
  consent: ConsentRecord[];
  demographics: DemographicRecord[];
  tasks: TaskRecord[];
  exit: ExitRecord[];
  outcomeCounts: OutcomeCount[];
  outcomeShares: OutcomeShare[];
  durations: TaskDurationSummary[];
  exitScores: ExitScoreSummary | null;
}
