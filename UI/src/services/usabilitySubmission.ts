import {
  ConsentDraft,
  ConsentRecord,
  DemographicDraft,
  DemographicRecord,
  ExitDraft,
  ExitRecord,
  TableName,
  TaskDraft,
  TaskRecord,
  UsabilityRecordMap,
  ValidationResult,
} from '../types/usability';
import { TaskTimerState, recordedDuration } from './taskTimer';
import { formatTimestamp } from './timestamp';
import { UsabilityStore } from './usabilityStore';
import {
  validateConsent,
  validateDemographics,
  validateExit,
  validateTask,
} from './usabilityValidation';
import { isTaskLabel } from '../config/usabilityConfig';

// Invalid drafts never reach the store; storage failures reject unchanged
async function saveIfValid<K extends TableName>(
  store: UsabilityStore,
  table: K,
  result: ValidationResult<UsabilityRecordMap[K]>
): Promise<ValidationResult<UsabilityRecordMap[K]>> {
  if (result.ok) {
    await store.append(table, result.record);
  }
  return result;
}

export function submitConsent(
  store: UsabilityStore,
  draft: ConsentDraft,
  now: Date = new Date()
): Promise<ValidationResult<ConsentRecord>> {
  return saveIfValid(store, 'consent', validateConsent(draft, formatTimestamp(now)));
}

export function submitDemographics(
  store: UsabilityStore,
  draft: DemographicDraft,
  now: Date = new Date()
): Promise<ValidationResult<DemographicRecord>> {
  return saveIfValid(store, 'demographics', validateDemographics(draft, formatTimestamp(now)));
}

/** The timer only contributes a duration when it was stopped on the same task */
export function submitTask(
  store: UsabilityStore,
  draft: TaskDraft,
  timer: TaskTimerState,
  now: Date = new Date()
): Promise<ValidationResult<TaskRecord>> {
  const duration = isTaskLabel(draft.taskName) ? recordedDuration(timer, draft.taskName) : null;
  return saveIfValid(store, 'tasks', validateTask(draft, duration, formatTimestamp(now)));
}

export function submitExit(
  store: UsabilityStore,
  draft: ExitDraft,
  now: Date = new Date()
): Promise<ValidationResult<ExitRecord>> {
  return saveIfValid(store, 'exit', validateExit(draft, formatTimestamp(now)));
}
