import {
  AGE_RANGE,
  RATING_RANGE,
  isFamiliarity,
  isTaskLabel,
  isTaskOutcome,
} from '../config/usabilityConfig';
import {
  ConsentDraft,
  ConsentRecord,
  DemographicDraft,
  DemographicRecord,
  ExitDraft,
  ExitRecord,
  TaskDraft,
  TaskRecord,
  ValidationResult,
} from '../types/usability';

export const VALIDATION_MESSAGES = {
  consentRequired: 'You must agree to the consent terms before proceeding.',
  demographicsIncomplete: 'Please fill out the form',
  ageOutOfRange: `Age must be a whole number between ${AGE_RANGE.min} and ${AGE_RANGE.max}.`,
  taskRequired: 'Please select a task.',
  outcomeRequired: 'Please select a success status before saving.',
  ratingOutOfRange: `Ratings must be whole numbers between ${RATING_RANGE.min} and ${RATING_RANGE.max}.`,
} as const;

function invalid<T>(message: string): ValidationResult<T> {
  return { ok: false, message };
}

function isWholeNumberInRange(value: number, range: { min: number; max: number }): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

export function parseAge(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return isWholeNumberInRange(value, AGE_RANGE) ? value : null;
}

export function validateConsent(draft: ConsentDraft, timestamp: string): ValidationResult<ConsentRecord> {
  if (!draft.agreed) {
    return invalid(VALIDATION_MESSAGES.consentRequired);
  }
  return { ok: true, record: { timestamp, consentGiven: true } };
}

export function validateDemographics(
  draft: DemographicDraft,
  timestamp: string
): ValidationResult<DemographicRecord> {
  const occupation = draft.occupation.trim();
  const familiarity = draft.familiarity;

  if (draft.age.trim() === '' || occupation === '' || !isFamiliarity(familiarity)) {
    return invalid(VALIDATION_MESSAGES.demographicsIncomplete);
  }

  const age = parseAge(draft.age);
  if (age === null) {
    return invalid(VALIDATION_MESSAGES.ageOutOfRange);
  }

  return {
    ok: true,
    record: {
      timestamp,
      name: draft.name.trim(),
      age,
      occupation,
      familiarity,
    },
  };
}

export function validateTask(
  draft: TaskDraft,
  durationSeconds: number | null,
  timestamp: string
): ValidationResult<TaskRecord> {
  const taskName = draft.taskName;
  if (!isTaskLabel(taskName)) {
    return invalid(VALIDATION_MESSAGES.taskRequired);
  }

  const outcome = draft.outcome;
  if (!isTaskOutcome(outcome)) {
    return invalid(VALIDATION_MESSAGES.outcomeRequired);
  }

  return {
    ok: true,
    record: {
      timestamp,
      taskName,
      outcome,
      durationSeconds,
      notes: draft.notes.trim(),
    },
  };
}

export function validateExit(draft: ExitDraft, timestamp: string): ValidationResult<ExitRecord> {
  if (
    !isWholeNumberInRange(draft.satisfaction, RATING_RANGE) ||
    !isWholeNumberInRange(draft.difficulty, RATING_RANGE)
  ) {
    return invalid(VALIDATION_MESSAGES.ratingOutOfRange);
  }

  return {
    ok: true,
    record: {
      timestamp,
      satisfaction: draft.satisfaction,
      difficulty: draft.difficulty,
      openFeedback: draft.openFeedback.trim(),
    },
  };
}
