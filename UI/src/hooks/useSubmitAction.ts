import { useCallback, useState } from 'react';
import { ValidationResult } from '../types/usability';
import { StatusTone } from '../components/StatusMessage';

export const GENERIC_FAULT_MESSAGE = 'Something went wrong while saving. Please try again.';

export interface SubmitStatus {
  tone: StatusTone;
  message: string;
}

export interface SubmitOutcome<T> {
  /** `null` when the save itself failed */
  result: ValidationResult<T> | null;
  status: SubmitStatus;
}

/**
 * Runs one save and turns its outcome into an inline status:
 * validation problems as warnings, storage faults as a generic error.
 */
export async function runSubmission<T>(
  label: string,
  submit: () => Promise<ValidationResult<T>>,
  successMessage: string
): Promise<SubmitOutcome<T>> {
  try {
    const result = await submit();
    return {
      result,
      status: result.ok ? { tone: 'success', message: successMessage } : { tone: 'warning', message: result.message },
    };
  } catch (error) {
    console.error(`Failed to save ${label}:`, error);
    return { result: null, status: { tone: 'error', message: GENERIC_FAULT_MESSAGE } };
  }
}

export function useSubmitAction(label: string) {
  const [status, setStatus] = useState<SubmitStatus | null>(null);
  const [saving, setSaving] = useState(false);

  const run = useCallback(
    async <T,>(
      submit: () => Promise<ValidationResult<T>>,
      successMessage: string
    ): Promise<ValidationResult<T> | null> => {
      setSaving(true);
      try {
        const outcome = await runSubmission(label, submit, successMessage);
        setStatus(outcome.status);
        return outcome.result;
      } finally {
        setSaving(false);
      }
    },
    [label]
  );

  const clear = useCallback(() => setStatus(null), []);

  return { status, saving, run, clear };
}
