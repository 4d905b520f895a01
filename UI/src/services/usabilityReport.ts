import { TASK_LABELS, TASK_OUTCOMES } from '../config/usabilityConfig';
import {
  ExitRecord,
  ExitScoreSummary,
  OutcomeCount,
  OutcomeShare,
  TaskDurationSummary,
  TaskLabel,
  TaskOutcome,
  TaskRecord,
  UsabilityReport,
} from '../types/usability';
import { UsabilityStore } from './usabilityStore';

function emptyOutcomeTally(): Record<TaskOutcome, number> {
  return { No: 0, Yes: 0, Partial: 0 };
}

/** Frequency of each outcome present, most frequent first */
export function countOutcomes(tasks: TaskRecord[]): OutcomeCount[] {
  const tally = emptyOutcomeTally();
  tasks.forEach((task) => {
    tally[task.outcome] += 1;
  });

  return TASK_OUTCOMES
    .map((outcome) => ({ outcome, count: tally[outcome] }))
    .filter((entry) => entry.count > 0)
    .sort((a, b) => b.count - a.count);
}

/**
 * Percentage of each outcome within every task label that has records.
 * Labels follow the fixed task order; missing outcomes count as 0%.
 */
export function outcomeSharesByTask(tasks: TaskRecord[]): OutcomeShare[] {
  const tallies = new Map<TaskLabel, Record<TaskOutcome, number>>();

  tasks.forEach((task) => {
    const tally = tallies.get(task.taskName) ?? emptyOutcomeTally();
    tally[task.outcome] += 1;
    tallies.set(task.taskName, tally);
  });

  return TASK_LABELS.flatMap((label) => {
    const tally = tallies.get(label);
    if (!tally) return [];

    const total = tally.No + tally.Yes + tally.Partial;
    return [{
      task: label,
      total,
      No: (tally.No * 100) / total,
      Yes: (tally.Yes * 100) / total,
      Partial: (tally.Partial * 100) / total,
    }];
  });
}

export function meanDurationByTask(tasks: TaskRecord[]): TaskDurationSummary[] {
  const durations = new Map<TaskLabel, number[]>();

  tasks.forEach((task) => {
    if (task.durationSeconds === null) return;
    const list = durations.get(task.taskName) ?? [];
    list.push(task.durationSeconds);
    durations.set(task.taskName, list);
  });

  return TASK_LABELS.flatMap((label) => {
    const list = durations.get(label);
    if (!list || list.length === 0) return [];
    const sum = list.reduce((acc, value) => acc + value, 0);
    return [{ task: label, meanSeconds: sum / list.length, timedAttempts: list.length }];
  });
}

export function summarizeExitScores(exit: ExitRecord[]): ExitScoreSummary | null {
  if (exit.length === 0) return null;

  const satisfaction = exit.reduce((acc, record) => acc + record.satisfaction, 0);
  const difficulty = exit.reduce((acc, record) => acc + record.difficulty, 0);

  return {
    responses: exit.length,
    meanSatisfaction: satisfaction / exit.length,
    meanDifficulty: difficulty / exit.length,
  };
}

export function buildUsabilityReport(
  data: Pick<UsabilityReport, 'consent' | 'demographics' | 'tasks' | 'exit'>,
  gridRowLimit?: number
): UsabilityReport {
  function cap<T>(rows: T[]): T[] {
    return gridRowLimit === undefined ? rows : rows.slice(0, gridRowLimit);
  }

  return {
    consent: cap(data.consent),
    demographics: cap(data.demographics),
    tasks: cap(data.tasks),
    exit: cap(data.exit),
    outcomeCounts: countOutcomes(data.tasks),
    outcomeShares: outcomeSharesByTask(data.tasks),
    durations: meanDurationByTask(data.tasks),
    exitScores: summarizeExitScores(data.exit),
  };
}

/**
 * Reads every table in full and recomputes all aggregates.
 * `gridRowLimit` only trims the raw rows returned for display.
 */
export async function loadUsabilityReport(
  store: UsabilityStore,
  gridRowLimit?: number
): Promise<UsabilityReport> {
  const [consent, demographics, tasks, exit] = await Promise.all([
    store.readAll('consent'),
    store.readAll('demographics'),
    store.readAll('tasks'),
    store.readAll('exit'),
  ]);

  return buildUsabilityReport({ consent, demographics, tasks, exit }, gridRowLimit);
}
