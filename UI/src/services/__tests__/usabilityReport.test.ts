import { CsvUsabilityStore } from '../csvUsabilityStore';
import {
  countOutcomes,
  loadUsabilityReport,
  meanDurationByTask,
  outcomeSharesByTask,
  summarizeExitScores,
} from '../usabilityReport';
import { TaskLabel, TaskOutcome, TaskRecord } from '../../types/usability';
import { TEST_FILE_NAMES, memoryFileSystem } from './memoryFileSystem';

function attempt(taskName: TaskLabel, outcome: TaskOutcome, durationSeconds: number | null = null): TaskRecord {
  return { timestamp: '2026-02-10 10:00:00', taskName, outcome, durationSeconds, notes: '' };
}

const PROCESS: TaskLabel = 'Task 2: Process Data';
const REPORT: TaskLabel = 'Task 10: Generate Report';

describe('countOutcomes', () => {
  it('counts each outcome present, most frequent first', () => {
    const tasks = [
      attempt(PROCESS, 'Partial'),
      attempt(PROCESS, 'Yes'),
      attempt(REPORT, 'Yes'),
      attempt(REPORT, 'Partial'),
      attempt(REPORT, 'Partial'),
    ];

    expect(countOutcomes(tasks)).toEqual([
      { outcome: 'Partial', count: 3 },
      { outcome: 'Yes', count: 2 },
    ]);
  });

  it('breaks ties in No, Yes, Partial order', () => {
    const tasks = [attempt(PROCESS, 'Partial'), attempt(PROCESS, 'Yes'), attempt(PROCESS, 'No')];
    expect(countOutcomes(tasks).map((entry) => entry.outcome)).toEqual(['No', 'Yes', 'Partial']);
  });

  it('returns nothing for no records', () => {
    expect(countOutcomes([])).toEqual([]);
  });
});

describe('outcomeSharesByTask', () => {
  it('normalises outcome counts to percentages per task', () => {
    const tasks = [
      attempt(PROCESS, 'Yes'),
      attempt(PROCESS, 'Yes'),
      attempt(PROCESS, 'Yes'),
      attempt(PROCESS, 'No'),
      attempt(PROCESS, 'Partial'),
    ];

    expect(outcomeSharesByTask(tasks)).toEqual([
      { task: PROCESS, total: 5, No: 20, Yes: 60, Partial: 20 },
    ]);
  });

  it('treats missing outcomes as zero and follows the task order', () => {
    const tasks = [attempt(REPORT, 'No'), attempt(PROCESS, 'Yes'), attempt(REPORT, 'Yes')];

    expect(outcomeSharesByTask(tasks)).toEqual([
      { task: PROCESS, total: 1, No: 0, Yes: 100, Partial: 0 },
      { task: REPORT, total: 2, No: 50, Yes: 50, Partial: 0 },
    ]);
  });
});

describe('meanDurationByTask', () => {
  it('averages timed attempts only', () => {
    const tasks = [attempt(PROCESS, 'Yes', 2), attempt(PROCESS, 'No', 4), attempt(PROCESS, 'No'), attempt(REPORT, 'Yes')];

    expect(meanDurationByTask(tasks)).toEqual([{ task: PROCESS, meanSeconds: 3, timedAttempts: 2 }]);
  });
});

describe('summarizeExitScores', () => {
  it('averages both ratings', () => {
    expect(
      summarizeExitScores([
        { timestamp: 'a', satisfaction: 4, difficulty: 1, openFeedback: '' },
        { timestamp: 'b', satisfaction: 5, difficulty: 2, openFeedback: '' },
      ])
    ).toEqual({ responses: 2, meanSatisfaction: 4.5, meanDifficulty: 1.5 });
  });

  it('returns null without responses', () => {
    expect(summarizeExitScores([])).toBeNull();
  });
});

describe('loadUsabilityReport', () => {
  it('returns empty tables and aggregates for an empty store', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    const report = await loadUsabilityReport(store);

    expect(report.consent).toEqual([]);
    expect(report.demographics).toEqual([]);
    expect(report.tasks).toEqual([]);
    expect(report.exit).toEqual([]);
    expect(report.outcomeCounts).toEqual([]);
    expect(report.exitScores).toBeNull();
  });

  it('caps grid rows but aggregates every record', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    await store.append('tasks', attempt(PROCESS, 'Yes'));
    await store.append('tasks', attempt(PROCESS, 'No'));
    await store.append('tasks', attempt(PROCESS, 'No'));

    const report = await loadUsabilityReport(store, 1);

    expect(report.tasks).toEqual([attempt(PROCESS, 'Yes')]);
    expect(report.outcomeCounts).toEqual([
      { outcome: 'No', count: 2 },
      { outcome: 'Yes', count: 1 },
    ]);
  });
});
