import React from 'react';
import {
  ConsentRecord,
  DemographicRecord,
  ExitRecord,
  TaskRecord,
  UsabilityReport,
} from '../../types/usability';
import DataGrid, { DataGridColumn } from './DataGrid';
import OutcomeCountChart from './OutcomeCountChart';
import OutcomeShareChart from './OutcomeShareChart';

export const EMPTY_TABLE_MESSAGES = {
  consent: 'No consent data available yet.',
  demographics: 'No demographic data available yet.',
  tasks: 'No task data available yet.',
  exit: 'No exit questionnaire data available yet.',
} as const;

const CONSENT_COLUMNS: DataGridColumn<ConsentRecord>[] = [
  { key: 'timestamp', label: 'Timestamp', render: (row) => row.timestamp },
  { key: 'consent_given', label: 'Consent Given', render: (row) => (row.consentGiven ? 'Yes' : 'No') },
];

const DEMOGRAPHIC_COLUMNS: DataGridColumn<DemographicRecord>[] = [
  { key: 'timestamp', label: 'Timestamp', render: (row) => row.timestamp },
  { key: 'name', label: 'Name', render: (row) => row.name || '—' },
  { key: 'age', label: 'Age', render: (row) => row.age },
  { key: 'occupation', label: 'Occupation', render: (row) => row.occupation },
  { key: 'familiarity', label: 'Familiarity', render: (row) => row.familiarity },
];

const TASK_COLUMNS: DataGridColumn<TaskRecord>[] = [
  { key: 'timestamp', label: 'Timestamp', render: (row) => row.timestamp },
  { key: 'task_name', label: 'Task', render: (row) => row.taskName },
  { key: 'success', label: 'Success', render: (row) => row.outcome },
  {
    key: 'duration_seconds',
    label: 'Duration (s)',
    render: (row) => (row.durationSeconds === null ? '—' : row.durationSeconds.toFixed(2)),
  },
  { key: 'notes', label: 'Notes', render: (row) => row.notes },
];

const EXIT_COLUMNS: DataGridColumn<ExitRecord>[] = [
  { key: 'timestamp', label: 'Timestamp', render: (row) => row.timestamp },
  { key: 'satisfaction', label: 'Satisfaction', render: (row) => row.satisfaction },
  { key: 'difficulty', label: 'Difficulty', render: (row) => row.difficulty },
  { key: 'open_feedback', label: 'Feedback', render: (row) => row.openFeedback },
];

interface ReportViewProps {
  report: UsabilityReport;
}

const ReportView: React.FC<ReportViewProps> = ({ report }) => {
  const hasTasks = report.outcomeCounts.length > 0;

  return (
    <div className="space-y-6">
      <div className="grid grid-cols-1 md:grid-cols-4 gap-4">
        <div className="bg-white rounded-lg border border-gray-200 p-4">
          <div className="text-sm text-gray-500">Task attempts</div>
          <div className="text-2xl font-semibold text-gray-800">
            {report.outcomeCounts.reduce((acc, entry) => acc + entry.count, 0)}
          </div>
        </div>
        <div className="bg-white rounded-lg border border-gray-200 p-4">
          <div className="text-sm text-gray-500">Exit responses</div>
          <div className="text-2xl font-semibold text-gray-800">{report.exitScores?.responses ?? 0}</div>
        </div>
        <div className="bg-white rounded-lg border border-gray-200 p-4">
          <div className="text-sm text-gray-500">Mean satisfaction</div>
          <div className="text-2xl font-semibold text-gray-800">
            {report.exitScores ? report.exitScores.meanSatisfaction.toFixed(2) : '—'}
          </div>
        </div>
        <div className="bg-white rounded-lg border border-gray-200 p-4">
          <div className="text-sm text-gray-500">Mean difficulty</div>
          <div className="text-2xl font-semibold text-gray-800">
            {report.exitScores ? report.exitScores.meanDifficulty.toFixed(2) : '—'}
          </div>
        </div>
      </div>

      <DataGrid title="Consent Data" rows={report.consent} columns={CONSENT_COLUMNS} emptyMessage={EMPTY_TABLE_MESSAGES.consent} />
      <DataGrid title="Demographic Data" rows={report.demographics} columns={DEMOGRAPHIC_COLUMNS} emptyMessage={EMPTY_TABLE_MESSAGES.demographics} />
      <DataGrid title="Task Performance Data" rows={report.tasks} columns={TASK_COLUMNS} emptyMessage={EMPTY_TABLE_MESSAGES.tasks} />
      <DataGrid title="Exit Questionnaire Data" rows={report.exit} columns={EXIT_COLUMNS} emptyMessage={EMPTY_TABLE_MESSAGES.exit} />

      {hasTasks && (
        <>
          <section className="bg-white rounded-lg border border-gray-200 p-6">
            <h2 className="text-lg font-semibold text-gray-800 mb-3">Task Success Summary</h2>
            <OutcomeCountChart data={report.outcomeCounts} />
          </section>

          <section className="bg-white rounded-lg border border-gray-200 p-6">
            <h2 className="text-lg font-semibold text-gray-800 mb-3">Success Rate by Task</h2>
            <OutcomeShareChart data={report.outcomeShares} />
          </section>

          {report.durations.length > 0 && (
            <section className="bg-white rounded-lg border border-gray-200 p-6">
              <h2 className="text-lg font-semibold text-gray-800 mb-3">Mean Task Duration</h2>
              <ul className="text-sm text-gray-700 space-y-1">
                {report.durations.map((entry) => (
                  <li key={entry.task}>
                    {entry.task}: {entry.meanSeconds.toFixed(2)}s ({entry.timedAttempts} timed)
                  </li>
                ))}
              </ul>
            </section>
          )}
        </>
      )}
    </div>
  );
};

export default ReportView;
