import React, { useEffect, useState } from 'react';
import StatusMessage from '../components/StatusMessage';
import { TASK_LABELS, TASK_OUTCOMES, isTaskLabel } from '../config/usabilityConfig';
import { useUsabilitySession } from '../context/UsabilitySessionContext';
import { useSubmitAction } from '../hooks/useSubmitAction';
import { roundSeconds } from '../services/taskTimer';
import { submitTask } from '../services/usabilitySubmission';
import { TaskOutcome } from '../types/usability';

const TaskSession: React.FC = () => {
  const { store, timer, dispatchTimer } = useUsabilitySession();
  const [outcome, setOutcome] = useState<TaskOutcome | null>(null);
  const [notes, setNotes] = useState('');
  const [nowMs, setNowMs] = useState(() => Date.now());
  const { status, saving, run, clear } = useSubmitAction('task results');

  // Tick once a second while the timer runs so the elapsed time stays current ***
  useEffect(() => {
    if (timer.status !== 'running') return;
    const interval = setInterval(() => setNowMs(Date.now()), 1000);
    return () => clearInterval(interval);
  }, [timer.status]);

  const selectTask = (value: string) => {
    dispatchTimer({ type: 'select', task: isTaskLabel(value) ? value : null });
    setOutcome(null);
    setNotes('');
    clear();
  };

  const startTimer = () => {
    const now = Date.now();
    setNowMs(now);
    dispatchTimer({ type: 'start', nowMs: now });
  };

  const stopTimer = () => {
    dispatchTimer({ type: 'stop', nowMs: Date.now() });
  };

  const handleSave = async () => {
    const result = await run(
      () => submitTask(store, { taskName: timer.task ?? '', outcome, notes }, timer),
      'Task data saved.'
    );
    if (result?.ok) {
      dispatchTimer({ type: 'reset' });
      setOutcome(null);
      setNotes('');
    }
  };

  return (
    <div className="max-w-3xl mx-auto px-4 py-8">
      <div className="bg-white rounded-lg shadow-md p-8 space-y-5">
        <div>
          <h1 className="text-3xl font-bold text-gray-800 mb-2">Task Page</h1>
          <p className="text-gray-600">Please select a task and record your experience completing it.</p>
        </div>

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Select Task</label>
          <select
            value={timer.task ?? ''}
            onChange={(e) => selectTask(e.target.value)}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:ring-2 focus:ring-blue-500"
          >
            <option value="">Select...</option>
            {TASK_LABELS.map((label) => (
              <option key={label} value={label}>{label}</option>
            ))}
          </select>
        </div>

        {timer.task && (
          <>
            <div className="flex flex-wrap items-center gap-3">
              <button
                onClick={startTimer}
                className="bg-blue-500 hover:bg-blue-600 text-white px-4 py-2 rounded-lg"
              >
                Start Task Timer
              </button>
              <button
                onClick={stopTimer}
                disabled={timer.status !== 'running'}
                className="bg-gray-700 hover:bg-gray-800 disabled:bg-gray-300 text-white px-4 py-2 rounded-lg"
              >
                Stop Task Timer
              </button>
            </div>

            {timer.status === 'running' && (
              <StatusMessage tone="info">
                Task timer started ({roundSeconds(nowMs - timer.startedAtMs).toFixed(0)}s elapsed). Complete your task and then click
                {' '}&lsquo;Stop Task Timer.&rsquo;
              </StatusMessage>
            )}
            {timer.status === 'stopped' && (
              <StatusMessage tone="success">
                Task completed in {timer.durationSeconds.toFixed(2)} seconds!
              </StatusMessage>
            )}

            <fieldset>
              <legend className="block text-sm font-medium text-gray-700 mb-2">
                Was the task completed successfully?
              </legend>
              <div className="flex gap-6">
                {TASK_OUTCOMES.map((option) => (
                  <label key={option} className="inline-flex items-center gap-2">
                    <input
                      type="radio"
                      name="task-outcome"
                      value={option}
                      checked={outcome === option}
                      onChange={() => setOutcome(option)}
                    />
                    <span className="text-gray-700">{option}</span>
                  </label>
                ))}
              </div>
            </fieldset>

            <div>
              <label className="block text-sm font-medium text-gray-700 mb-1">Observer Notes</label>
              <textarea
                value={notes}
                onChange={(e) => setNotes(e.target.value)}
                rows={4}
                className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:border-blue-500"
              />
            </div>

            {status && <StatusMessage tone={status.tone}>{status.message}</StatusMessage>}

            <button
              onClick={handleSave}
              disabled={saving}
              className="bg-emerald-600 hover:bg-emerald-700 disabled:bg-gray-300 text-white px-6 py-2 rounded-lg"
            >
              Save Task Results
            </button>
          </>
        )}
      </div>
    </div>
  );
};

export default TaskSession;
