import React, { useState } from 'react';
import StatusMessage from '../components/StatusMessage';
import { RATING_RANGE } from '../config/usabilityConfig';
import { useUsabilitySession } from '../context/UsabilitySessionContext';
import { useSubmitAction } from '../hooks/useSubmitAction';
import { submitExit } from '../services/usabilitySubmission';
import { ExitDraft } from '../types/usability';

const DEFAULT_DRAFT: ExitDraft = {
  satisfaction: RATING_RANGE.min,
  difficulty: RATING_RANGE.min,
  openFeedback: '',
};

const SCALES = [
  { key: 'satisfaction', label: 'Overall Satisfaction', low: 'Very Low', high: 'Very High' },
  { key: 'difficulty', label: 'Overall Difficulty', low: 'Very Easy', high: 'Very Hard' },
] as const;

const ExitQuestionnaire: React.FC = () => {
  const { store } = useUsabilitySession();
  const [draft, setDraft] = useState<ExitDraft>(DEFAULT_DRAFT);
  const { status, saving, run } = useSubmitAction('exit questionnaire');

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    const result = await run(() => submitExit(store, draft), 'Exit questionnaire data saved.');
    if (result?.ok) {
      setDraft(DEFAULT_DRAFT);
    }
  };

  return (
    <div className="max-w-3xl mx-auto px-4 py-8">
      <form onSubmit={handleSubmit} className="bg-white rounded-lg shadow-md p-8 space-y-6">
        <h1 className="text-3xl font-bold text-gray-800">Exit Questionnaire</h1>

        {SCALES.map(({ key, label, low, high }) => (
          <div key={key} className="space-y-2">
            <div className="flex justify-between items-center">
              <label className="font-medium text-gray-700">
                {label} ({RATING_RANGE.min}={low}, {RATING_RANGE.max}={high})
              </label>
              <span className="text-sm font-semibold text-blue-600">{draft[key]}</span>
            </div>
            <input
              type="range"
              min={RATING_RANGE.min}
              max={RATING_RANGE.max}
              step={1}
              value={draft[key]}
              onChange={(e) => setDraft({ ...draft, [key]: parseInt(e.target.value, 10) })}
              className="w-full h-2 bg-gray-200 rounded-lg appearance-none cursor-pointer accent-blue-500"
            />
          </div>
        ))}

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Additional feedback or comments:</label>
          <textarea
            value={draft.openFeedback}
            onChange={(e) => setDraft({ ...draft, openFeedback: e.target.value })}
            rows={4}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:border-blue-500"
          />
        </div>

        {status && <StatusMessage tone={status.tone}>{status.message}</StatusMessage>}

        <button
          type="submit"
          disabled={saving}
          className="w-full bg-blue-500 hover:bg-blue-600 disabled:bg-gray-300 text-white px-6 py-3 rounded-lg font-semibold transition-colors duration-200"
        >
          Submit Exit Questionnaire
        </button>
      </form>
    </div>
  );
};

export default ExitQuestionnaire;
