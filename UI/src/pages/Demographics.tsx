import React, { useState } from 'react';
import StatusMessage from '../components/StatusMessage';
import { AGE_RANGE, FAMILIARITY_LEVELS } from '../config/usabilityConfig';
import { useUsabilitySession } from '../context/UsabilitySessionContext';
import { useSubmitAction } from '../hooks/useSubmitAction';
import { submitDemographics } from '../services/usabilitySubmission';
import { DemographicDraft } from '../types/usability';

const EMPTY_DRAFT: DemographicDraft = {
  name: '',
  age: '',
  occupation: '',
  familiarity: '',
};

const Demographics: React.FC = () => {
  const { store } = useUsabilitySession();
  const [draft, setDraft] = useState<DemographicDraft>(EMPTY_DRAFT);
  const { status, saving, run } = useSubmitAction('demographics');

  const update = (key: keyof DemographicDraft, value: string) => {
    setDraft({ ...draft, [key]: value });
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    const result = await run(() => submitDemographics(store, draft), 'Demographic data saved.');
    if (result?.ok) {
      setDraft(EMPTY_DRAFT);
    }
  };

  return (
    <div className="max-w-3xl mx-auto px-4 py-8">
      <form onSubmit={handleSubmit} className="bg-white rounded-lg shadow-md p-8 space-y-5">
        <h1 className="text-3xl font-bold text-gray-800">Demographic Questionnaire</h1>

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Name (optional)</label>
          <input
            value={draft.name}
            onChange={(e) => update('name', e.target.value)}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:border-blue-500"
          />
        </div>

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Age:</label>
          <input
            type="number"
            min={AGE_RANGE.min}
            max={AGE_RANGE.max}
            step={1}
            value={draft.age}
            onChange={(e) => update('age', e.target.value)}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:border-blue-500"
          />
        </div>

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Occupation</label>
          <input
            value={draft.occupation}
            onChange={(e) => update('occupation', e.target.value)}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:border-blue-500"
          />
        </div>

        <div>
          <label className="block text-sm font-medium text-gray-700 mb-1">Familiarity with similar tools?</label>
          <select
            value={draft.familiarity}
            onChange={(e) => update('familiarity', e.target.value)}
            className="w-full border border-gray-300 rounded-lg px-4 py-2 focus:outline-none focus:ring-2 focus:ring-blue-500"
          >
            <option value="">Select...</option>
            {FAMILIARITY_LEVELS.map((level) => (
              <option key={level} value={level}>{level}</option>
            ))}
          </select>
        </div>

        {status && <StatusMessage tone={status.tone}>{status.message}</StatusMessage>}

        <button
          type="submit"
          disabled={saving}
          className="bg-blue-500 hover:bg-blue-600 disabled:bg-gray-300 text-white px-6 py-2 rounded-lg transition-colors duration-200"
        >
          Submit Demographics
        </button>
      </form>
    </div>
  );
};

export default Demographics;
