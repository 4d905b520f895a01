import React, { useState } from 'react';
import StatusMessage from '../components/StatusMessage';
import { useUsabilitySession } from '../context/UsabilitySessionContext';
import { useSubmitAction } from '../hooks/useSubmitAction';
import { submitConsent } from '../services/usabilitySubmission';

const TERMS = [
  'I understand the purpose of this usability study.',
  'I am aware that my data will be collected solely for research and improvement purposes.',
  'I can withdraw at any time.',
];

const Consent: React.FC = () => {
  const { store } = useUsabilitySession();
  const [agreed, setAgreed] = useState(false);
  const { status, saving, run } = useSubmitAction('consent');

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    await run(() => submitConsent(store, { agreed }), 'Your consent has been recorded. Thank you!');
  };

  return (
    <div className="max-w-3xl mx-auto px-4 py-8">
      <form onSubmit={handleSubmit} className="bg-white rounded-lg shadow-md p-8 space-y-6">
        <div>
          <h1 className="text-3xl font-bold text-gray-800 mb-2">Consent Form</h1>
          <p className="text-gray-600">Please read the consent form below and confirm your agreement:</p>
        </div>

        <div>
          <h2 className="text-xl font-semibold text-gray-800 mb-2">Consent Agreement:</h2>
          <ul className="list-disc list-inside space-y-1 text-gray-700">
            {TERMS.map((term) => (
              <li key={term}>{term}</li>
            ))}
          </ul>
        </div>

        <label className="inline-flex items-center gap-2 text-gray-800">
          <input type="checkbox" checked={agreed} onChange={(e) => setAgreed(e.target.checked)} />
          <span>I agree to the terms above</span>
        </label>

        {status && <StatusMessage tone={status.tone}>{status.message}</StatusMessage>}

        <button
          type="submit"
          disabled={saving}
          className="bg-blue-500 hover:bg-blue-600 disabled:bg-gray-300 text-white px-6 py-2 rounded-lg transition-colors duration-200"
        >
          Submit Consent
        </button>
      </form>
    </div>
  );
};

export default Consent;
