import React from 'react';
import { useNavigate } from 'react-router-dom';
import { useUsabilitySession } from '../context/UsabilitySessionContext';

const STEPS = [
  'Provide consent for data collection.',
  'Fill out a short demographic questionnaire.',
  'Perform a specific task (or tasks).',
  'Answer an exit questionnaire about your experience.',
  'View a summary report (for demonstration purposes).',
];

const Home: React.FC = () => {
  const navigate = useNavigate();
  const { sessionId, store } = useUsabilitySession();

  return (
    <div className="max-w-3xl mx-auto px-4 py-8">
      <div className="bg-white rounded-lg shadow-md p-8 space-y-6">
        <div>
          <h1 className="text-3xl font-bold text-gray-800 mb-2">Introduction</h1>
          <p className="text-gray-600">Welcome to the Usability Testing Tool for HCI.</p>
        </div>

        <div>
          <p className="text-gray-700 mb-2">In this app, you will:</p>
          <ol className="list-decimal list-inside space-y-1 text-gray-700">
            {STEPS.map((step) => (
              <li key={step}>{step}</li>
            ))}
          </ol>
        </div>

        <button
          onClick={() => navigate('/consent')}
          className="w-full bg-blue-500 hover:bg-blue-600 text-white px-6 py-3 rounded-lg font-semibold transition-colors duration-200"
        >
          Begin with Consent
        </button>

        <p className="text-xs text-gray-400">
          Session {sessionId} • storage: {store.backend === 'csv' ? 'CSV files' : 'local database'}
        </p>
      </div>
    </div>
  );
};

export default Home;
