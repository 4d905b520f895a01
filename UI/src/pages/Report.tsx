import React, { useCallback, useEffect, useState } from 'react';
import StatusMessage from '../components/StatusMessage';
import ReportView from '../components/report/ReportView';
import { REPORT_CONFIG } from '../config/usabilityConfig';
import { useUsabilitySession } from '../context/UsabilitySessionContext';
import { exportUsabilityTables } from '../services/usabilityExport';
import { loadUsabilityReport } from '../services/usabilityReport';
import { UsabilityReport } from '../types/usability';

const Report: React.FC = () => {
  const { store } = useUsabilitySession();
  const [report, setReport] = useState<UsabilityReport | null>(null);
  const [error, setError] = useState('');

  const refresh = useCallback(async () => {
    try {
      const next = await loadUsabilityReport(store, REPORT_CONFIG.gridRowLimit);
      setReport(next);
      setError('');
    } catch (err) {
      console.error('Failed to load usability report:', err);
      setError('Unable to load the report data.');
    }
  }, [store]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const handleExport = async () => {
    try {
      await exportUsabilityTables(store);
    } catch (err) {
      console.error('Failed to export usability tables:', err);
      setError('Unable to export the report data.');
    }
  };

  return (
    <div className="max-w-6xl mx-auto px-4 py-8 space-y-6">
      <div className="flex items-center justify-between">
        <div>
          <h1 className="text-3xl font-bold text-gray-800">Usability Report - Aggregated Results</h1>
          {REPORT_CONFIG.gridRowLimit !== undefined && (
            <p className="text-gray-600 mt-1">Tables show up to {REPORT_CONFIG.gridRowLimit} rows each.</p>
          )}
        </div>
        <div className="flex gap-3">
          <button
            onClick={refresh}
            className="px-4 py-2 rounded-lg bg-gray-200 hover:bg-gray-300 text-gray-800"
          >
            Refresh
          </button>
          <button
            onClick={handleExport}
            className="px-4 py-2 rounded-lg bg-emerald-600 hover:bg-emerald-700 text-white"
          >
            Export CSV
          </button>
        </div>
      </div>

      {error && <StatusMessage tone="error">{error}</StatusMessage>}

      {report ? <ReportView report={report} /> : !error && <p className="text-gray-500">Loading report…</p>}
    </div>
  );
};

export default Report;
