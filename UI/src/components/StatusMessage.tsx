import React from 'react';

export type StatusTone = 'success' | 'warning' | 'info' | 'error';

const TONE_CLASSES: Record<StatusTone, string> = {
  success: 'bg-green-50 border-green-200 text-green-700',
  warning: 'bg-amber-50 border-amber-200 text-amber-900',
  info: 'bg-blue-50 border-blue-100 text-blue-900',
  error: 'bg-red-50 border-red-200 text-red-700',
};

interface StatusMessageProps {
  tone: StatusTone;
  children: React.ReactNode;
}

const StatusMessage: React.FC<StatusMessageProps> = ({ tone, children }) => (
  <div role={tone === 'error' || tone === 'warning' ? 'alert' : 'status'} className={`rounded-lg border px-4 py-3 text-sm ${TONE_CLASSES[tone]}`}>
    {children}
  </div>
);

export default StatusMessage;
