import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { TASK_OUTCOMES } from '../../config/usabilityConfig';
import { OutcomeShare, TaskOutcome } from '../../types/usability';

const OUTCOME_COLORS: Record<TaskOutcome, string> = {
  No: '#ef4444',
  Yes: '#22c55e',
  Partial: '#f59e0b',
};

interface OutcomeShareChartProps {
  data: OutcomeShare[];
}

// Stacked to 100% per task label
const OutcomeShareChart: React.FC<OutcomeShareChartProps> = ({ data }) => {
  const chartData = data.map((share) => ({
    ...share,
    label: share.task.split(':')[0],
  }));

  return (
    <ResponsiveContainer width="100%" height={320}>
      <BarChart data={chartData}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis dataKey="label" />
        <YAxis
          domain={[0, 100]}
          label={{ value: 'Share of attempts (%)', angle: -90, position: 'insideLeft' }}
        />
        <Tooltip formatter={(value) => (typeof value === 'number' ? `${value.toFixed(1)}%` : String(value))} />
        <Legend />
        {TASK_OUTCOMES.map((outcome) => (
          <Bar key={outcome} dataKey={outcome} stackId="outcome" fill={OUTCOME_COLORS[outcome]} />
        ))}
      </BarChart>
    </ResponsiveContainer>
  );
};

export default OutcomeShareChart;
