import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import { OutcomeCount } from '../../types/usability';

interface OutcomeCountChartProps {
  data: OutcomeCount[];
}

const OutcomeCountChart: React.FC<OutcomeCountChartProps> = ({ data }) => {
  return (
    <ResponsiveContainer width="100%" height={300}>
      <BarChart data={data}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis
          dataKey="outcome"
          label={{ value: 'Success Status', position: 'insideBottom', offset: -5 }}
        />
        <YAxis
          allowDecimals={false}
          label={{ value: 'Task Count', angle: -90, position: 'insideLeft' }}
        />
        <Tooltip />
        <Bar dataKey="count" fill="#3b82f6" />
      </BarChart>
    </ResponsiveContainer>
  );
};

export default OutcomeCountChart;
