import React from 'react';
import { Bar, BarChart, CartesianGrid, LabelList, XAxis, YAxis } from 'recharts';
import { GanttRow } from '@/core/visualization';
import { CHART_SIZE } from './palette';

interface CycleGanttChartProps {
  rows: GanttRow[];
}

/**
 * One horizontal bar per cycle: an invisible offset bar stacked under the visible duration bar.
 */
const CycleGanttChart: React.FC<CycleGanttChartProps> = ({ rows }) => {
  const data = rows.map(row => ({
    ...row,
    durationLabel: `${row.durationMinutes.toFixed(1)} min`
  }));

  return (
    <BarChart
      width={CHART_SIZE.width}
      height={Math.max(200, 80 + rows.length * 40)}
      data={data}
      layout="vertical"
      margin={{ top: 20, right: 80, left: 20, bottom: 30 }}
    >
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis
        type="number"
        label={{ value: 'Seconds since track start', position: 'insideBottom', offset: -10 }}
      />
      <YAxis type="category" dataKey="label" width={80} />
      <Bar dataKey="offsetSec" stackId="timeline" fill="transparent" isAnimationActive={false} />
      <Bar dataKey="durationSec" stackId="timeline" fill="#87ceeb" stroke="#000000" isAnimationActive={false}>
        <LabelList dataKey="durationLabel" position="right" />
      </Bar>
    </BarChart>
  );
};

export default CycleGanttChart;
