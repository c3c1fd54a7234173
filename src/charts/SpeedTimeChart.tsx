import React from 'react';
import { CartesianGrid, Legend, Line, LineChart, XAxis, YAxis } from 'recharts';
import { SpeedSeries } from '@/core/visualization';
import { CHART_SIZE, colorForCycle } from './palette';

interface SpeedTimeChartProps {
  series: SpeedSeries[];
}

const SpeedTimeChart: React.FC<SpeedTimeChartProps> = ({ series }) => (
  <LineChart
    width={CHART_SIZE.width}
    height={CHART_SIZE.height}
    margin={{ top: 10, right: 20, left: 10, bottom: 30 }}
  >
    <CartesianGrid strokeDasharray="3 3" />
    <XAxis
      dataKey="tSec"
      type="number"
      domain={['dataMin', 'dataMax']}
      label={{ value: 'Seconds since track start', position: 'insideBottom', offset: -10 }}
    />
    <YAxis
      dataKey="speedKmh"
      label={{ value: 'km/h', angle: -90, position: 'insideLeft', offset: 0 }}
    />
    <Legend verticalAlign="top" />
    {series.map(s => (
      <Line
        key={s.key}
        data={s.samples}
        dataKey="speedKmh"
        name={s.label}
        stroke={colorForCycle(s.cycleId)}
        strokeDasharray={s.cycleId === null ? '4 4' : undefined}
        dot={false}
        connectNulls={false}
        isAnimationActive={false}
      />
    ))}
  </LineChart>
);

export default SpeedTimeChart;
