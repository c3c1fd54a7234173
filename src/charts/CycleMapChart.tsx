import React from 'react';
import { CartesianGrid, Legend, Scatter, ScatterChart, XAxis, YAxis } from 'recharts';
import { MapSeries, ZoneMarker } from '@/core/visualization';
import { CHART_SIZE, colorForCycle } from './palette';

interface CycleMapChartProps {
  series: MapSeries[];
  zones: ZoneMarker[];
}

const ZONE_COLORS: Record<ZoneMarker['zone'], string> = {
  load: '#16a34a',
  dump: '#dc2626'
};

/**
 * Plain lon/lat scatter colored by cycle; not a projected map.
 */
const CycleMapChart: React.FC<CycleMapChartProps> = ({ series, zones }) => (
  <ScatterChart
    width={CHART_SIZE.height}
    height={CHART_SIZE.height}
    margin={{ top: 10, right: 20, left: 20, bottom: 30 }}
  >
    <CartesianGrid strokeDasharray="3 3" />
    <XAxis
      dataKey="lon"
      type="number"
      domain={['auto', 'auto']}
      name="Longitude"
      label={{ value: 'Longitude', position: 'insideBottom', offset: -10 }}
    />
    <YAxis
      dataKey="lat"
      type="number"
      domain={['auto', 'auto']}
      name="Latitude"
      width={80}
      label={{ value: 'Latitude', angle: -90, position: 'insideLeft', offset: 0 }}
    />
    <Legend verticalAlign="top" />
    {series.map(s => (
      <Scatter
        key={s.key}
        name={s.label}
        data={s.samples}
        fill={colorForCycle(s.cycleId)}
        line={s.cycleId !== null}
        isAnimationActive={false}
      />
    ))}
    {zones.map(zone => (
      <Scatter
        key={zone.zone}
        name={zone.label}
        data={[{ lon: zone.lon, lat: zone.lat }]}
        fill={ZONE_COLORS[zone.zone]}
        shape="star"
        isAnimationActive={false}
      />
    ))}
  </ScatterChart>
);

export default CycleMapChart;
