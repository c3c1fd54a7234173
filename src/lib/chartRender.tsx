import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import CycleGanttChart from '@/charts/CycleGanttChart';
import SpeedTimeChart from '@/charts/SpeedTimeChart';
import CycleMapChart from '@/charts/CycleMapChart';
import { buildGanttRows, buildMapSeries, buildSpeedSeries, buildZoneMarkers } from '@/core/visualization';
import { CycleSummary, ZoneConfig, ZoneName } from '@/core/types';

export type ChartKind = 'gantt' | 'speed' | 'map';

export interface RenderedChart {
    kind: ChartKind;
    title: string;
    html: string;
}

const escapeHtml = (value: string): string => {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
};

/**
 * Wraps statically rendered chart markup in a standalone HTML page.
 */
export const renderChartDocument = (title: string, element: React.ReactElement): string => {
    const markup = renderToStaticMarkup(element);
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8">',
        `<title>${escapeHtml(title)}</title>`,
        '<style>body{font-family:sans-serif;margin:24px;}h1{font-size:18px;}</style>',
        '</head>',
        '<body>',
        `<h1>${escapeHtml(title)}</h1>`,
        markup,
        '</body>',
        '</html>',
        ''
    ].join('\n');
};

/**
 * Renders the three report charts; an empty list when no cycles were found.
 */
export const renderCycleCharts = (
    summary: CycleSummary,
    zones: Partial<Record<ZoneName, ZoneConfig>> = {}
): RenderedChart[] => {
    if (summary.rows.length === 0 || summary.points.length === 0) return [];

    const trackStart = summary.points[0].timestamp;
    const gantt = buildGanttRows(summary.rows, trackStart);
    const speed = buildSpeedSeries(summary.points);
    const map = buildMapSeries(summary.points);
    const markers = buildZoneMarkers(zones);

    return [
        {
            kind: 'gantt',
            title: 'Gantt Chart of Haul Cycles',
            html: renderChartDocument('Gantt Chart of Haul Cycles', <CycleGanttChart rows={gantt} />)
        },
        {
            kind: 'speed',
            title: 'Speed vs. Time by Cycle',
            html: renderChartDocument('Speed vs. Time by Cycle', <SpeedTimeChart series={speed} />)
        },
        {
            kind: 'map',
            title: 'Map of Haul Cycles (Lat/Lon)',
            html: renderChartDocument('Map of Haul Cycles (Lat/Lon)', <CycleMapChart series={map} zones={markers} />)
        }
    ];
};
