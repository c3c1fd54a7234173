import { AnnotatedPointRow, CycleSummaryRow } from '@/core/types';

type CsvCell = string | number | boolean | null;

export interface CsvColumn<T> {
    header: string;
    value: (row: T) => CsvCell;
}

const escapeCell = (cell: CsvCell): string => {
    if (cell === null) return '';
    const text = String(cell);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
};

const isoTime = (timestamp: number): string => new Date(timestamp).toISOString();

/**
 * RFC 4180 quoting, header line first, "\n" line endings.
 */
export const toCsv = <T>(rows: T[], columns: CsvColumn<T>[]): string => {
    const lines = [columns.map(c => escapeCell(c.header)).join(',')];
    rows.forEach(row => {
        lines.push(columns.map(c => escapeCell(c.value(row))).join(','));
    });
    return lines.join('\n') + '\n';
};

export const CYCLE_SUMMARY_COLUMNS: CsvColumn<CycleSummaryRow>[] = [
    { header: 'cycle_id', value: r => r.cycleId },
    { header: 'start_time', value: r => isoTime(r.startTime) },
    { header: 'end_time', value: r => isoTime(r.endTime) },
    { header: 'duration_seconds', value: r => r.durationSeconds },
    { header: 'duration_min', value: r => r.durationMinutes },
    { header: 'distance_meters', value: r => r.distanceMeters },
    { header: 'average_speed', value: r => r.averageSpeedMps },
    { header: 'max_speed', value: r => r.maxSpeedMps },
    { header: 'point_count', value: r => r.pointCount },
    { header: 'pause_count', value: r => r.pauseCount },
    { header: 'paused_seconds', value: r => r.pausedSeconds },
    { header: 'truncated', value: r => r.truncated },
    { header: 'visited_load_zone', value: r => r.visitedLoadZone },
    { header: 'visited_dump_zone', value: r => r.visitedDumpZone }
];

export const ANNOTATED_POINT_COLUMNS: CsvColumn<AnnotatedPointRow>[] = [
    { header: 'timestamp', value: r => isoTime(r.timestamp) },
    { header: 'latitude', value: r => r.latitude },
    { header: 'longitude', value: r => r.longitude },
    { header: 'elevation', value: r => r.elevation },
    { header: 'speed', value: r => r.speedMps },
    { header: 'speed_km_h', value: r => r.speedKmh },
    { header: 'cumulative_distance_m', value: r => r.cumulativeDistanceM },
    { header: 'motion', value: r => r.motion },
    { header: 'cycle_id', value: r => r.cycleId },
    { header: 'phase', value: r => r.phase },
    { header: 'zone', value: r => r.zone }
];

export const formatCycleSummaryCsv = (rows: CycleSummaryRow[]): string => toCsv(rows, CYCLE_SUMMARY_COLUMNS);

export const formatAnnotatedPointsCsv = (rows: AnnotatedPointRow[]): string => toCsv(rows, ANNOTATED_POINT_COLUMNS);
