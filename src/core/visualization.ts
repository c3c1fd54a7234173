import { AnnotatedPointRow, CycleSummaryRow, ZoneConfig, ZoneName } from './types';
import { round } from './stats';

export interface GanttRow {
    cycleId: number;
    label: string;
    /** Seconds from the first point of the track to the cycle start. */
    offsetSec: number;
    durationSec: number;
    durationMinutes: number;
    startTime: number;
    endTime: number;
}

export interface SpeedSample {
    tSec: number;
    /** null marks a break between idle runs so the line is not drawn across a cycle. */
    speedKmh: number | null;
}

export interface SeriesKey {
    key: string;
    label: string;
    cycleId: number | null;
}

export interface SpeedSeries extends SeriesKey {
    samples: SpeedSample[];
}

export interface MapSample {
    lon: number;
    lat: number;
}

export interface MapSeries extends SeriesKey {
    samples: MapSample[];
}

export interface ZoneMarker {
    zone: ZoneName;
    label: string;
    lon: number;
    lat: number;
    radiusM: number;
}

const IDLE_SERIES: SeriesKey = { key: 'idle', label: 'No cycle', cycleId: null };

const seriesKeyFor = (cycleId: number | null): SeriesKey => {
    if (cycleId === null) return IDLE_SERIES;
    return { key: `cycle-${cycleId}`, label: `Cycle ${cycleId}`, cycleId };
};

/**
 * Groups points by cycle in first-appearance order, idle points last.
 * With `breakAt`, the idle group gets a separator sample wherever idle time resumes after a cycle.
 */
const groupByCycle = <T>(
    points: AnnotatedPointRow[],
    pick: (point: AnnotatedPointRow) => T,
    breakAt?: (point: AnnotatedPointRow) => T
) => {
    const groups = new Map<number | null, T[]>();
    points.forEach((point, i) => {
        const group = groups.get(point.cycleId) ?? [];
        const resumesIdle = point.cycleId === null && i > 0 && points[i - 1].cycleId !== null;
        if (breakAt && resumesIdle && group.length > 0) {
            group.push(breakAt(point));
        }
        group.push(pick(point));
        groups.set(point.cycleId, group);
    });
    return [...groups.entries()]
        .sort(([a], [b]) => (a === null ? 1 : b === null ? -1 : a - b))
        .map(([cycleId, samples]) => ({ ...seriesKeyFor(cycleId), samples }));
};

export const buildGanttRows = (rows: CycleSummaryRow[], trackStart: number): GanttRow[] => {
    return [...rows]
        .sort((a, b) => a.startTime - b.startTime)
        .map(row => ({
            cycleId: row.cycleId,
            label: `Cycle ${row.cycleId}`,
            offsetSec: (row.startTime - trackStart) / 1000,
            durationSec: row.durationSeconds,
            durationMinutes: row.durationMinutes,
            startTime: row.startTime,
            endTime: row.endTime
        }));
};

export const buildSpeedSeries = (points: AnnotatedPointRow[]): SpeedSeries[] => {
    if (points.length === 0) return [];
    const trackStart = points[0].timestamp;
    const tSec = (point: AnnotatedPointRow) => round((point.timestamp - trackStart) / 1000, 3);
    return groupByCycle<SpeedSample>(
        points,
        point => ({ tSec: tSec(point), speedKmh: point.speedKmh }),
        point => ({ tSec: tSec(point), speedKmh: null })
    );
};

export const buildMapSeries = (points: AnnotatedPointRow[]): MapSeries[] => {
    return groupByCycle(points, point => ({ lon: point.longitude, lat: point.latitude }));
};

export const buildZoneMarkers = (zones: Partial<Record<ZoneName, ZoneConfig>>): ZoneMarker[] => {
    const markers: ZoneMarker[] = [];
    if (zones.load) {
        markers.push({ zone: 'load', label: 'Load zone', lon: zones.load.lon, lat: zones.load.lat, radiusM: zones.load.radiusM });
    }
    if (zones.dump) {
        markers.push({ zone: 'dump', label: 'Dump zone', lon: zones.dump.lon, lat: zones.dump.lat, radiusM: zones.dump.radiusM });
    }
    return markers;
};
