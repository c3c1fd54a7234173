import {
    AnnotatedPoint,
    AnnotatedPointRow,
    Cycle,
    CycleSummary,
    CycleSummaryRow,
    TrackAggregates,
    ZoneName
} from './types';
import { EmptyCycleSetError } from './errors';
import { pathDistance } from './kinematics';
import { getMean, getMedian, round } from './stats';

export interface SummaryOptions {
    /** Throw EmptyCycleSetError instead of returning empty tables. */
    requireCycles?: boolean;
    /** Zones that were configured; a zone not listed here reports null visits. */
    zones?: Partial<Record<ZoneName, unknown>>;
}

const MPS_TO_KMH = 3.6;

const summarizeCycle = (
    cycle: Cycle,
    annotated: AnnotatedPoint[],
    zones: Partial<Record<ZoneName, unknown>>
): CycleSummaryRow => {
    const points = annotated.map(a => a.point);
    const inCycle = annotated.slice(cycle.startIndex, cycle.endIndex + 1);
    const durationSeconds = (cycle.endTime - cycle.startTime) / 1000;
    const distanceMeters = pathDistance(points, cycle.startIndex, cycle.endIndex);
    const pausedMs = cycle.pauses.reduce((sum, pause) => {
        // A pause runs from the last moving point before it to the last stopped point.
        const before = points[pause.startIndex - 1] ?? points[pause.startIndex];
        return sum + (points[pause.endIndex].timestamp - before.timestamp);
    }, 0);
    const visited = (zone: ZoneName): boolean | null => {
        if (!zones[zone]) return null;
        return inCycle.some(a => a.zone === zone);
    };

    return {
        cycleId: cycle.id,
        startTime: cycle.startTime,
        endTime: cycle.endTime,
        durationSeconds,
        durationMinutes: round(durationSeconds / 60, 3),
        distanceMeters: round(distanceMeters, 2),
        averageSpeedMps: durationSeconds > 0 ? round(distanceMeters / durationSeconds, 3) : 0,
        maxSpeedMps: round(inCycle.reduce((max, a) => Math.max(max, a.point.speedMps), 0), 3),
        pointCount: inCycle.length,
        pauseCount: cycle.pauses.length,
        pausedSeconds: pausedMs / 1000,
        truncated: cycle.truncated,
        visitedLoadZone: visited('load'),
        visitedDumpZone: visited('dump')
    };
};

const toPointRow = (a: AnnotatedPoint): AnnotatedPointRow => ({
    timestamp: a.point.timestamp,
    latitude: a.point.latitude,
    longitude: a.point.longitude,
    elevation: a.point.elevation ?? null,
    speedMps: round(a.point.speedMps, 3),
    speedKmh: round(a.point.speedMps * MPS_TO_KMH, 2),
    cumulativeDistanceM: round(a.point.cumulativeDistanceM, 2),
    motion: a.motion,
    cycleId: a.cycleId,
    phase: a.phase,
    zone: a.zone
});

const computeAggregates = (rows: CycleSummaryRow[], annotated: AnnotatedPoint[]): TrackAggregates => {
    const first = annotated[0];
    const last = annotated[annotated.length - 1];
    const trackDurationSeconds = first && last ? (last.point.timestamp - first.point.timestamp) / 1000 : 0;
    const durations = rows.map(row => row.durationSeconds);
    const cycleSeconds = durations.reduce((sum, d) => sum + d, 0);
    const mean = getMean(durations);
    const median = getMedian([...durations].sort((a, b) => a - b));

    return {
        totalCycles: rows.length,
        meanCycleSeconds: mean !== null ? round(mean, 3) : null,
        medianCycleSeconds: median !== null ? round(median, 3) : null,
        totalCycleDistanceMeters: round(rows.reduce((sum, row) => sum + row.distanceMeters, 0), 2),
        trackDurationSeconds,
        cycleSeconds,
        idleSeconds: Math.max(0, trackDurationSeconds - cycleSeconds),
        utilization: trackDurationSeconds > 0 ? round(cycleSeconds / trackDurationSeconds, 4) : 0
    };
};

/**
 * Builds the per-cycle table, the per-point table and track-wide aggregates.
 */
export const summarizeCycles = (
    cycles: Cycle[],
    annotated: AnnotatedPoint[],
    options: SummaryOptions = {}
): CycleSummary => {
    if (cycles.length === 0 && options.requireCycles) {
        throw new EmptyCycleSetError();
    }

    const zones = options.zones ?? {};
    const rows = cycles.map(cycle => summarizeCycle(cycle, annotated, zones));

    return {
        rows,
        points: annotated.map(toPointRow),
        aggregates: computeAggregates(rows, annotated)
    };
};
