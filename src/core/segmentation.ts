import {
    AnnotatedPoint,
    CandidateCycle,
    Cycle,
    CycleFilterResult,
    KinematicPoint,
    MotionLabel,
    PauseInterval,
    RejectedCycle,
    SegmenterPhase,
    ZoneConfig,
    ZoneName
} from './types';
import { pathDistance } from './kinematics';
import { isWithinRadius } from '@/utils/geo';

export interface SegmentationOptions {
    minIdleSec: number;
}

export interface CycleFilterOptions {
    minCycleSec: number;
    minCycleDistanceM: number;
}

export interface SegmenterState {
    phase: SegmenterPhase;
    cycleStart: number | null;
    /** First index of the current STATIONARY run inside an open cycle. */
    idleRunStart: number | null;
    /** 1-based sub-phase counter of the open cycle; advances after each pause. */
    subPhase: number;
    pauses: PauseInterval[];
}

export const INITIAL_SEGMENTER_STATE: SegmenterState = {
    phase: 'IDLE',
    cycleStart: null,
    idleRunStart: null,
    subPhase: 0,
    pauses: []
};

export interface SegmenterStep {
    state: SegmenterState;
    closed: CandidateCycle | null;
}

const buildCandidate = (
    points: KinematicPoint[],
    startIndex: number,
    endIndex: number,
    pauses: PauseInterval[],
    truncated: boolean
): CandidateCycle => {
    const start = points[startIndex];
    const end = points[endIndex];
    return {
        id: 0,
        startIndex,
        endIndex,
        startTime: start.timestamp,
        endTime: end.timestamp,
        durationMs: end.timestamp - start.timestamp,
        distanceM: pathDistance(points, startIndex, endIndex),
        pauses,
        truncated
    };
};

/**
 * Advances the segmenter by one labelled point.
 */
export const stepSegmenter = (
    state: SegmenterState,
    points: KinematicPoint[],
    labels: MotionLabel[],
    index: number,
    options: SegmentationOptions
): SegmenterStep => {
    const label = labels[index];

    if (state.phase === 'TERMINAL') {
        return { state, closed: null };
    }

    if (state.phase === 'IDLE') {
        if (label !== 'MOVING') return { state, closed: null };
        return {
            state: { phase: 'IN_CYCLE', cycleStart: index, idleRunStart: null, subPhase: 1, pauses: [] },
            closed: null
        };
    }

    const cycleStart = state.cycleStart ?? index;

    if (label === 'MOVING') {
        if (state.idleRunStart === null) return { state, closed: null };
        // A stop that ended before the idle limit is a pause inside the cycle.
        return {
            state: {
                ...state,
                idleRunStart: null,
                subPhase: state.subPhase + 1,
                pauses: [...state.pauses, { startIndex: state.idleRunStart, endIndex: index - 1 }]
            },
            closed: null
        };
    }

    const idleRunStart = state.idleRunStart ?? index;
    const idleMs = points[index].timestamp - points[idleRunStart].timestamp;
    if (idleMs >= options.minIdleSec * 1000) {
        return {
            state: INITIAL_SEGMENTER_STATE,
            closed: buildCandidate(points, cycleStart, idleRunStart - 1, state.pauses, false)
        };
    }

    return { state: { ...state, idleRunStart }, closed: null };
};

/**
 * Closes whatever cycle is still open when the stream runs out.
 */
export const finishSegmenter = (state: SegmenterState, points: KinematicPoint[]): SegmenterStep => {
    const terminal: SegmenterState = { ...INITIAL_SEGMENTER_STATE, phase: 'TERMINAL' };
    if (state.phase !== 'IN_CYCLE' || state.cycleStart === null || points.length === 0) {
        return { state: terminal, closed: null };
    }
    return {
        state: terminal,
        closed: buildCandidate(points, state.cycleStart, points.length - 1, state.pauses, true)
    };
};

/**
 * Greedy pass: groups labelled points into candidate cycles.
 * Candidates are numbered in order; noise is removed later by filterCycles.
 */
export const segmentCycles = (
    points: KinematicPoint[],
    labels: MotionLabel[],
    options: SegmentationOptions
): CandidateCycle[] => {
    if (labels.length !== points.length) {
        throw new RangeError(`Expected ${points.length} labels, got ${labels.length}`);
    }

    const candidates: CandidateCycle[] = [];
    let state = INITIAL_SEGMENTER_STATE;

    for (let i = 0; i < points.length; i++) {
        const step = stepSegmenter(state, points, labels, i, options);
        state = step.state;
        if (step.closed) candidates.push(step.closed);
    }

    const last = finishSegmenter(state, points);
    if (last.closed) candidates.push(last.closed);

    return candidates.map((candidate, i) => ({ ...candidate, id: i + 1 }));
};

/**
 * Post-filter: drops candidates too short in time or distance, renumbers the rest from 1.
 */
export const filterCycles = (candidates: CandidateCycle[], options: CycleFilterOptions): CycleFilterResult => {
    const kept: Cycle[] = [];
    const rejected: RejectedCycle[] = [];

    for (const candidate of candidates) {
        if (candidate.durationMs < options.minCycleSec * 1000) {
            rejected.push({ candidate, reason: 'too_short' });
            continue;
        }
        if (candidate.distanceM < options.minCycleDistanceM) {
            rejected.push({ candidate, reason: 'too_little_distance' });
            continue;
        }
        kept.push({ ...candidate, id: kept.length + 1 });
    }

    return { cycles: kept, rejected };
};

const zoneOf = (point: KinematicPoint, zones: Partial<Record<ZoneName, ZoneConfig>>): ZoneName | null => {
    if (zones.load && isWithinRadius(point.latitude, point.longitude, zones.load, zones.load.radiusM)) return 'load';
    if (zones.dump && isWithinRadius(point.latitude, point.longitude, zones.dump, zones.dump.radiusM)) return 'dump';
    return null;
};

/**
 * Pairs every point with its cycle id and sub-phase, or null for idle points.
 */
export const annotatePoints = (
    points: KinematicPoint[],
    labels: MotionLabel[],
    cycles: Cycle[],
    zones: Partial<Record<ZoneName, ZoneConfig>> = {}
): AnnotatedPoint[] => {
    const annotated: AnnotatedPoint[] = points.map((point, i) => ({
        point,
        motion: labels[i],
        cycleId: null,
        phase: null,
        zone: zoneOf(point, zones)
    }));

    for (const cycle of cycles) {
        let phase = 1;
        let pauseCursor = 0;
        for (let i = cycle.startIndex; i <= cycle.endIndex; i++) {
            annotated[i].cycleId = cycle.id;
            annotated[i].phase = phase;
            const pause = cycle.pauses[pauseCursor];
            if (pause && i === pause.endIndex) {
                phase += 1;
                pauseCursor += 1;
            }
        }
    }

    return annotated;
};
