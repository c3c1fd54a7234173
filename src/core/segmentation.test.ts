import { describe, expect, it } from 'vitest';
import {
    annotatePoints,
    filterCycles,
    finishSegmenter,
    INITIAL_SEGMENTER_STATE,
    segmentCycles,
    stepSegmenter
} from './segmentation';
import { classifyMotion } from './motion';
import { normalizeTrack } from './kinematics';
import { CandidateCycle, MotionLabel } from './types';
import {
    BASE_LAT,
    BASE_LON,
    buildTrack,
    endsMovingOffsets,
    glitchOffsets,
    pausedCycleOffsets,
    T0,
    twoCycleOffsets
} from '@/test/trackFactory';

const THRESHOLDS = { speedHighMps: 1.0, speedLowMps: 0.3, minDwellSec: 3 };
const SEGMENTATION = { minIdleSec: 5 };
const FILTER = { minCycleSec: 10, minCycleDistanceM: 10 };

const prepare = (offsets: number[], minDwellSec: number = THRESHOLDS.minDwellSec) => {
    const points = normalizeTrack(buildTrack(offsets), { maxGapSec: 60 }).points;
    const labels = classifyMotion(points, { ...THRESHOLDS, minDwellSec });
    return { points, labels };
};

const candidate = (overrides: Partial<CandidateCycle>): CandidateCycle => ({
    id: 1,
    startIndex: 0,
    endIndex: 10,
    startTime: T0,
    endTime: T0 + 30000,
    durationMs: 30000,
    distanceM: 100,
    pauses: [],
    truncated: false,
    ...overrides
});

describe('segmentCycles', () => {
    it('finds one candidate per moving run and excludes idle time', () => {
        const { points, labels } = prepare(twoCycleOffsets());
        const candidates = segmentCycles(points, labels, SEGMENTATION);

        expect(candidates).toHaveLength(2);
        expect(candidates[0]).toMatchObject({
            id: 1,
            startIndex: 10,
            endIndex: 40,
            startTime: T0 + 10000,
            endTime: T0 + 40000,
            durationMs: 30000,
            truncated: false
        });
        expect(candidates[0].distanceM).toBeCloseTo(150, 6);
        expect(candidates[1]).toMatchObject({ id: 2, startIndex: 71, endIndex: 100, durationMs: 29000 });
        expect(candidates[1].distanceM).toBeCloseTo(145, 6);
    });

    it('closes a cycle that is still open when the track ends', () => {
        const { points, labels } = prepare(endsMovingOffsets());
        const candidates = segmentCycles(points, labels, SEGMENTATION);

        expect(candidates).toHaveLength(1);
        expect(candidates[0]).toMatchObject({
            startIndex: 10,
            endIndex: points.length - 1,
            endTime: T0 + 40000,
            truncated: true
        });
    });

    it('keeps short stops inside the cycle as pauses', () => {
        const { points, labels } = prepare(pausedCycleOffsets(), 1);
        const candidates = segmentCycles(points, labels, SEGMENTATION);

        expect(candidates).toHaveLength(1);
        expect(candidates[0]).toMatchObject({ startIndex: 10, endIndex: 50 });
        expect(candidates[0].pauses).toEqual([{ startIndex: 31, endIndex: 33 }]);
    });

    it('yields nothing for an all-stationary track', () => {
        const { points } = prepare(Array.from({ length: 30 }, () => 0));
        const labels: MotionLabel[] = points.map(() => 'STATIONARY');
        expect(segmentCycles(points, labels, SEGMENTATION)).toEqual([]);
    });

    it('rejects mismatched label arrays', () => {
        const { points } = prepare([0, 5, 10]);
        expect(() => segmentCycles(points, ['MOVING'], SEGMENTATION)).toThrow(RangeError);
    });

    it('produces non-overlapping candidates ordered by start time', () => {
        const { points, labels } = prepare(twoCycleOffsets());
        const candidates = segmentCycles(points, labels, { minIdleSec: 1 });

        for (let i = 1; i < candidates.length; i++) {
            expect(candidates[i].startIndex).toBeGreaterThan(candidates[i - 1].endIndex);
            expect(candidates[i].startTime).toBeGreaterThanOrEqual(candidates[i - 1].endTime);
        }
    });
});

describe('stepSegmenter', () => {
    it('opens a cycle on the first moving point', () => {
        const { points } = prepare([0, 5, 10]);
        const labels: MotionLabel[] = ['STATIONARY', 'MOVING', 'MOVING'];

        const idle = stepSegmenter(INITIAL_SEGMENTER_STATE, points, labels, 0, SEGMENTATION);
        expect(idle.state.phase).toBe('IDLE');

        const open = stepSegmenter(idle.state, points, labels, 1, SEGMENTATION);
        expect(open.state).toMatchObject({ phase: 'IN_CYCLE', cycleStart: 1, subPhase: 1 });
        expect(open.closed).toBeNull();
    });

    it('ends in TERMINAL with nothing to close from IDLE', () => {
        const { points } = prepare([0, 0]);
        const finished = finishSegmenter(INITIAL_SEGMENTER_STATE, points);
        expect(finished.state.phase).toBe('TERMINAL');
        expect(finished.closed).toBeNull();
    });
});

describe('filterCycles', () => {
    it('discards a glitch shorter than the minimum duration', () => {
        const { points, labels } = prepare(glitchOffsets());
        const candidates = segmentCycles(points, labels, SEGMENTATION);

        expect(candidates).toHaveLength(1);
        expect(candidates[0]).toMatchObject({ startIndex: 20, endIndex: 21, durationMs: 1000 });

        const result = filterCycles(candidates, FILTER);
        expect(result.cycles).toEqual([]);
        expect(result.rejected).toEqual([{ candidate: candidates[0], reason: 'too_short' }]);
    });

    it('rejects on distance and renumbers survivors from 1', () => {
        const result = filterCycles([
            candidate({ id: 1, distanceM: 5 }),
            candidate({ id: 2, startIndex: 20, endIndex: 30 }),
            candidate({ id: 3, startIndex: 40, endIndex: 50, durationMs: 9999 })
        ], FILTER);

        expect(result.cycles.map(c => [c.id, c.startIndex])).toEqual([[1, 20]]);
        expect(result.rejected.map(r => [r.candidate.id, r.reason])).toEqual([
            [1, 'too_little_distance'],
            [3, 'too_short']
        ]);
    });

    it('keeps candidates exactly at the minimums', () => {
        const result = filterCycles([candidate({ durationMs: 10000, distanceM: 10 })], FILTER);
        expect(result.cycles).toHaveLength(1);
    });
});

describe('annotatePoints', () => {
    it('tags cycle points with id and sub-phase, idle points with null', () => {
        const { points, labels } = prepare(pausedCycleOffsets(), 1);
        const { cycles } = filterCycles(segmentCycles(points, labels, SEGMENTATION), FILTER);

        const annotated = annotatePoints(points, labels, cycles);

        expect(annotated).toHaveLength(points.length);
        expect(annotated[9]).toMatchObject({ cycleId: null, phase: null, motion: 'STATIONARY' });
        expect(annotated[10]).toMatchObject({ cycleId: 1, phase: 1, motion: 'MOVING' });
        expect(annotated[32]).toMatchObject({ cycleId: 1, phase: 1, motion: 'STATIONARY' });
        expect(annotated[34]).toMatchObject({ cycleId: 1, phase: 2 });
        expect(annotated[50]).toMatchObject({ cycleId: 1, phase: 2 });
        expect(annotated[51]).toMatchObject({ cycleId: null, phase: null });
    });

    it('tags points inside configured zones', () => {
        const { points, labels } = prepare(twoCycleOffsets());
        const zones = { load: { lat: BASE_LAT, lon: BASE_LON, radiusM: 20 } };

        const annotated = annotatePoints(points, labels, [], zones);

        expect(annotated[0].zone).toBe('load');
        expect(annotated[40].zone).toBeNull();
        expect(annotated[120].zone).toBe('load');
    });
});
