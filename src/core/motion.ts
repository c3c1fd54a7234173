import { KinematicPoint, MotionLabel } from './types';

export interface MotionThresholds {
    speedHighMps: number;
    speedLowMps: number;
    minDwellSec: number;
}

export interface ClassifierState {
    state: MotionLabel;
    /** First index of a below-low run awaiting its dwell, or null. */
    pendingStart: number | null;
}

export const INITIAL_CLASSIFIER_STATE: ClassifierState = { state: 'STATIONARY', pendingStart: null };

export interface ClassifierStep {
    state: ClassifierState;
    /** Set when the pending run is confirmed; every index in [from, to] becomes STATIONARY. */
    relabel: { from: number; to: number } | null;
}

/**
 * Advances the hysteresis state by one point.
 */
export const stepClassifier = (
    current: ClassifierState,
    points: KinematicPoint[],
    index: number,
    thresholds: MotionThresholds
): ClassifierStep => {
    const point = points[index];

    if (current.state === 'STATIONARY') {
        if (point.speedMps > thresholds.speedHighMps) {
            return { state: { state: 'MOVING', pendingStart: null }, relabel: null };
        }
        return { state: current, relabel: null };
    }

    if (point.speedMps >= thresholds.speedLowMps) {
        return { state: { state: 'MOVING', pendingStart: null }, relabel: null };
    }

    const pendingStart = current.pendingStart ?? index;
    const dwellMs = point.timestamp - points[pendingStart].timestamp;
    if (dwellMs >= thresholds.minDwellSec * 1000) {
        return {
            state: { state: 'STATIONARY', pendingStart: null },
            relabel: { from: pendingStart, to: index }
        };
    }

    return { state: { state: 'MOVING', pendingStart }, relabel: null };
};

/**
 * Labels every point STATIONARY or MOVING using two speed thresholds and a dwell.
 * A slowdown shorter than the dwell keeps its MOVING label.
 */
export const classifyMotion = (points: KinematicPoint[], thresholds: MotionThresholds): MotionLabel[] => {
    const labels: MotionLabel[] = [];
    let state = INITIAL_CLASSIFIER_STATE;

    for (let i = 0; i < points.length; i++) {
        const step = stepClassifier(state, points, i, thresholds);
        state = step.state;
        labels.push(state.state);
        if (step.relabel) {
            for (let j = step.relabel.from; j <= step.relabel.to; j++) {
                labels[j] = 'STATIONARY';
            }
        }
    }

    return labels;
};

export const countMotionLabels = (labels: MotionLabel[]): Record<MotionLabel, number> => {
    return labels.reduce<Record<MotionLabel, number>>(
        (counts, label) => ({ ...counts, [label]: counts[label] + 1 }),
        { STATIONARY: 0, MOVING: 0 }
    );
};
