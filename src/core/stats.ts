import { StreamStats } from './types';

/**
 * Computes the percentile of a sorted numeric array.
 */
export const getPercentile = (sorted: number[], p: number): number | null => {
    if (sorted.length === 0) return null;
    if (!Number.isFinite(p)) return null;
    if (p <= 0) return sorted[0];
    if (p >= 1) return sorted[sorted.length - 1];
    const index = Math.ceil((sorted.length - 1) * p);
    return sorted[index];
};

/**
 * Computes the median of a sorted numeric array.
 */
export const getMedian = (sorted: number[]): number | null => {
    if (sorted.length === 0) return null;
    const mid = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 0) {
        return (sorted[mid - 1] + sorted[mid]) / 2;
    }
    return sorted[mid];
};

export const getMean = (values: number[]): number | null => {
    if (values.length === 0) return null;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
};

export const round = (value: number, digits: number): number => {
    return Number(value.toFixed(digits));
};

/**
 * Computes sampling statistics from strictly increasing timestamps.
 */
export const computeStreamStats = (timestamps: number[]): StreamStats => {
    const samplesCount = timestamps.length;
    if (samplesCount < 2) {
        return { samplesCount, observedHz: 0, dtMedianMs: null, dtP95Ms: null };
    }

    const intervals: number[] = [];
    for (let i = 1; i < timestamps.length; i++) {
        const dt = timestamps[i] - timestamps[i - 1];
        if (dt > 0) intervals.push(dt);
    }

    if (samplesCount < 3 || intervals.length === 0) {
        // Interval stats are meaningless with a single interval.
        const dur = (timestamps[samplesCount - 1] - timestamps[0]) / 1000;
        const observedHz = dur > 0 ? (samplesCount - 1) / dur : 0;
        return { samplesCount, observedHz: round(observedHz, 3), dtMedianMs: null, dtP95Ms: null };
    }

    const sorted = [...intervals].sort((a, b) => a - b);
    const dtMedianMs = getMedian(sorted);
    const dtP95Ms = getPercentile(sorted, 0.95);
    const observedHz = dtMedianMs && dtMedianMs > 0 ? 1000 / dtMedianMs : 0;

    return {
        samplesCount,
        observedHz: round(observedHz, 3),
        dtMedianMs: dtMedianMs !== null ? round(dtMedianMs, 2) : null,
        dtP95Ms: dtP95Ms !== null ? round(dtP95Ms, 2) : null
    };
};
