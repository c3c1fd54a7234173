import { AnalyzeResult, CycleEngine, PointRecord } from './types';
import { AnalysisConfig, AnalysisOverrides, resolveAnalysisConfig } from './analysisConfig';
import { normalizeTrack } from './kinematics';
import { classifyMotion, countMotionLabels } from './motion';
import { annotatePoints, filterCycles, segmentCycles } from './segmentation';
import { summarizeCycles } from './summary';
import { debugLog } from '@/lib/debugLog';

export interface AnalyzeOptions {
    requireCycles?: boolean;
}

const describeTime = (timestamp: number) => new Date(timestamp).toISOString();

/**
 * Runs normalize → classify → segment → filter → summarize over a complete track.
 */
export const analyzeTrack = (
    records: PointRecord[],
    config: AnalysisConfig,
    options: AnalyzeOptions = {}
): AnalyzeResult => {
    // 1. Normalization
    const track = normalizeTrack(records, { maxGapSec: config.maxGapSec });
    if (track.dropped.length > 0) {
        debugLog.warn(`Dropped ${track.dropped.length} point(s) with non-increasing timestamps`);
        track.dropped.forEach(d => {
            debugLog.warn(`  input #${d.sourceIndex} at ${describeTime(d.timestamp)}: ${d.reason}`);
        });
    }
    track.gaps.forEach(gap => {
        const at = track.points[gap.afterIndex];
        debugLog.warn(`Sampling gap of ${(gap.gapMs / 1000).toFixed(1)}s after ${describeTime(at.timestamp)}`);
    });

    // 2. Motion labels
    const labels = classifyMotion(track.points, config);
    const counts = countMotionLabels(labels);
    debugLog.info(`Labelled ${counts.MOVING} moving and ${counts.STATIONARY} stationary points`);

    // 3. Segmentation, then noise rejection
    const candidates = segmentCycles(track.points, labels, config);
    const { cycles, rejected } = filterCycles(candidates, config);
    rejected.forEach(({ candidate, reason }) => {
        debugLog.info(
            `Rejected candidate ${candidate.id} at ${describeTime(candidate.startTime)} ` +
            `(${(candidate.durationMs / 1000).toFixed(1)}s, ${candidate.distanceM.toFixed(1)}m): ${reason}`
        );
    });

    // 4. Tables
    const annotated = annotatePoints(track.points, labels, cycles, config.zones);
    const summary = summarizeCycles(cycles, annotated, {
        requireCycles: options.requireCycles,
        zones: config.zones
    });
    if (cycles.length === 0) {
        debugLog.warn('No cycles detected');
    }

    return { track, labels, candidates, cycles, rejected, annotated, summary };
};

class HaulCycleEngine implements CycleEngine {
    private records: PointRecord[] = [];
    private config: AnalysisConfig;
    private options: AnalyzeOptions;

    constructor(overrides: AnalysisOverrides = {}, options: AnalyzeOptions = {}) {
        this.config = resolveAnalysisConfig(overrides);
        this.options = options;
    }

    ingest(point: PointRecord): void {
        this.records.push(point);
    }

    finalize(): AnalyzeResult {
        return analyzeTrack(this.records, this.config, this.options);
    }

    reset(): void {
        this.records = [];
    }
}

/**
 * Validates the configuration up front; ConfigurationError surfaces before any point is ingested.
 */
export const createEngine = (overrides?: AnalysisOverrides, options?: AnalyzeOptions): CycleEngine => {
    return new HaulCycleEngine(overrides, options);
};

export { resolveAnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from './analysisConfig';
export type { AnalysisConfig, AnalysisOverrides } from './analysisConfig';
export * from './errors';
export type * from './types';
