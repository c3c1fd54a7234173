import { z } from 'zod';
import pkg from '../../package.json';
import { AnalysisConfig } from '@/core/analysisConfig';
import { AnalyzeResult } from '@/core/types';

export const REPORT_SCHEMA_VERSION = '1.0';
const RULES_VERSION = '1.0';

const ZoneSchema = z.object({
    lat: z.number(),
    lon: z.number(),
    radiusM: z.number().positive()
});

/**
 * Zod schema for report.json
 */
export const ReportMetadataSchema = z.object({
    schemaVersion: z.literal(REPORT_SCHEMA_VERSION),
    app: z.object({
        name: z.string(),
        version: z.string()
    }),
    generatedAtIso: z.string().datetime(),
    source: z.object({
        file: z.string().nullable(),
        trackName: z.string().nullable(),
        inputPoints: z.number().int().nonnegative(),
        skippedPoints: z.number().int().nonnegative()
    }),

    config: z.object({
        speedHighMps: z.number().positive(),
        speedLowMps: z.number().nonnegative(),
        minDwellSec: z.number().nonnegative(),
        minIdleSec: z.number().nonnegative(),
        minCycleSec: z.number().nonnegative(),
        minCycleDistanceM: z.number().nonnegative(),
        maxGapSec: z.number().positive(),
        zones: z.object({
            load: ZoneSchema.optional(),
            dump: ZoneSchema.optional()
        })
    }),

    sampling: z.object({
        samplesCount: z.number().int().nonnegative(),
        observedHz: z.number().nonnegative(),
        dtMedianMs: z.number().nullable(),
        dtP95Ms: z.number().nullable(),
        droppedPoints: z.number().int().nonnegative(),
        gapCount: z.number().int().nonnegative()
    }),

    segmentation: z.object({
        candidates: z.number().int().nonnegative(),
        rejected: z.array(z.object({
            startIso: z.string().datetime(),
            durationSeconds: z.number().nonnegative(),
            distanceMeters: z.number().nonnegative(),
            reason: z.enum(['too_short', 'too_little_distance'])
        }))
    }),

    aggregates: z.object({
        totalCycles: z.number().int().nonnegative(),
        meanCycleSeconds: z.number().nonnegative().nullable(),
        medianCycleSeconds: z.number().nonnegative().nullable(),
        totalCycleDistanceMeters: z.number().nonnegative(),
        trackDurationSeconds: z.number().nonnegative(),
        cycleSeconds: z.number().nonnegative(),
        idleSeconds: z.number().nonnegative(),
        utilization: z.number().nonnegative()
    }),

    files: z.array(z.object({
        name: z.string(),
        bytes: z.number().int().nonnegative()
    })).optional()
});

export type ReportMetadata = z.infer<typeof ReportMetadataSchema>;

export interface ReportContext {
    sourceFile?: string | null;
    trackName?: string | null;
    inputPoints: number;
    skippedPoints?: number;
    generatedAt?: Date;
}

export interface ValidationResult {
    status: 'pass' | 'warn' | 'fail';
    errors: string[];
    warnings: string[];
    checkedAtIso: string;
    rulesVersion: string;
}

export const buildReportMetadata = (
    result: AnalyzeResult,
    config: AnalysisConfig,
    context: ReportContext
): ReportMetadata => {
    const { track, summary } = result;
    return {
        schemaVersion: REPORT_SCHEMA_VERSION,
        app: { name: pkg.name, version: pkg.version },
        generatedAtIso: (context.generatedAt ?? new Date()).toISOString(),
        source: {
            file: context.sourceFile ?? null,
            trackName: context.trackName ?? null,
            inputPoints: context.inputPoints,
            skippedPoints: context.skippedPoints ?? 0
        },
        config: {
            speedHighMps: config.speedHighMps,
            speedLowMps: config.speedLowMps,
            minDwellSec: config.minDwellSec,
            minIdleSec: config.minIdleSec,
            minCycleSec: config.minCycleSec,
            minCycleDistanceM: config.minCycleDistanceM,
            maxGapSec: config.maxGapSec,
            zones: config.zones
        },
        sampling: {
            ...track.sampling,
            droppedPoints: track.dropped.length,
            gapCount: track.gaps.length
        },
        segmentation: {
            candidates: result.candidates.length,
            rejected: result.rejected.map(({ candidate, reason }) => ({
                startIso: new Date(candidate.startTime).toISOString(),
                durationSeconds: candidate.durationMs / 1000,
                distanceMeters: Number(candidate.distanceM.toFixed(2)),
                reason
            }))
        },
        aggregates: summary.aggregates
    };
};

/**
 * Schema check plus internal consistency rules.
 */
export function validateReportMetadata(meta: unknown): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const parsed = ReportMetadataSchema.safeParse(meta);
    if (!parsed.success) {
        parsed.error.errors.forEach(err => {
            errors.push(`${err.path.join('.')}: ${err.message}`);
        });
    } else {
        validateConsistency(parsed.data, errors, warnings);
    }

    let status: ValidationResult['status'] = 'pass';
    if (errors.length > 0) {
        status = 'fail';
    } else if (warnings.length > 0) {
        status = 'warn';
    }

    return {
        status,
        errors,
        warnings,
        checkedAtIso: new Date().toISOString(),
        rulesVersion: RULES_VERSION
    };
}

function validateConsistency(meta: ReportMetadata, errors: string[], warnings: string[]) {
    const { aggregates, sampling, segmentation, source } = meta;

    if (aggregates.utilization > 1) {
        errors.push(`Utilization ${aggregates.utilization} exceeds 1`);
    }
    if (aggregates.cycleSeconds > aggregates.trackDurationSeconds + 1e-6) {
        errors.push(`Cycle time ${aggregates.cycleSeconds}s exceeds track duration ${aggregates.trackDurationSeconds}s`);
    }
    if (aggregates.totalCycles + segmentation.rejected.length !== segmentation.candidates) {
        errors.push(
            `Candidate mismatch: ${segmentation.candidates} candidates but ${aggregates.totalCycles} kept + ${segmentation.rejected.length} rejected`
        );
    }
    if (aggregates.totalCycles === 0 && (aggregates.meanCycleSeconds !== null || aggregates.medianCycleSeconds !== null)) {
        errors.push('Cycle statistics present without cycles');
    }
    if (sampling.samplesCount + sampling.droppedPoints !== source.inputPoints) {
        errors.push(
            `Point count mismatch: ${sampling.samplesCount} kept + ${sampling.droppedPoints} dropped != ${source.inputPoints} input`
        );
    }

    if (source.inputPoints > 0 && sampling.droppedPoints / source.inputPoints > 0.1) {
        warnings.push(`More than 10% of points dropped (${sampling.droppedPoints}/${source.inputPoints})`);
    }
    if (sampling.gapCount > 0) {
        warnings.push(`${sampling.gapCount} sampling gap(s) longer than ${meta.config.maxGapSec}s`);
    }
    if (aggregates.totalCycles === 0) {
        warnings.push('No cycles detected');
    }
}
