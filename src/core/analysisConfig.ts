import { z } from 'zod';
import { ConfigurationError } from './errors';

export const CYCLE_ANALYSIS_CONFIG = {
    motion: {
        speedHighMps: 1.5,
        speedLowMps: 0.5,
        minDwellSec: 3
    },
    segmentation: {
        minIdleSec: 60
    },
    filter: {
        minCycleSec: 60,
        minCycleDistanceM: 50
    },
    sampling: {
        maxGapSec: 60
    }
} as const;

const nonNegative = z.number().finite().nonnegative();

const ZoneSchema = z.object({
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    radiusM: z.number().finite().positive()
}).strict();

export const AnalysisConfigSchema = z.object({
    speedHighMps: z.number().finite().positive(),
    speedLowMps: nonNegative,
    minDwellSec: nonNegative,
    minIdleSec: nonNegative,
    minCycleSec: nonNegative,
    minCycleDistanceM: nonNegative,
    maxGapSec: z.number().finite().positive(),
    zones: z.object({
        load: ZoneSchema.optional(),
        dump: ZoneSchema.optional()
    }).strict().default({})
}).strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type AnalysisOverrides = Partial<AnalysisConfigInput>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    ...CYCLE_ANALYSIS_CONFIG.motion,
    ...CYCLE_ANALYSIS_CONFIG.segmentation,
    ...CYCLE_ANALYSIS_CONFIG.filter,
    ...CYCLE_ANALYSIS_CONFIG.sampling,
    zones: {}
};

const formatIssuePath = (path: Array<string | number>): string => {
    return path.length > 0 ? path.join('.') : 'config';
};

/**
 * Merges overrides onto the defaults and validates the result.
 * Throws ConfigurationError before any track is processed.
 */
export const resolveAnalysisConfig = (overrides: unknown = {}): AnalysisConfig => {
    const partial = AnalysisConfigSchema.partial().safeParse(overrides);
    if (!partial.success) {
        throw new ConfigurationError(
            partial.error.issues.map(issue => `${formatIssuePath(issue.path)}: ${issue.message}`)
        );
    }

    const defined = Object.fromEntries(
        Object.entries(partial.data).filter(([, value]) => value !== undefined)
    );
    const merged = AnalysisConfigSchema.safeParse({ ...DEFAULT_ANALYSIS_CONFIG, ...defined });
    if (!merged.success) {
        throw new ConfigurationError(
            merged.error.issues.map(issue => `${formatIssuePath(issue.path)}: ${issue.message}`)
        );
    }

    const config = merged.data;
    if (config.speedLowMps >= config.speedHighMps) {
        throw new ConfigurationError([
            `speedLowMps (${config.speedLowMps}) must be below speedHighMps (${config.speedHighMps})`
        ]);
    }

    return config;
};
