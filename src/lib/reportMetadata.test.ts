import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildReportMetadata, ReportMetadataSchema, validateReportMetadata } from './reportMetadata';
import { analyzeTrack } from '@/core';
import { resolveAnalysisConfig } from '@/core/analysisConfig';
import { debugLog } from './debugLog';
import { buildTrack, glitchOffsets, twoCycleOffsets } from '@/test/trackFactory';

const CONFIG = resolveAnalysisConfig({
    speedHighMps: 1.0,
    speedLowMps: 0.3,
    minIdleSec: 5,
    minCycleSec: 10,
    minCycleDistanceM: 10
});

const GENERATED_AT = new Date(Date.UTC(2024, 0, 16, 12, 0, 0));

describe('report metadata', () => {
    beforeEach(() => debugLog.setEcho(false));
    afterEach(() => debugLog.setEcho(true));

    it('builds schema-valid metadata that passes consistency checks', () => {
        const records = buildTrack(twoCycleOffsets());
        const result = analyzeTrack(records, CONFIG);

        const meta = buildReportMetadata(result, CONFIG, {
            sourceFile: 'shift.gpx',
            trackName: 'Shift 1',
            inputPoints: records.length,
            generatedAt: GENERATED_AT
        });

        expect(ReportMetadataSchema.safeParse(meta).success).toBe(true);
        expect(meta.app.name).toBe('haul-cycle-analyzer');
        expect(meta.generatedAtIso).toBe('2024-01-16T12:00:00.000Z');
        expect(meta.source).toEqual({ file: 'shift.gpx', trackName: 'Shift 1', inputPoints: 121, skippedPoints: 0 });
        expect(meta.sampling).toMatchObject({ samplesCount: 121, droppedPoints: 0, gapCount: 0, dtMedianMs: 1000 });
        expect(meta.segmentation).toEqual({ candidates: 2, rejected: [] });
        expect(meta.aggregates.totalCycles).toBe(2);

        const validation = validateReportMetadata(meta);
        expect(validation.status).toBe('pass');
        expect(validation.errors).toEqual([]);
        expect(validation.warnings).toEqual([]);
    });

    it('records rejected candidates and warns when nothing was found', () => {
        const records = buildTrack(glitchOffsets());
        const result = analyzeTrack(records, CONFIG);

        const meta = buildReportMetadata(result, CONFIG, { inputPoints: records.length, generatedAt: GENERATED_AT });

        expect(meta.segmentation.rejected).toEqual([
            { startIso: '2024-01-15T08:00:20.000Z', durationSeconds: 1, distanceMeters: 8, reason: 'too_short' }
        ]);
        const validation = validateReportMetadata(meta);
        expect(validation.status).toBe('warn');
        expect(validation.warnings).toEqual(['No cycles detected']);
    });

    it('fails on inconsistent counts', () => {
        const records = buildTrack(twoCycleOffsets());
        const meta = buildReportMetadata(analyzeTrack(records, CONFIG), CONFIG, { inputPoints: records.length + 5 });

        const validation = validateReportMetadata(meta);
        expect(validation.status).toBe('fail');
        expect(validation.errors).toEqual(['Point count mismatch: 121 kept + 0 dropped != 126 input']);
    });

    it('fails on schema violations', () => {
        const validation = validateReportMetadata({ schemaVersion: '0.1' });
        expect(validation.status).toBe('fail');
        expect(validation.errors.some(e => e.startsWith('schemaVersion:'))).toBe(true);
    });
});
