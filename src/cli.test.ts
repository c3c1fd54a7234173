import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli, USAGE } from './cli';
import { debugLog } from '@/lib/debugLog';
import { PointRecord } from '@/core/types';
import { buildTrack, twoCycleOffsets } from '@/test/trackFactory';

const toGpx = (records: PointRecord[]) => `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <name>Test haul</name>
    <trkseg>
${records.map(r => `      <trkpt lat="${r.latitude}" lon="${r.longitude}"><time>${new Date(r.timestamp).toISOString()}</time></trkpt>`).join('\n')}
    </trkseg>
  </trk>
</gpx>`;

const THRESHOLD_FLAGS = [
    '--speed-high', '1',
    '--speed-low', '0.3',
    '--min-idle', '5',
    '--min-cycle', '10',
    '--min-distance', '10'
];

describe('runCli', () => {
    let dir: string;
    let gpxFile: string;

    beforeEach(async () => {
        debugLog.clear();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        dir = await mkdtemp(path.join(os.tmpdir(), 'haul-cli-'));
        gpxFile = path.join(dir, 'shift.gpx');
        await writeFile(gpxFile, toGpx(buildTrack(twoCycleOffsets())));
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('analyzes a GPX file and writes the report beside it', async () => {
        const code = await runCli([gpxFile, ...THRESHOLD_FLAGS]);

        expect(code).toBe(0);
        expect(console.log).toHaveBeenCalledWith('Detected 2 haul cycle(s)');
        expect(console.log).toHaveBeenCalledWith('Wrote 6 file(s)');

        const summary = await readFile(path.join(dir, 'shift_cycle_summary.csv'), 'utf8');
        expect(summary.trimEnd().split('\n')).toHaveLength(3);

        const report = JSON.parse(await readFile(path.join(dir, 'shift_report.json'), 'utf8'));
        expect(report.source).toEqual({ file: 'shift.gpx', trackName: 'Test haul', inputPoints: 121, skippedPoints: 0 });
        expect(report.config.speedHighMps).toBe(1);
    });

    it('reads settings from a config file with flags taking precedence', async () => {
        const configFile = path.join(dir, 'settings.json');
        await writeFile(configFile, JSON.stringify({
            speedHighMps: 1,
            speedLowMps: 0.3,
            minIdleSec: 5,
            minCycleSec: 10,
            minCycleDistanceM: 10
        }));
        const prefix = path.join(dir, 'out', 'run_');

        const code = await runCli([gpxFile, '--config', configFile, '--min-cycle', '40', '--prefix', prefix, '--zip', '--quiet']);

        expect(code).toBe(0);
        expect(console.log).toHaveBeenCalledWith('Detected 0 haul cycle(s)');
        const report = JSON.parse(await readFile(`${prefix}report.json`, 'utf8'));
        expect(report.config.minCycleSec).toBe(40);
        expect(report.segmentation.rejected.map((r: { reason: string }) => r.reason)).toEqual(['too_short', 'too_short']);
        expect((await readFile(`${prefix}report.zip`)).byteLength).toBeGreaterThan(0);
    });

    it('takes the output prefix from the config file unless --prefix is given', async () => {
        const configFile = path.join(dir, 'settings.json');
        const filePrefix = path.join(dir, 'from-config', 'site_');
        await writeFile(configFile, JSON.stringify({ outputPrefix: filePrefix, minIdleSec: 5 }));

        expect(await runCli([gpxFile, '--config', configFile])).toBe(0);
        const report = JSON.parse(await readFile(`${filePrefix}report.json`, 'utf8'));
        expect(report.config.minIdleSec).toBe(5);
        expect(report.config).not.toHaveProperty('outputPrefix');

        const flagPrefix = path.join(dir, 'from-flag', 'run_');
        expect(await runCli([gpxFile, '--config', configFile, '--prefix', flagPrefix])).toBe(0);
        expect((await readFile(`${flagPrefix}cycle_summary.csv`, 'utf8')).startsWith('cycle_id,')).toBe(true);
    });

    it('rejects an output prefix that is not a string', async () => {
        const configFile = path.join(dir, 'settings.json');
        await writeFile(configFile, JSON.stringify({ outputPrefix: 42 }));

        expect(await runCli([gpxFile, '--config', configFile])).toBe(1);
        expect(debugLog.getLogs()[0].message).toBe('ConfigurationError: Invalid configuration: outputPrefix: Expected a non-empty string');
    });

    it('prints usage for --help', async () => {
        expect(await runCli(['--help'])).toBe(0);
        expect(console.log).toHaveBeenCalledWith(USAGE);
        expect(USAGE.split('\n')[0]).toBe('Usage: npm start -- <file.gpx> [options]');
    });

    it('returns 2 on usage errors', async () => {
        expect(await runCli([])).toBe(2);
        expect(console.error).toHaveBeenCalledWith('Missing GPX file');

        expect(await runCli([gpxFile, '--speed-high', 'fast'])).toBe(2);
        expect(console.error).toHaveBeenCalledWith('--speed-high expects a number, got "fast"');

        expect(await runCli([gpxFile, '--bogus'])).toBe(2);
    });

    it('returns 1 on invalid settings', async () => {
        expect(await runCli([gpxFile, '--speed-high', '1', '--speed-low', '2'])).toBe(1);
        expect(debugLog.getLogs()[0]).toMatchObject({
            level: 'error',
            message: 'ConfigurationError: Invalid configuration: speedLowMps (2) must be below speedHighMps (1)'
        });
    });

    it('returns 1 on malformed input and missing files', async () => {
        const broken = path.join(dir, 'broken.gpx');
        await writeFile(broken, 'this is not a gpx file');

        expect(await runCli([broken])).toBe(1);
        expect(debugLog.getLogs()[0].message.startsWith('MalformedTrackError: ')).toBe(true);

        expect(await runCli([path.join(dir, 'missing.gpx')])).toBe(1);
        expect(debugLog.getLogs()[0].message.startsWith('Failed: ')).toBe(true);
    });
});
