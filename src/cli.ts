import { readFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { analyzeTrack, CycleAnalysisError, ConfigurationError, resolveAnalysisConfig } from '@/core';
import type { AnalysisConfig, AnalyzeResult } from '@/core';
import { parseGpx } from '@/lib/gpxParser';
import { writeReport } from '@/lib/reportWriter';
import { debugLog } from '@/lib/debugLog';

export const USAGE = `Usage: npm start -- <file.gpx> [options]

Options:
  --prefix <p>         output file prefix (default: the config file's outputPrefix,
                       else <input name>_ beside the input)
  --config <file>      JSON file with analysis settings and an optional outputPrefix
  --speed-high <m/s>   enter moving above this speed
  --speed-low <m/s>    leave moving below this speed
  --min-dwell <s>      slow time before moving turns stationary
  --min-idle <s>       stationary time that closes a cycle
  --min-cycle <s>      shortest cycle kept
  --min-distance <m>   least distance a kept cycle covers
  --zip                also write <prefix>report.zip
  --quiet              only print the summary`;

const NUMERIC_FLAGS = [
    ['speed-high', 'speedHighMps'],
    ['speed-low', 'speedLowMps'],
    ['min-dwell', 'minDwellSec'],
    ['min-idle', 'minIdleSec'],
    ['min-cycle', 'minCycleSec'],
    ['min-distance', 'minCycleDistanceM']
] as const;

class UsageError extends Error {}

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const parseCliArgs = (argv: string[]) => {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            prefix: { type: 'string' },
            config: { type: 'string' },
            'speed-high': { type: 'string' },
            'speed-low': { type: 'string' },
            'min-dwell': { type: 'string' },
            'min-idle': { type: 'string' },
            'min-cycle': { type: 'string' },
            'min-distance': { type: 'string' },
            zip: { type: 'boolean', default: false },
            quiet: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });

    if (values.help) {
        return { help: true as const };
    }
    if (positionals.length !== 1) {
        throw new UsageError(positionals.length === 0 ? 'Missing GPX file' : 'Expected exactly one GPX file');
    }

    const overrides: Record<string, number> = {};
    for (const [flag, key] of NUMERIC_FLAGS) {
        const raw = values[flag];
        if (raw === undefined) continue;
        const value = Number(raw);
        if (raw.trim() === '' || !Number.isFinite(value)) {
            throw new UsageError(`--${flag} expects a number, got "${raw}"`);
        }
        overrides[key] = value;
    }

    return {
        help: false as const,
        input: positionals[0],
        prefix: values.prefix,
        configFile: values.config,
        overrides,
        zip: values.zip ?? false,
        quiet: values.quiet ?? false
    };
};

interface LoadedSettings {
    config: AnalysisConfig;
    outputPrefix?: string;
}

const loadSettings = async (configFile: string | undefined, flags: Record<string, number>): Promise<LoadedSettings> => {
    let fromFile: Record<string, unknown> = {};
    if (configFile !== undefined) {
        const text = await readFile(configFile, 'utf8');
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (error) {
            throw new ConfigurationError([`${configFile}: ${error instanceof Error ? error.message : String(error)}`]);
        }
        if (!isRecord(parsed)) {
            throw new ConfigurationError([`${configFile}: expected a JSON object`]);
        }
        fromFile = parsed;
    }

    // outputPrefix names where the report goes; it is not an analysis setting.
    const { outputPrefix: rawPrefix, ...analysis } = fromFile;
    let outputPrefix: string | undefined;
    if (rawPrefix !== undefined) {
        if (typeof rawPrefix !== 'string' || rawPrefix === '') {
            throw new ConfigurationError(['outputPrefix: Expected a non-empty string']);
        }
        outputPrefix = rawPrefix;
    }
    return {
        config: resolveAnalysisConfig({ ...analysis, ...flags }),
        outputPrefix
    };
};

const defaultPrefix = (input: string): string => {
    const base = path.basename(input, path.extname(input));
    return path.join(path.dirname(input), `${base}_`);
};

const formatSeconds = (seconds: number | null): string => {
    return seconds === null ? '-' : `${seconds.toFixed(1)}s`;
};

const printSummary = (result: AnalyzeResult) => {
    const { rows, aggregates } = result.summary;
    console.log(`Detected ${aggregates.totalCycles} haul cycle(s)`);
    rows.forEach(row => {
        const flags = [
            row.truncated ? 'truncated' : null,
            row.pauseCount > 0 ? `${row.pauseCount} pause(s)` : null
        ].filter(Boolean).join(', ');
        console.log(
            `  #${row.cycleId}  ${new Date(row.startTime).toISOString()} → ${new Date(row.endTime).toISOString()}  ` +
            `${row.durationMinutes.toFixed(2)} min  ${row.distanceMeters.toFixed(1)} m` +
            (flags ? `  (${flags})` : '')
        );
    });
    if (aggregates.totalCycles > 0) {
        console.log(
            `Mean ${formatSeconds(aggregates.meanCycleSeconds)}, median ${formatSeconds(aggregates.medianCycleSeconds)}, ` +
            `utilization ${(aggregates.utilization * 100).toFixed(1)}%`
        );
    }
};

/**
 * Returns the process exit code: 0 on success, 1 on bad input or I/O failure, 2 on usage errors.
 */
export const runCli = async (argv: string[]): Promise<number> => {
    let args: ReturnType<typeof parseCliArgs>;
    try {
        args = parseCliArgs(argv);
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        console.error(USAGE);
        return 2;
    }

    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    debugLog.setEcho(!args.quiet);
    try {
        const { config, outputPrefix } = await loadSettings(args.configFile, args.overrides);
        const gpx = parseGpx(await readFile(args.input, 'utf8'));
        debugLog.info(`Read ${gpx.points.length} point(s) from ${args.input}`);

        const result = analyzeTrack(gpx.points, config);
        printSummary(result);

        const written = await writeReport(result, config, {
            outputPrefix: args.prefix ?? outputPrefix ?? defaultPrefix(args.input),
            zip: args.zip,
            sourceFile: path.basename(args.input),
            trackName: gpx.name,
            inputPoints: gpx.points.length,
            skippedPoints: gpx.skipped
        });
        console.log(`Wrote ${written.length} file(s)`);
        return 0;
    } catch (error) {
        debugLog.setEcho(true);
        if (error instanceof CycleAnalysisError) {
            debugLog.error(`${error.name}: ${error.message}`);
        } else {
            debugLog.error(`Failed: ${error instanceof Error ? error.message : String(error)}`);
        }
        return 1;
    } finally {
        debugLog.setEcho(true);
    }
};

const invokedDirectly = (): boolean => {
    const entry = process.argv[1];
    return entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
};

if (invokedDirectly()) {
    runCli(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch(error => {
            console.error(error);
            process.exitCode = 1;
        });
}
