import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as fflate from 'fflate';
import { AnalysisConfig } from '@/core/analysisConfig';
import { AnalyzeResult } from '@/core/types';
import { formatAnnotatedPointsCsv, formatCycleSummaryCsv } from './csv';
import { renderCycleCharts, ChartKind } from './chartRender';
import { buildReportMetadata, ReportContext, validateReportMetadata } from './reportMetadata';
import { debugLog } from './debugLog';

export interface ReportOptions extends ReportContext {
    /** Prepended verbatim to every file name, e.g. "out/site-a_". */
    outputPrefix: string;
    zip?: boolean;
}

export interface WrittenFile {
    name: string;
    path: string;
    bytes: number;
}

const CHART_FILES: Record<ChartKind, string> = {
    gantt: 'gantt_cycles.html',
    speed: 'speed_time.html',
    map: 'map_cycles.html'
};

const encoder = new TextEncoder();

const zipFiles = (files: fflate.Zippable): Promise<Uint8Array> => {
    return new Promise<Uint8Array>((resolve, reject) => {
        fflate.zip(files, { level: 9 }, (err, data) => {
            if (err) {
                reject(new Error('Zip compression failed: ' + err.message));
                return;
            }
            resolve(data);
        });
    });
};

/**
 * Builds the report artifacts in memory, keyed by file name without the prefix.
 */
export const buildReportFiles = (
    result: AnalyzeResult,
    config: AnalysisConfig,
    context: ReportContext
): Map<string, Uint8Array> => {
    const files = new Map<string, Uint8Array>();
    files.set('cycle_summary.csv', encoder.encode(formatCycleSummaryCsv(result.summary.rows)));
    files.set('points_with_cycles.csv', encoder.encode(formatAnnotatedPointsCsv(result.summary.points)));

    const charts = renderCycleCharts(result.summary, config.zones);
    if (charts.length === 0) {
        debugLog.info('No cycles found, skipping charts');
    }
    charts.forEach(chart => {
        files.set(CHART_FILES[chart.kind], encoder.encode(chart.html));
    });

    const metadata = buildReportMetadata(result, config, context);
    const validation = validateReportMetadata(metadata);
    validation.errors.forEach(e => debugLog.error(`Report check: ${e}`));
    validation.warnings.forEach(w => debugLog.warn(`Report check: ${w}`));

    metadata.files = [...files.entries()].map(([name, data]) => ({ name, bytes: data.byteLength }));
    files.set('report.json', encoder.encode(JSON.stringify({ ...metadata, validation }, null, 2) + '\n'));

    return files;
};

/**
 * Writes every artifact under the output prefix, plus an optional zip bundle of all of them.
 */
export const writeReport = async (
    result: AnalyzeResult,
    config: AnalysisConfig,
    options: ReportOptions
): Promise<WrittenFile[]> => {
    const files = buildReportFiles(result, config, options);
    const target = (name: string) => `${options.outputPrefix}${name}`;

    const dir = path.dirname(target('x'));
    await mkdir(dir, { recursive: true });

    const written: WrittenFile[] = [];
    for (const [name, data] of files) {
        await writeFile(target(name), data);
        written.push({ name, path: target(name), bytes: data.byteLength });
    }

    if (options.zip) {
        const zippable: fflate.Zippable = {};
        files.forEach((data, name) => {
            zippable[name] = data;
        });
        const archive = await zipFiles(zippable);
        await writeFile(target('report.zip'), archive);
        written.push({ name: 'report.zip', path: target('report.zip'), bytes: archive.byteLength });
    }

    written.forEach(file => debugLog.info(`Wrote ${file.path} (${file.bytes} bytes)`));
    return written;
};
