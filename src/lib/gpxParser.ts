import { DOMParser } from '@xmldom/xmldom';
import { PointRecord } from '@/core/types';
import { MalformedTrackError } from '@/core/errors';
import { debugLog } from './debugLog';

export interface GpxParseResult {
    name: string | null;
    points: PointRecord[];
    /** Points skipped for missing or invalid position or time. */
    skipped: number;
}

const childText = (parent: Element, tagName: string): string | null => {
    const child = parent.getElementsByTagName(tagName).item(0);
    const text = child?.textContent?.trim();
    return text ? text : null;
};

/**
 * Decodes track points (or route points when a file has no track) in document order.
 */
export const parseGpx = (xml: string): GpxParseResult => {
    const parseErrors: string[] = [];
    const parser = new DOMParser({
        errorHandler: {
            warning: () => undefined,
            error: (msg: string) => { parseErrors.push(msg); },
            fatalError: (msg: string) => { parseErrors.push(msg); }
        }
    });

    let doc: Document;
    try {
        doc = parser.parseFromString(xml, 'text/xml');
    } catch (error) {
        throw new MalformedTrackError(`GPX parsing failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (parseErrors.length > 0 || !doc.documentElement) {
        throw new MalformedTrackError(`GPX parsing failed: ${parseErrors[0] ?? 'no root element'}`);
    }

    let nodes = doc.getElementsByTagName('trkpt');
    if (nodes.length === 0) {
        nodes = doc.getElementsByTagName('rtept');
    }

    const points: PointRecord[] = [];
    let skipped = 0;

    for (let i = 0; i < nodes.length; i++) {
        const pt = nodes.item(i);
        if (!pt) continue;

        const lat = parseFloat(pt.getAttribute('lat') ?? '');
        const lon = parseFloat(pt.getAttribute('lon') ?? '');
        const timeText = childText(pt, 'time');
        const timestamp = timeText ? Date.parse(timeText) : Number.NaN;

        if (!Number.isFinite(lat) || !Number.isFinite(lon) || !Number.isFinite(timestamp)) {
            skipped += 1;
            debugLog.warn(`Skipping GPX point ${i + 1}: lat=${pt.getAttribute('lat')}, lon=${pt.getAttribute('lon')}, time=${timeText}`);
            continue;
        }

        const record: PointRecord = { timestamp, latitude: lat, longitude: lon };
        const eleText = childText(pt, 'ele');
        const elevation = eleText !== null ? parseFloat(eleText) : Number.NaN;
        if (Number.isFinite(elevation)) {
            record.elevation = elevation;
        }
        points.push(record);
    }

    const nameNode = doc.getElementsByTagName('name').item(0);
    const name = nameNode?.textContent?.trim() || null;

    return { name, points, skipped };
};
