import { DroppedPoint, KinematicPoint, NormalizedTrack, PointRecord, TrackGap } from './types';
import { MalformedTrackError } from './errors';
import { computeStreamStats } from './stats';
import { bearingDelta, haversineDistance, initialBearing } from '@/utils/geo';

export interface NormalizeOptions {
    maxGapSec: number;
}

const assertUsable = (point: PointRecord, index: number) => {
    if (!Number.isFinite(point.timestamp)) {
        throw new MalformedTrackError('Point has no valid timestamp', { index });
    }
    if (!Number.isFinite(point.latitude) || point.latitude < -90 || point.latitude > 90) {
        throw new MalformedTrackError(`Latitude ${point.latitude} out of range`, { index, timestamp: point.timestamp });
    }
    if (!Number.isFinite(point.longitude) || point.longitude < -180 || point.longitude > 180) {
        throw new MalformedTrackError(`Longitude ${point.longitude} out of range`, { index, timestamp: point.timestamp });
    }
};

/**
 * Turns raw fixes into a strictly time-ordered sequence with per-point kinematics.
 * Points that do not advance time are dropped, never reordered.
 */
export const normalizeTrack = (records: PointRecord[], options: NormalizeOptions): NormalizedTrack => {
    const dropped: DroppedPoint[] = [];
    const kept: Array<{ record: PointRecord; sourceIndex: number }> = [];

    records.forEach((record, sourceIndex) => {
        assertUsable(record, sourceIndex);
        const last = kept[kept.length - 1];
        if (last && record.timestamp <= last.record.timestamp) {
            dropped.push({
                sourceIndex,
                timestamp: record.timestamp,
                reason: record.timestamp === last.record.timestamp ? 'duplicate_timestamp' : 'out_of_order'
            });
            return;
        }
        kept.push({ record, sourceIndex });
    });

    if (kept.length < 2) {
        const lastInput = records[records.length - 1];
        throw new MalformedTrackError(
            `Track needs at least 2 usable points, found ${kept.length} of ${records.length}`,
            lastInput ? { index: records.length - 1, timestamp: lastInput.timestamp } : {}
        );
    }

    const maxGapMs = options.maxGapSec * 1000;
    const startTime = kept[0].record.timestamp;
    const gaps: TrackGap[] = [];
    const points: KinematicPoint[] = [];
    let cumulativeDistanceM = 0;
    let lastBearing: number | null = null;

    kept.forEach(({ record, sourceIndex }, index) => {
        const prev = index > 0 ? kept[index - 1].record : null;
        let distanceFromPrevM = 0;
        let speedMps = 0;
        let bearingDeg: number | null = null;
        let bearingChangeDeg: number | null = null;

        if (prev) {
            const dtMs = record.timestamp - prev.timestamp;
            distanceFromPrevM = haversineDistance(prev.latitude, prev.longitude, record.latitude, record.longitude);
            speedMps = distanceFromPrevM / (dtMs / 1000);
            if (dtMs > maxGapMs) {
                gaps.push({ afterIndex: index - 1, gapMs: dtMs });
            }
            if (distanceFromPrevM > 0) {
                bearingDeg = initialBearing(prev.latitude, prev.longitude, record.latitude, record.longitude);
                if (lastBearing !== null) {
                    bearingChangeDeg = bearingDelta(lastBearing, bearingDeg);
                }
                lastBearing = bearingDeg;
            }
        }

        cumulativeDistanceM += distanceFromPrevM;
        points.push({
            timestamp: record.timestamp,
            latitude: record.latitude,
            longitude: record.longitude,
            elevation: record.elevation,
            index,
            sourceIndex,
            elapsedMs: record.timestamp - startTime,
            distanceFromPrevM,
            cumulativeDistanceM,
            speedMps,
            bearingDeg,
            bearingChangeDeg
        });
    });

    return {
        points,
        dropped,
        gaps,
        sampling: computeStreamStats(points.map(p => p.timestamp))
    };
};

/**
 * Distance traveled between two indices, summing the per-step distances inside the range.
 */
export const pathDistance = (points: KinematicPoint[], startIndex: number, endIndex: number): number => {
    let total = 0;
    for (let i = startIndex + 1; i <= endIndex; i++) {
        total += points[i].distanceFromPrevM;
    }
    return total;
};
