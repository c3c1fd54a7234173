export type MsEpoch = number;

export interface PointRecord {
    timestamp: MsEpoch;
    latitude: number;
    longitude: number;
    elevation?: number;
}

export interface KinematicPoint extends PointRecord {
    /** Index into the normalized sequence. */
    index: number;
    /** Index of the point in the raw input, before drops. */
    sourceIndex: number;
    elapsedMs: number;
    distanceFromPrevM: number;
    cumulativeDistanceM: number;
    speedMps: number;
    bearingDeg: number | null;
    bearingChangeDeg: number | null;
}

export type DropReason = 'duplicate_timestamp' | 'out_of_order';

export interface DroppedPoint {
    sourceIndex: number;
    timestamp: MsEpoch;
    reason: DropReason;
}

export interface TrackGap {
    afterIndex: number;
    gapMs: number;
}

export interface StreamStats {
    samplesCount: number;
    observedHz: number;
    dtMedianMs: number | null;
    dtP95Ms: number | null;
}

export interface NormalizedTrack {
    points: KinematicPoint[];
    dropped: DroppedPoint[];
    gaps: TrackGap[];
    sampling: StreamStats;
}

export type MotionLabel = 'STATIONARY' | 'MOVING';

export type SegmenterPhase = 'IDLE' | 'IN_CYCLE' | 'TERMINAL';

export interface ZoneConfig {
    lat: number;
    lon: number;
    radiusM: number;
}

export type ZoneName = 'load' | 'dump';

export interface PauseInterval {
    startIndex: number;
    endIndex: number;
}

export interface CandidateCycle {
    id: number;
    startIndex: number;
    endIndex: number;
    startTime: MsEpoch;
    endTime: MsEpoch;
    durationMs: number;
    distanceM: number;
    pauses: PauseInterval[];
    truncated: boolean;
}

/** A candidate that survived the post-filter; ids are renumbered from 1. */
export type Cycle = CandidateCycle;

export type RejectReason = 'too_short' | 'too_little_distance';

export interface RejectedCycle {
    candidate: CandidateCycle;
    reason: RejectReason;
}

export interface CycleFilterResult {
    cycles: Cycle[];
    rejected: RejectedCycle[];
}

export interface AnnotatedPoint {
    point: KinematicPoint;
    motion: MotionLabel;
    cycleId: number | null;
    phase: number | null;
    zone: ZoneName | null;
}

export interface CycleSummaryRow {
    cycleId: number;
    startTime: MsEpoch;
    endTime: MsEpoch;
    durationSeconds: number;
    durationMinutes: number;
    distanceMeters: number;
    averageSpeedMps: number;
    maxSpeedMps: number;
    pointCount: number;
    pauseCount: number;
    pausedSeconds: number;
    truncated: boolean;
    visitedLoadZone: boolean | null;
    visitedDumpZone: boolean | null;
}

export interface AnnotatedPointRow {
    timestamp: MsEpoch;
    latitude: number;
    longitude: number;
    elevation: number | null;
    speedMps: number;
    speedKmh: number;
    cumulativeDistanceM: number;
    motion: MotionLabel;
    cycleId: number | null;
    phase: number | null;
    zone: ZoneName | null;
}

export interface TrackAggregates {
    totalCycles: number;
    meanCycleSeconds: number | null;
    medianCycleSeconds: number | null;
    totalCycleDistanceMeters: number;
    trackDurationSeconds: number;
    cycleSeconds: number;
    idleSeconds: number;
    utilization: number;
}

export interface CycleSummary {
    rows: CycleSummaryRow[];
    points: AnnotatedPointRow[];
    aggregates: TrackAggregates;
}

export interface AnalyzeResult {
    track: NormalizedTrack;
    labels: MotionLabel[];
    candidates: CandidateCycle[];
    cycles: Cycle[];
    rejected: RejectedCycle[];
    annotated: AnnotatedPoint[];
    summary: CycleSummary;
}

export interface CycleEngine {
    ingest(point: PointRecord): void;
    finalize(): AnalyzeResult;
    reset(): void;
}
