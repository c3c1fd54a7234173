import { MsEpoch } from './types';

export class CycleAnalysisError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The track cannot be analyzed: a point is unusable, or too few points survive normalization.
 */
export class MalformedTrackError extends CycleAnalysisError {
    readonly index?: number;
    readonly timestamp?: MsEpoch;

    constructor(message: string, context: { index?: number; timestamp?: MsEpoch } = {}) {
        const where: string[] = [];
        if (context.index !== undefined) where.push(`index=${context.index}`);
        if (context.timestamp !== undefined && Number.isFinite(context.timestamp)) {
            where.push(`time=${new Date(context.timestamp).toISOString()}`);
        }
        super(where.length > 0 ? `${message} (${where.join(', ')})` : message);
        this.index = context.index;
        this.timestamp = context.timestamp;
    }
}

export class ConfigurationError extends CycleAnalysisError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

/**
 * Raised only when a caller asks for at least one cycle; zero cycles is otherwise a valid result.
 */
export class EmptyCycleSetError extends CycleAnalysisError {
    constructor(message: string = 'No cycles detected in track') {
        super(message);
    }
}
