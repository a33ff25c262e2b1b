// src/types/audit/options.types.ts
import { DeclarableColumnType } from './profile.types';

export interface ProfilingOptions {
    /** Minimum share of parseable values for a type to be assigned. */
    minMatchRatio: number;
    /** Distinct values tracked exactly before switching to an approximation. */
    cardinalityCap: number;
    /** Number of most frequent values reported for categorical and boolean columns. */
    topK: number;
    /** Capacity of the bounded frequency counter backing `topK`. */
    frequencyCapacity: number;
    /** Equal-width histogram buckets; must be even. */
    histogramBuckets: number;
    quantileSampleSize: number;
    quantiles: number[];
    /** Non-null values per column used for type inference; 0 means every value. */
    typeSampleSize: number;
    /** Rows between two cancellation checks. */
    batchSize: number;
    nullTokens: string[];
    declaredTypes: Record<string, DeclarableColumnType>;
}

export interface DriftThreshold {
    warn: number;
    critical: number;
}

export interface DriftOptions {
    thresholds: {
        mean: DriftThreshold;
        stdev: DriftThreshold;
        null_rate: DriftThreshold;
        categorical: DriftThreshold;
    };
    epsilon: number;
    allowColumnDrop: boolean;
    allowTypeChange: boolean;
}

export type GuardErrorMode = 'error' | 'skip';

export interface EvaluationOptions {
    guardErrorMode: GuardErrorMode;
    concurrency: number;
}

export interface ExplanationOptions {
    /** Relative breach size under which a failure is attributed to an overly strict threshold. */
    toleranceBand: number;
    epsilon: number;
}
