// src/types/audit/profile.types.ts

export const COLUMN_TYPES = ['Numeric', 'Categorical', 'Boolean', 'DateTime', 'Unknown'] as const;
export type ColumnType = typeof COLUMN_TYPES[number];

/** Types a caller may declare for a column; `Unknown` is only ever inferred. */
export type DeclarableColumnType = Exclude<ColumnType, 'Unknown'>;

export interface DistinctCount {
    value: number;
    /** True once the cardinality cap was exceeded and the value comes from a HyperLogLog sketch. */
    approximate: boolean;
}

export interface QuantileValue {
    p: number;
    value: number;
}

export interface HistogramBucket {
    /** Inclusive lower edge. */
    lower: number;
    /** Exclusive upper edge. */
    upper: number;
    count: number;
}

/**
 * Numeric aggregates. `null` marks a statistic that is undefined because the
 * column holds no numeric value at all.
 */
export interface NumericSummary {
    min: number | null;
    max: number | null;
    mean: number | null;
    stdev: number | null;
    quantiles: QuantileValue[];
    /** False when the bounded quantile sample had to be decimated. */
    quantilesExact: boolean;
    histogram: HistogramBucket[];
}

export interface ValueFrequency {
    value: string;
    count: number;
}

export interface TextSummary {
    minLength: number | null;
    maxLength: number | null;
}

export interface TemporalSummary {
    earliest: string | null;
    latest: string | null;
}

export interface ColumnProfile {
    name: string;
    inferredType: ColumnType;
    declaredType?: DeclarableColumnType;
    rowCount: number;
    nullCount: number;
    nonNullCount: number;
    nullRate: number;
    distinctCount: DistinctCount;
    emptyStringCount: number;
    malformedValueCount: number;
    typeConflict: boolean;
    numeric?: NumericSummary;
    topValues?: ValueFrequency[];
    text?: TextSummary;
    temporal?: TemporalSummary;
}

export interface DatasetStats {
    columnCount: number;
    malformedRowCount: number;
    malformedValueCount: number;
    missingCellCount: number;
    /** Share of non-null cells, 1 for a dataset without cells. */
    completeness: number;
}

export interface DatasetProfile {
    name: string;
    rowCount: number;
    columns: ColumnProfile[];
    schemaFingerprint: string;
    stats: DatasetStats;
}
