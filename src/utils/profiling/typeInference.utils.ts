// src/utils/profiling/typeInference.utils.ts
import { ColumnType, DeclarableColumnType } from '../../types';

export interface TypeMatchCounts {
    nonNull: number;
    numeric: number;
    boolean: number;
    date: number;
}

export interface TypeDecision {
    type: ColumnType;
    typeConflict: boolean;
}

export const emptyTypeMatchCounts = (): TypeMatchCounts => ({ nonNull: 0, numeric: 0, boolean: 0, date: 0 });

/** Number of values that parse under `type`; every non-null value is a valid Categorical. */
export const matchesForType = (type: ColumnType, counts: TypeMatchCounts): number => {
    switch (type) {
        case 'Numeric':
            return counts.numeric;
        case 'Boolean':
            return counts.boolean;
        case 'DateTime':
            return counts.date;
        case 'Categorical':
            return counts.nonNull;
        case 'Unknown':
            return 0;
    }
};

/**
 * Majority classification. Boolean is tested before Numeric so that a column of
 * `yes`/`no` is not demoted, and Numeric before DateTime. Below every ratio the
 * column is Categorical, flagged as conflicting when numeric-looking values were seen.
 */
export const inferColumnType = (counts: TypeMatchCounts, minMatchRatio: number): TypeDecision => {
    if (counts.nonNull === 0) {
        return { type: 'Unknown', typeConflict: false };
    }
    const ratio = (matches: number): number => matches / counts.nonNull;

    if (ratio(counts.boolean) >= minMatchRatio) return { type: 'Boolean', typeConflict: false };
    if (ratio(counts.numeric) >= minMatchRatio) return { type: 'Numeric', typeConflict: false };
    if (ratio(counts.date) >= minMatchRatio) return { type: 'DateTime', typeConflict: false };
    return { type: 'Categorical', typeConflict: counts.numeric > 0 };
};

export const resolveDeclaredType = (
    declared: DeclarableColumnType,
    counts: TypeMatchCounts,
    minMatchRatio: number
): TypeDecision => {
    if (counts.nonNull === 0) {
        return { type: declared, typeConflict: false };
    }
    const ratio = matchesForType(declared, counts) / counts.nonNull;
    return { type: declared, typeConflict: ratio < minMatchRatio };
};
