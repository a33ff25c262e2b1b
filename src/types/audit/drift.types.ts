// src/types/audit/drift.types.ts
import { ColumnType } from './profile.types';

export type DriftMetric = 'mean' | 'stdev' | 'null_rate';
export type DriftSeverity = 'DRIFT_WARNING' | 'DRIFT_CRITICAL';

export interface TypeChange {
    column: string;
    oldType: ColumnType;
    newType: ColumnType;
}

export interface StatDelta {
    column: string;
    metric: DriftMetric;
    baselineValue: number;
    candidateValue: number;
    relativeDelta: number;
    severity: DriftSeverity;
}

export interface CategoricalShift {
    column: string;
    newCategories: string[];
    missingCategories: string[];
    /** Total-variation distance between the tracked category distributions (0..1). */
    distance: number;
    severity: DriftSeverity;
}

export interface DriftReport {
    addedColumns: string[];
    removedColumns: string[];
    typeChanges: TypeChange[];
    statDeltas: StatDelta[];
    categoricalShifts: CategoricalShift[];
    fingerprintsMatch: boolean;
    /** Schema changes the configured compatibility policy does not allow. */
    breaking: boolean;
}
