// src/utils/drift/diffProfiles.ts
import {
    CategoricalShift,
    ColumnProfile,
    DatasetProfile,
    DriftMetric,
    DriftOptions,
    DriftReport,
    DriftSeverity,
    DriftThreshold,
    StatDelta,
    TypeChange,
} from '../../types';

export const relativeDelta = (baseline: number, candidate: number, epsilon: number): number =>
    Math.abs(candidate - baseline) / Math.max(Math.abs(baseline), epsilon);

export const classifyDrift = (delta: number, threshold: DriftThreshold): DriftSeverity | null => {
    if (delta >= threshold.critical) return 'DRIFT_CRITICAL';
    if (delta >= threshold.warn) return 'DRIFT_WARNING';
    return null;
};

const metricValue = (column: ColumnProfile, metric: DriftMetric): number | null => {
    switch (metric) {
        case 'mean':
            return column.numeric?.mean ?? null;
        case 'stdev':
            return column.numeric?.stdev ?? null;
        case 'null_rate':
            return column.nullRate;
    }
};

const statDelta = (
    baseline: ColumnProfile,
    candidate: ColumnProfile,
    metric: DriftMetric,
    options: DriftOptions
): StatDelta | null => {
    const baselineValue = metricValue(baseline, metric);
    const candidateValue = metricValue(candidate, metric);
    if (baselineValue === null || candidateValue === null) return null;

    const delta = relativeDelta(baselineValue, candidateValue, options.epsilon);
    if (delta === 0) return null;
    const severity = classifyDrift(delta, options.thresholds[metric]);
    if (!severity) return null;

    return { column: baseline.name, metric, baselineValue, candidateValue, relativeDelta: delta, severity };
};

const isCategoryTracked = (column: ColumnProfile): boolean =>
    column.inferredType === 'Categorical' || column.inferredType === 'Boolean';

/**
 * Compares the tracked top values of two categorical columns: which categories
 * appeared or disappeared, and the total-variation distance between their
 * frequencies normalized by each side's non-null count.
 */
export const categoricalShift = (
    baseline: ColumnProfile,
    candidate: ColumnProfile,
    options: DriftOptions
): CategoricalShift | null => {
    const share = (column: ColumnProfile): Map<string, number> =>
        new Map((column.topValues ?? []).map(entry => [
            entry.value,
            column.nonNullCount === 0 ? 0 : entry.count / column.nonNullCount,
        ]));
    const before = share(baseline);
    const after = share(candidate);

    const newCategories = [...after.keys()].filter(value => !before.has(value));
    const missingCategories = [...before.keys()].filter(value => !after.has(value));

    let sum = 0;
    for (const value of new Set([...before.keys(), ...after.keys()])) {
        sum += Math.abs((before.get(value) ?? 0) - (after.get(value) ?? 0));
    }
    const distance = sum / 2;

    const severity = classifyDrift(distance, options.thresholds.categorical)
        ?? (newCategories.length > 0 || missingCategories.length > 0 ? 'DRIFT_WARNING' : null);
    if (!severity) return null;

    return { column: baseline.name, newCategories, missingCategories, distance, severity };
};

/**
 * Deterministic diff of two profiles. Column lists keep first-seen order: added
 * columns in candidate order, removed and common columns in baseline order.
 */
export const diffProfiles = (baseline: DatasetProfile, candidate: DatasetProfile, options: DriftOptions): DriftReport => {
    const candidateByName = new Map(candidate.columns.map(column => [column.name, column]));
    const baselineNames = new Set(baseline.columns.map(column => column.name));

    const addedColumns = candidate.columns.filter(column => !baselineNames.has(column.name)).map(column => column.name);
    const removedColumns = baseline.columns.filter(column => !candidateByName.has(column.name)).map(column => column.name);

    const typeChanges: TypeChange[] = [];
    const statDeltas: StatDelta[] = [];
    const categoricalShifts: CategoricalShift[] = [];

    for (const before of baseline.columns) {
        const after = candidateByName.get(before.name);
        if (!after) continue;

        if (before.inferredType !== after.inferredType) {
            typeChanges.push({ column: before.name, oldType: before.inferredType, newType: after.inferredType });
        }

        const metrics: DriftMetric[] = before.inferredType === 'Numeric' && after.inferredType === 'Numeric'
            ? ['mean', 'stdev', 'null_rate']
            : ['null_rate'];
        for (const metric of metrics) {
            const delta = statDelta(before, after, metric, options);
            if (delta) statDeltas.push(delta);
        }

        if (isCategoryTracked(before) && before.inferredType === after.inferredType) {
            const shift = categoricalShift(before, after, options);
            if (shift) categoricalShifts.push(shift);
        }
    }

    const breaking = (removedColumns.length > 0 && !options.allowColumnDrop)
        || (typeChanges.length > 0 && !options.allowTypeChange);

    return {
        addedColumns,
        removedColumns,
        typeChanges,
        statDeltas,
        categoricalShifts,
        fingerprintsMatch: baseline.schemaFingerprint === candidate.schemaFingerprint,
        breaking,
    };
};
