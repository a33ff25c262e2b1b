// src/utils/rules/evaluateRule.ts
import {
    ColumnType,
    DatasetProfile,
    ErrorReason,
    EvaluationOptions,
    NUMERIC_ONLY_METRICS,
    ObservedValue,
    Rule,
    RuleCondition,
    SkipReason,
    ValidationResult,
} from '../../types';
import { compareObserved } from './comparison.utils';
import { describeExpectation, describeSubject, formatObserved } from './formatting.utils';

export type ConditionOutcome =
    | { verdict: 'Pass' | 'Fail'; observedValue: ObservedValue; message: string }
    | { verdict: 'Error'; observedValue: null; reason: ErrorReason; message: string; condition: RuleCondition }
    | { verdict: 'Skipped'; observedValue: null; reason: SkipReason; message: string };

type MetricResolution =
    | { ok: true; value: number | ColumnType | null }
    | { ok: false; reason: ErrorReason; message: string };

export const resolveMetric = (profile: DatasetProfile, condition: RuleCondition): MetricResolution => {
    if (condition.metric === 'row_count' && condition.column === undefined) {
        return { ok: true, value: profile.rowCount };
    }
    if (condition.column === undefined) {
        return { ok: false, reason: 'SCHEMA_ERROR', message: `Metric '${condition.metric}' requires a column` };
    }
    const column = profile.columns.find(candidate => candidate.name === condition.column);
    if (!column) {
        return { ok: false, reason: 'SCHEMA_ERROR', message: `Column '${condition.column}' not found in profile '${profile.name}'` };
    }
    if (NUMERIC_ONLY_METRICS.includes(condition.metric) && column.inferredType !== 'Numeric') {
        return {
            ok: false,
            reason: 'TYPE_MISMATCH',
            message: `Metric '${condition.metric}' requires a Numeric column; '${column.name}' is ${column.inferredType}`,
        };
    }

    switch (condition.metric) {
        case 'mean':
            return { ok: true, value: column.numeric?.mean ?? null };
        case 'stdev':
            return { ok: true, value: column.numeric?.stdev ?? null };
        case 'min':
            return { ok: true, value: column.numeric?.min ?? null };
        case 'max':
            return { ok: true, value: column.numeric?.max ?? null };
        case 'null_rate':
            return { ok: true, value: column.nullRate };
        case 'distinct_count':
            return { ok: true, value: column.distinctCount.value };
        case 'row_count':
            return { ok: true, value: column.rowCount };
        case 'type':
            return { ok: true, value: column.inferredType };
    }
};

/**
 * Metric value for `condition`; with `relativeTo: 'baseline'` the change since
 * `baseline`, undefined when either side is not numeric.
 */
const resolveComparedMetric = (
    profile: DatasetProfile,
    condition: RuleCondition,
    baseline: DatasetProfile
): MetricResolution => {
    const current = resolveMetric(profile, condition);
    if (condition.relativeTo !== 'baseline' || !current.ok) {
        return current;
    }
    const previous = resolveMetric(baseline, condition);
    if (!previous.ok) {
        return previous;
    }
    if (typeof current.value !== 'number' || typeof previous.value !== 'number') {
        return { ok: true, value: null };
    }
    return { ok: true, value: current.value - previous.value };
};

/**
 * Evaluates a condition, its guard first. A guard that does not hold skips the
 * condition; a guard that errors either propagates the error or skips,
 * depending on `guardErrorMode`.
 */
export const evaluateCondition = (
    profile: DatasetProfile,
    condition: RuleCondition,
    options: EvaluationOptions,
    baseline?: DatasetProfile
): ConditionOutcome => {
    if (condition.guard) {
        const guard = evaluateCondition(profile, condition.guard, options, baseline);
        if (guard.verdict === 'Fail') {
            return { verdict: 'Skipped', observedValue: null, reason: 'GUARD_NOT_MET', message: `Guard not met: ${guard.message}` };
        }
        if (guard.verdict === 'Skipped') {
            return { verdict: 'Skipped', observedValue: null, reason: guard.reason, message: guard.message };
        }
        if (guard.verdict === 'Error') {
            return options.guardErrorMode === 'skip'
                ? { verdict: 'Skipped', observedValue: null, reason: 'GUARD_ERROR', message: `Guard error: ${guard.message}` }
                : { verdict: 'Error', observedValue: null, reason: guard.reason, message: `Guard error: ${guard.message}`, condition: guard.condition };
        }
    }

    const subject = describeSubject(condition);
    if (condition.relativeTo === 'baseline' && !baseline) {
        return { verdict: 'Skipped', observedValue: null, reason: 'NO_BASELINE', message: `${subject} needs a baseline profile` };
    }

    const resolved = baseline ? resolveComparedMetric(profile, condition, baseline) : resolveMetric(profile, condition);
    if (!resolved.ok) {
        return { verdict: 'Error', observedValue: null, reason: resolved.reason, message: resolved.message, condition };
    }

    const expectation = describeExpectation(condition);
    if (resolved.value === null) {
        return { verdict: 'Fail', observedValue: null, message: `${subject} is undefined, expected ${expectation}` };
    }
    const holds = compareObserved(resolved.value, condition.operator, condition.threshold);
    return {
        verdict: holds ? 'Pass' : 'Fail',
        observedValue: resolved.value,
        message: `${subject} is ${formatObserved(resolved.value)}, expected ${expectation}`,
    };
};

export const evaluateRule = (
    profile: DatasetProfile,
    rule: Rule,
    options: EvaluationOptions,
    baseline?: DatasetProfile
): ValidationResult => {
    const outcome = evaluateCondition(profile, rule, options, baseline);
    const result: ValidationResult = {
        rule,
        verdict: outcome.verdict,
        observedValue: outcome.observedValue,
        message: outcome.message,
    };
    if (outcome.verdict === 'Error' || outcome.verdict === 'Skipped') {
        result.reason = outcome.reason;
    }
    if (outcome.verdict === 'Error' && outcome.condition !== rule) {
        result.failedGuard = outcome.condition;
    }
    return result;
};
