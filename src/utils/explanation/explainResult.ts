// src/utils/explanation/explainResult.ts
import { Explanation, ExplanationOptions, RootCause, RuleOperator, ValidationResult } from '../../types';
import { describeSubject, formatNumber, formatObserved, formatThreshold, isRangeThreshold } from '../rules/formatting.utils';

const OPERATOR_PHRASES: Readonly<Record<RuleOperator, string>> = {
    le: 'exceeds allowed ≤',
    lt: 'exceeds allowed <',
    ge: 'is below required ≥',
    gt: 'is below required >',
    eq: 'expected =',
    ne: 'must differ from ≠',
    in_range: 'outside allowed range ',
};

/**
 * The bound a numeric observation was compared against: the threshold itself,
 * or the nearer edge of an `in_range` interval.
 */
export const breachedBound = (result: ValidationResult): number | null => {
    const { observedValue } = result;
    const { threshold } = result.rule;
    if (typeof observedValue !== 'number') return null;
    if (isRangeThreshold(threshold)) {
        return observedValue < threshold[0] ? threshold[0] : threshold[1];
    }
    return typeof threshold === 'number' ? threshold : null;
};

export const classifyRootCause = (result: ValidationResult, options: ExplanationOptions): RootCause => {
    if (result.verdict === 'Error' || result.rule.metric === 'type') {
        return 'SchemaMismatch';
    }
    const bound = breachedBound(result);
    if (bound === null || result.rule.operator === 'ne' || typeof result.observedValue !== 'number') {
        return 'DataQuality';
    }
    const breach = Math.abs(result.observedValue - bound) / Math.max(Math.abs(bound), options.epsilon);
    return breach <= options.toleranceBand ? 'ThresholdTooStrict' : 'DataQuality';
};

const summarize = (result: ValidationResult): string => {
    if (result.verdict === 'Error') {
        return result.message;
    }
    const { rule } = result;
    return `${describeSubject(rule)} is ${formatObserved(result.observedValue)}, `
        + `${OPERATOR_PHRASES[rule.operator]}${formatThreshold(rule.threshold)}`;
};

const suggestFix = (result: ValidationResult, rootCause: RootCause): string => {
    const { rule } = result;
    const describeTarget = (column: string | undefined): string => column === undefined ? 'the dataset' : `column '${column}'`;
    const target = describeTarget(rule.column);

    if (result.verdict === 'Error') {
        const failing = result.failedGuard ?? rule;
        const failingTarget = describeTarget(failing.column);
        const owner = result.failedGuard ? "the rule's guard" : 'the rule';
        if (result.reason === 'SCHEMA_ERROR') {
            return `Restore ${failingTarget} in the source or update ${owner} to reference an existing column.`;
        }
        if (result.reason === 'TYPE_MISMATCH') {
            return `Metric '${failing.metric}' needs numeric values in ${failingTarget}; clean non-numeric values or declare the column type.`;
        }
    }
    if (rule.metric === 'type') {
        return `Make ${target} consistently ${formatThreshold(rule.threshold)} or update the expected type.`;
    }
    if (result.observedValue === null) {
        return `No values to compute ${rule.metric} for ${target}; check that the source populates it.`;
    }
    const observed = formatObserved(result.observedValue);
    const threshold = formatThreshold(rule.threshold);
    if (rootCause === 'ThresholdTooStrict') {
        const bound = breachedBound(result);
        const boundText = bound === null ? threshold : formatNumber(bound);
        return `Observed ${observed} is within tolerance of ${boundText}; consider relaxing the threshold to admit ${observed}.`;
    }
    if (rule.relativeTo === 'baseline') {
        return rule.metric === 'null_rate'
            ? `Investigate new missing values in ${target}: null rate change ${observed} since the baseline must satisfy ${rule.operator} ${threshold}.`
            : `Investigate the change in ${rule.metric} of ${target} since the baseline: observed ${observed} must satisfy ${rule.operator} ${threshold}.`;
    }
    if (rule.metric === 'null_rate') {
        return `Investigate missing values in ${target}: null rate ${observed} must satisfy ${rule.operator} ${threshold}.`;
    }
    return `Investigate ${rule.metric} of ${target}: observed ${observed} must satisfy ${rule.operator} ${threshold}.`;
};

/** Builds an explanation for a Fail or Error verdict; other verdicts yield `null`. */
export const explainResult = (result: ValidationResult, options: ExplanationOptions): Explanation | null => {
    if (result.verdict !== 'Fail' && result.verdict !== 'Error') {
        return null;
    }
    const rootCause = classifyRootCause(result, options);
    return {
        result,
        rootCause,
        severity: result.rule.severity,
        summary: summarize(result),
        suggestedFix: suggestFix(result, rootCause),
    };
};
