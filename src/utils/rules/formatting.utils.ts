// src/utils/rules/formatting.utils.ts
import { ObservedValue, RuleCondition, RuleOperator, RuleThreshold } from '../../types';

/**
 * Integers print as-is; fractions keep their own decimals, padded to two and
 * capped at six, so `0.1` reads `0.10` next to an observed `0.25`.
 */
export const formatNumber = (value: number): string => {
    if (Number.isInteger(value)) return String(value);
    const text = String(value);
    if (text.includes('e')) return text;
    const decimals = text.length - text.indexOf('.') - 1;
    return value.toFixed(Math.min(Math.max(2, decimals), 6));
};

export const formatObserved = (value: ObservedValue): string => {
    if (value === null) return 'undefined';
    return typeof value === 'number' ? formatNumber(value) : value;
};

export const isRangeThreshold = (threshold: RuleThreshold): threshold is readonly [number, number] =>
    typeof threshold === 'object';

export const formatThreshold = (threshold: RuleThreshold): string => {
    if (isRangeThreshold(threshold)) {
        return `[${formatNumber(threshold[0])}, ${formatNumber(threshold[1])}]`;
    }
    return typeof threshold === 'number' ? formatNumber(threshold) : threshold;
};

export const OPERATOR_SYMBOLS: Readonly<Record<RuleOperator, string>> = {
    eq: '=',
    ne: '≠',
    lt: '<',
    le: '≤',
    gt: '>',
    ge: '≥',
    in_range: '∈',
};

/** `null_rate for 'age'`, `null_rate change for 'age'`, or just the metric for dataset-level metrics. */
export const describeSubject = (condition: Pick<RuleCondition, 'metric' | 'column' | 'relativeTo'>): string => {
    const metric = condition.relativeTo === 'baseline' ? `${condition.metric} change` : condition.metric;
    return condition.column === undefined ? metric : `${metric} for '${condition.column}'`;
};

/** `≤0.10`, `=Numeric`, `∈[1, 5]` */
export const describeExpectation = (condition: Pick<RuleCondition, 'operator' | 'threshold'>): string =>
    `${OPERATOR_SYMBOLS[condition.operator]}${formatThreshold(condition.threshold)}`;
