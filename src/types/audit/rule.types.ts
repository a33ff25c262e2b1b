// src/types/audit/rule.types.ts
import { ColumnType } from './profile.types';

export const RULE_METRICS = ['mean', 'stdev', 'min', 'max', 'null_rate', 'distinct_count', 'row_count', 'type'] as const;
export type RuleMetric = typeof RULE_METRICS[number];

/** Metrics that only exist on Numeric columns. */
export const NUMERIC_ONLY_METRICS: readonly RuleMetric[] = ['mean', 'stdev', 'min', 'max'];

export const RULE_OPERATORS = ['eq', 'ne', 'lt', 'le', 'gt', 'ge', 'in_range'] as const;
export type RuleOperator = typeof RULE_OPERATORS[number];

export type RuleSeverity = 'warn' | 'error';

export type RangeThreshold = readonly [number, number];
export type RuleThreshold = number | ColumnType | RangeThreshold;

/**
 * A rule-shaped predicate. Guards are conditions too, so guards nest without
 * special cases.
 */
export interface RuleCondition {
    column?: string;
    metric: RuleMetric;
    operator: RuleOperator;
    threshold: RuleThreshold;
    /**
     * `baseline` compares the change of the metric instead of its value:
     * current minus baseline, so `null_rate le 0.05` caps the null-rate increase.
     */
    relativeTo?: 'baseline';
    guard?: RuleCondition;
}

export interface Rule extends RuleCondition {
    id: string;
    severity: RuleSeverity;
    description?: string;
}

export type GroupCombinator = 'AND' | 'OR';

export interface RuleGroup {
    name: string;
    combinator: GroupCombinator;
    members: string[];
}

export interface ExpectationSet {
    name?: string;
    rules: Rule[];
    groups: RuleGroup[];
}

export type Verdict = 'Pass' | 'Fail' | 'Skipped' | 'Error';

export type ErrorReason = 'SCHEMA_ERROR' | 'TYPE_MISMATCH';
export type SkipReason = 'GUARD_NOT_MET' | 'GUARD_ERROR' | 'NO_BASELINE';

export type ObservedValue = number | ColumnType | null;

export interface ValidationResult {
    rule: Rule;
    verdict: Verdict;
    observedValue: ObservedValue;
    reason?: ErrorReason | SkipReason;
    message: string;
    /** The guard whose metric could not be resolved, when an Error comes from a guard. */
    failedGuard?: RuleCondition;
}

export interface GroupResult {
    name: string;
    combinator: GroupCombinator;
    verdict: 'Pass' | 'Fail';
    memberVerdicts: Record<string, Verdict>;
}

export interface EvaluationReport {
    results: ValidationResult[];
    groups: GroupResult[];
}
