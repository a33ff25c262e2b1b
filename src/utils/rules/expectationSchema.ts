// src/utils/rules/expectationSchema.ts
import { z } from 'zod';
import {
    COLUMN_TYPES,
    ExpectationSet,
    RULE_METRICS,
    RULE_OPERATORS,
    Rule,
    RuleCondition,
} from '../../types';
import { ConfigError } from '../errors';
import { isRangeThreshold } from './formatting.utils';

const thresholdSchema = z.union([
    z.number(),
    z.enum(COLUMN_TYPES),
    z.tuple([z.number(), z.number()]),
]);

const conditionSchema: z.ZodType<RuleCondition> = z.lazy(() => z.object({
    column: z.string().min(1).optional(),
    metric: z.enum(RULE_METRICS),
    operator: z.enum(RULE_OPERATORS),
    threshold: thresholdSchema,
    relativeTo: z.literal('baseline').optional(),
    guard: conditionSchema.optional(),
}).strict());

const ruleInputSchema = z.object({
    id: z.string().min(1).optional(),
    column: z.string().min(1).optional(),
    metric: z.enum(RULE_METRICS),
    operator: z.enum(RULE_OPERATORS),
    threshold: thresholdSchema,
    relativeTo: z.literal('baseline').optional(),
    severity: z.enum(['warn', 'error']).default('error'),
    description: z.string().optional(),
    guard: conditionSchema.optional(),
}).strict();

const groupSchema = z.object({
    name: z.string().min(1),
    combinator: z.enum(['AND', 'OR']),
    members: z.array(z.string().min(1)),
}).strict();

export const expectationSetSchema = z.object({
    name: z.string().optional(),
    rules: z.array(ruleInputSchema),
    groups: z.array(groupSchema).default([]),
}).strict();

export type ExpectationSetInput = z.input<typeof expectationSetSchema>;

const conditionIssues = (condition: RuleCondition, path: string): string[] => {
    const issues: string[] = [];
    const { metric, operator, threshold } = condition;

    if (metric !== 'row_count' && condition.column === undefined) {
        issues.push(`${path}: metric '${metric}' requires a column`);
    }
    if (operator === 'in_range') {
        if (!isRangeThreshold(threshold)) {
            issues.push(`${path}: operator 'in_range' requires a [low, high] threshold`);
        } else if (threshold[0] > threshold[1]) {
            issues.push(`${path}: range low ${threshold[0]} is greater than high ${threshold[1]}`);
        }
    } else if (isRangeThreshold(threshold)) {
        issues.push(`${path}: operator '${operator}' requires a scalar threshold`);
    }
    if (metric === 'type') {
        if (condition.relativeTo === 'baseline') {
            issues.push(`${path}: metric 'type' cannot be compared to a baseline`);
        }
        if (operator !== 'eq' && operator !== 'ne') {
            issues.push(`${path}: metric 'type' only supports 'eq' and 'ne'`);
        }
        if (typeof threshold !== 'string') {
            issues.push(`${path}: metric 'type' requires a column type threshold`);
        }
    } else if (typeof threshold === 'string') {
        issues.push(`${path}: metric '${metric}' requires a numeric threshold`);
    }
    if (condition.guard) {
        issues.push(...conditionIssues(condition.guard, `${path}.guard`));
    }
    return issues;
};

/** Structural checks a schema cannot express: threshold shapes, unique ids, group references. */
export const validateExpectationSet = (set: ExpectationSet): string[] => {
    const issues: string[] = [];
    const ids = new Set<string>();
    set.rules.forEach((rule, index) => {
        if (ids.has(rule.id)) {
            issues.push(`rules[${index}]: duplicate rule id '${rule.id}'`);
        }
        ids.add(rule.id);
        issues.push(...conditionIssues(rule, `rules[${index}]`));
    });

    const groupNames = new Set<string>();
    set.groups.forEach((group, index) => {
        if (groupNames.has(group.name)) {
            issues.push(`groups[${index}]: duplicate group name '${group.name}'`);
        }
        groupNames.add(group.name);
        if (group.members.length === 0) {
            issues.push(`groups[${index}]: group '${group.name}' has no members`);
        }
        group.members
            .filter(member => !ids.has(member))
            .forEach(member => issues.push(`groups[${index}]: unknown rule id '${member}'`));
    });
    return issues;
};

/**
 * Parses an untrusted expectation definition, assigning `rule-<n>` ids
 * (1-based position) to rules without one. Throws `ConfigError` listing every issue.
 */
export const parseExpectationSet = (raw: unknown): ExpectationSet => {
    const parsed = expectationSetSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            'Invalid expectation set',
            parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }

    const rules: Rule[] = parsed.data.rules.map((rule, index) => ({
        ...rule,
        id: rule.id ?? `rule-${index + 1}`,
    }));
    const set: ExpectationSet = {
        ...(parsed.data.name !== undefined ? { name: parsed.data.name } : {}),
        rules,
        groups: parsed.data.groups,
    };

    const issues = validateExpectationSet(set);
    if (issues.length > 0) {
        throw new ConfigError('Invalid expectation set', issues);
    }
    return set;
};
