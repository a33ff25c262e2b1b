// src/utils/rules/groups.utils.ts
import {
    AuditOutcome,
    GroupResult,
    RuleGroup,
    RuleSeverity,
    ValidationResult,
    Verdict,
} from '../../types';

/** Skipped members count as satisfied, Errors as unsatisfied. */
const isSatisfied = (verdict: Verdict): boolean => verdict === 'Pass' || verdict === 'Skipped';

export const evaluateGroups = (results: readonly ValidationResult[], groups: readonly RuleGroup[]): GroupResult[] => {
    const verdictById = new Map(results.map(result => [result.rule.id, result.verdict]));
    return groups.map(group => {
        const memberVerdicts: Record<string, Verdict> = {};
        for (const member of group.members) {
            memberVerdicts[member] = verdictById.get(member) ?? 'Error';
        }
        const satisfied = Object.values(memberVerdicts).map(isSatisfied);
        const passed = group.combinator === 'AND' ? satisfied.every(Boolean) : satisfied.some(Boolean);
        return { name: group.name, combinator: group.combinator, verdict: passed ? 'Pass' : 'Fail', memberVerdicts };
    });
};

/**
 * Pass iff every result is Pass or Skipped. Any Error outranks any Fail. Group
 * verdicts are reported beside the outcome and never override a result.
 */
export const computeOutcome = (results: readonly ValidationResult[]): AuditOutcome => {
    if (results.some(result => result.verdict === 'Error')) {
        return 'Error';
    }
    if (results.some(result => result.verdict === 'Fail')) {
        return 'Fail';
    }
    return 'Pass';
};

export const countVerdicts = (results: readonly ValidationResult[]): Record<Verdict, number> => {
    const counts: Record<Verdict, number> = { Pass: 0, Fail: 0, Skipped: 0, Error: 0 };
    results.forEach(result => { counts[result.verdict] += 1; });
    return counts;
};

/** Fail and Error verdicts per rule severity. */
export const countFailuresBySeverity = (results: readonly ValidationResult[]): Record<RuleSeverity, number> => {
    const counts: Record<RuleSeverity, number> = { warn: 0, error: 0 };
    results
        .filter(result => result.verdict === 'Fail' || result.verdict === 'Error')
        .forEach(result => { counts[result.rule.severity] += 1; });
    return counts;
};
