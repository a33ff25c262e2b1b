// src/utils/explanation/explainResult.test.ts
import { ObservedValue, Rule, ValidationResult, Verdict } from '../../types';
import { rule, testExplanationOptions } from '../../testing/fixtures';
import { explainResult } from './explainResult';

const outcome = (
    verdict: Verdict,
    subject: Rule,
    observedValue: ObservedValue,
    extra: Partial<ValidationResult> = {}
): ValidationResult => ({ rule: subject, verdict, observedValue, message: 'evaluated', ...extra });

describe('explainResult', () => {
    it('ignores passing and skipped results', () => {
        const subject = rule({ id: 'r1', column: 'age', metric: 'mean', operator: 'gt', threshold: 0 });
        expect(explainResult(outcome('Pass', subject, 3), testExplanationOptions())).toBeNull();
        expect(explainResult(outcome('Skipped', subject, null, { reason: 'GUARD_NOT_MET' }), testExplanationOptions())).toBeNull();
    });

    it('explains a data quality failure with the observed and allowed values', () => {
        const subject = rule({ id: 'r1', column: 'age', metric: 'null_rate', operator: 'le', threshold: 0.1, severity: 'warn' });
        const explanation = explainResult(outcome('Fail', subject, 0.25), testExplanationOptions());
        expect(explanation).toMatchObject({
            rootCause: 'DataQuality',
            severity: 'warn',
            summary: "null_rate for 'age' is 0.25, exceeds allowed ≤0.10",
            suggestedFix: "Investigate missing values in column 'age': null rate 0.25 must satisfy le 0.10.",
        });
    });

    it('attributes a marginal breach to an overly strict threshold', () => {
        const subject = rule({ id: 'r1', column: 'age', metric: 'null_rate', operator: 'le', threshold: 0.1 });
        const explanation = explainResult(outcome('Fail', subject, 0.104), testExplanationOptions());
        expect(explanation?.rootCause).toBe('ThresholdTooStrict');
        expect(explanation?.suggestedFix).toBe('Observed 0.104 is within tolerance of 0.10; consider relaxing the threshold to admit 0.104.');
    });

    it('never treats ne failures as threshold strictness', () => {
        const subject = rule({ id: 'r1', column: 'age', metric: 'distinct_count', operator: 'ne', threshold: 1 });
        const explanation = explainResult(outcome('Fail', subject, 1), testExplanationOptions());
        expect(explanation?.rootCause).toBe('DataQuality');
        expect(explanation?.summary).toBe("distinct_count for 'age' is 1, must differ from ≠1");
    });

    it('measures range breaches against the nearer edge', () => {
        const subject = rule({ id: 'r1', column: 'age', metric: 'mean', operator: 'in_range', threshold: [10, 20] });
        expect(explainResult(outcome('Fail', subject, 20.5), testExplanationOptions())?.rootCause).toBe('ThresholdTooStrict');
        expect(explainResult(outcome('Fail', subject, 2), testExplanationOptions())?.rootCause).toBe('DataQuality');
        expect(explainResult(outcome('Fail', subject, 2), testExplanationOptions())?.summary)
            .toBe("mean for 'age' is 2, outside allowed range [10, 20]");
    });

    it('classifies schema errors and type rules as schema mismatches', () => {
        const missing = rule({ id: 'r1', column: 'income', metric: 'mean', operator: 'gt', threshold: 0 });
        const explanation = explainResult(
            outcome('Error', missing, null, { reason: 'SCHEMA_ERROR', message: "Column 'income' not found in profile 'people'" }),
            testExplanationOptions()
        );
        expect(explanation).toMatchObject({
            rootCause: 'SchemaMismatch',
            severity: 'error',
            summary: "Column 'income' not found in profile 'people'",
            suggestedFix: "Restore column 'income' in the source or update the rule to reference an existing column.",
        });

        const typeRule = rule({ id: 'r2', column: 'zip', metric: 'type', operator: 'eq', threshold: 'Categorical' });
        const typeExplanation = explainResult(outcome('Fail', typeRule, 'Numeric'), testExplanationOptions());
        expect(typeExplanation).toMatchObject({
            rootCause: 'SchemaMismatch',
            summary: "type for 'zip' is Numeric, expected =Categorical",
            suggestedFix: "Make column 'zip' consistently Categorical or update the expected type.",
        });
    });

    it('points the fix at the guard column when a guard errors', () => {
        const guarded = rule({
            id: 'r1',
            column: 'age',
            metric: 'mean',
            operator: 'le',
            threshold: 100,
            guard: { column: 'income', metric: 'null_rate', operator: 'lt', threshold: 0.5 },
        });
        const explanation = explainResult(
            outcome('Error', guarded, null, {
                reason: 'SCHEMA_ERROR',
                message: "Guard error: Column 'income' not found in profile 'people'",
                failedGuard: guarded.guard,
            }),
            testExplanationOptions()
        );
        expect(explanation).toMatchObject({
            rootCause: 'SchemaMismatch',
            summary: "Guard error: Column 'income' not found in profile 'people'",
            suggestedFix: "Restore column 'income' in the source or update the rule's guard to reference an existing column.",
        });
    });
});
