// src/services/audit/auditOrchestrator.service.test.ts
import container from '../../container';
import { ExpectationSet } from '../../types';
import { MemoryTabularSource } from '../../sources/memory.source';
import { ConfigError } from '../../utils/errors';
import { profileRows, rule } from '../../testing/fixtures';
import { AuditOrchestratorService } from './auditOrchestrator.service';

const peopleSource = (): MemoryTabularSource => new MemoryTabularSource('people', ['age', 'name'], [
    [20, 'a'],
    [30, 'b'],
    [40, 'c'],
    [null, 'd'],
]);

describe('AuditOrchestratorService', () => {
    const orchestrator = container.resolve(AuditOrchestratorService);

    it('fails the audit and explains the breached rule', async () => {
        const expectations: ExpectationSet = {
            rules: [
                rule({ id: 'age-nulls', column: 'age', metric: 'null_rate', operator: 'le', threshold: 0.1 }),
                rule({ id: 'rows', metric: 'row_count', operator: 'eq', threshold: 4 }),
            ],
            groups: [],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations });

        expect(report.profile.rowCount).toBe(4);
        expect(report.drift).toBeUndefined();
        expect(report.summary).toEqual({
            outcome: 'Fail',
            exitCode: 1,
            verdictCounts: { Pass: 1, Fail: 1, Skipped: 0, Error: 0 },
            failuresBySeverity: { warn: 0, error: 1 },
            failedGroups: [],
        });
        expect(report.explanations).toHaveLength(1);
        expect(report.explanations[0]).toMatchObject({
            rootCause: 'DataQuality',
            severity: 'error',
            summary: "null_rate for 'age' is 0.25, exceeds allowed ≤0.10",
            suggestedFix: "Investigate missing values in column 'age': null rate 0.25 must satisfy le 0.10.",
        });
    });

    it('fails on a member failure while reporting its OR group as passing', async () => {
        const expectations: ExpectationSet = {
            rules: [
                rule({ id: 'strict', column: 'age', metric: 'null_rate', operator: 'le', threshold: 0.1 }),
                rule({ id: 'rows', metric: 'row_count', operator: 'eq', threshold: 4 }),
            ],
            groups: [{ name: 'either', combinator: 'OR', members: ['strict', 'rows'] }],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations });
        expect(report.results.map(result => result.verdict)).toEqual(['Fail', 'Pass']);
        expect(report.groups.map(group => [group.name, group.verdict])).toEqual([['either', 'Pass']]);
        expect(report.summary.outcome).toBe('Fail');
        expect(report.summary.exitCode).toBe(1);
        expect(report.summary.failedGroups).toEqual([]);
    });

    it('lists failing groups in the summary', async () => {
        const expectations: ExpectationSet = {
            rules: [
                rule({ id: 'strict', column: 'age', metric: 'null_rate', operator: 'eq', threshold: 0 }),
                rule({ id: 'rows', metric: 'row_count', operator: 'eq', threshold: 4 }),
            ],
            groups: [{ name: 'both', combinator: 'AND', members: ['strict', 'rows'] }],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations });
        expect(report.summary.outcome).toBe('Fail');
        expect(report.summary.failedGroups).toEqual(['both']);
    });

    it('reports an error outcome for a rule on a missing column', async () => {
        const expectations: ExpectationSet = {
            rules: [rule({ id: 'income', column: 'income', metric: 'mean', operator: 'gt', threshold: 0 })],
            groups: [],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations });
        expect(report.summary.outcome).toBe('Error');
        expect(report.summary.exitCode).toBe(2);
        expect(report.explanations[0]).toMatchObject({
            rootCause: 'SchemaMismatch',
            summary: "Column 'income' not found in profile 'people'",
            suggestedFix: "Restore column 'income' in the source or update the rule to reference an existing column.",
        });
    });

    it('computes drift against a baseline profile', async () => {
        const baseline = await profileRows('people-v1', ['age', 'zip'], [
            [20, 'a'],
            [30, 'b'],
            [40, 'c'],
            [null, 'd'],
        ]);
        const expectations: ExpectationSet = {
            rules: [rule({ id: 'rows', metric: 'row_count', operator: 'ge', threshold: 1 })],
            groups: [],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations, baseline });
        expect(report.drift).toEqual({
            addedColumns: ['name'],
            removedColumns: ['zip'],
            typeChanges: [],
            statDeltas: [],
            categoricalShifts: [],
            fingerprintsMatch: false,
            breaking: true,
        });
        expect(report.summary.outcome).toBe('Pass');
    });

    it('applies baseline-relative rules to the change since the baseline', async () => {
        const baseline = await profileRows('people-v1', ['age', 'name'], [
            [20, 'a'],
            [30, 'b'],
            [40, 'c'],
            [50, 'd'],
        ]);
        const expectations: ExpectationSet = {
            rules: [rule({ id: 'new-nulls', column: 'age', metric: 'null_rate', operator: 'le', threshold: 0.1, relativeTo: 'baseline' })],
            groups: [],
        };

        const report = await orchestrator.run({ source: peopleSource(), expectations, baseline });
        expect(report.results[0]).toMatchObject({ verdict: 'Fail', observedValue: 0.25 });
        expect(report.explanations[0]).toMatchObject({
            rootCause: 'DataQuality',
            summary: "null_rate change for 'age' is 0.25, exceeds allowed ≤0.10",
            suggestedFix: "Investigate new missing values in column 'age': null rate change 0.25 since the baseline must satisfy le 0.10.",
        });

        const withoutBaseline = await orchestrator.run({ source: peopleSource(), expectations });
        expect(withoutBaseline.results[0]).toMatchObject({ verdict: 'Skipped', reason: 'NO_BASELINE' });
        expect(withoutBaseline.summary.outcome).toBe('Pass');
    });

    it('rejects an invalid expectation set before reading the source', async () => {
        const source = peopleSource();
        const readHeader = jest.spyOn(source, 'readHeader');
        const rows = jest.spyOn(source, 'rows');
        const expectations: ExpectationSet = {
            rules: [rule({ id: 'age-range', column: 'age', metric: 'mean', operator: 'in_range', threshold: [5, 1] })],
            groups: [],
        };

        const run = orchestrator.run({ source, expectations });
        await expect(run).rejects.toBeInstanceOf(ConfigError);
        await expect(run).rejects.toMatchObject({ issues: ['rules[0]: range low 5 is greater than high 1'] });
        expect(readHeader).not.toHaveBeenCalled();
        expect(rows).not.toHaveBeenCalled();
    });
});
