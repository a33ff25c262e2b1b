// src/types/audit/outcome.types.ts
import { DriftReport } from './drift.types';
import { Explanation } from './explanation.types';
import { DatasetProfile } from './profile.types';
import { GroupResult, RuleSeverity, ValidationResult, Verdict } from './rule.types';

export type AuditOutcome = 'Pass' | 'Fail' | 'Error';

export const EXIT_CODES: Readonly<Record<AuditOutcome, number>> = {
    Pass: 0,
    Fail: 1,
    Error: 2,
};

export interface AuditSummary {
    outcome: AuditOutcome;
    exitCode: number;
    verdictCounts: Record<Verdict, number>;
    failuresBySeverity: Record<RuleSeverity, number>;
    failedGroups: string[];
}

export interface AuditReport {
    profile: DatasetProfile;
    drift?: DriftReport;
    results: ValidationResult[];
    groups: GroupResult[];
    explanations: Explanation[];
    summary: AuditSummary;
}
