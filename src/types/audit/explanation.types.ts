// src/types/audit/explanation.types.ts
import { RuleSeverity, ValidationResult } from './rule.types';

export type RootCause = 'DataQuality' | 'SchemaMismatch' | 'ThresholdTooStrict';

export interface Explanation {
    result: ValidationResult;
    rootCause: RootCause;
    severity: RuleSeverity;
    summary: string;
    suggestedFix: string;
}
