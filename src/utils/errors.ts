// src/utils/errors.ts

export type AuditErrorCode =
    | 'SCHEMA_ERROR'
    | 'TYPE_MISMATCH'
    | 'PARSE_ERROR'
    | 'CONFIG_ERROR'
    | 'CANCELLED';

export class AuditError extends Error {
    public readonly code: AuditErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: AuditErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'AuditError';
        this.code = code;
        this.details = details;
    }
}

/**
 * The audit itself is misconfigured (environment or expectation definitions).
 * Raised before any evaluation starts.
 */
export class ConfigError extends AuditError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('CONFIG_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { issues });
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

export class ProfilingCancelledError extends AuditError {
    public readonly rowsProcessed: number;

    constructor(rowsProcessed: number) {
        super('CANCELLED', `Profiling cancelled after ${rowsProcessed} rows.`, { rowsProcessed });
        this.name = 'ProfilingCancelledError';
        this.rowsProcessed = rowsProcessed;
    }
}

export const isAuditError = (error: unknown): error is AuditError => error instanceof AuditError;
