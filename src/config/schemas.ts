// src/config/schemas.ts
import { z } from 'zod';
import { COLUMN_TYPES, DeclarableColumnType } from '../types';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a comma-separated environment variable into trimmed, non-empty items.
 */
export const parseCommaSeparatedString = (val: string | undefined): string[] => {
    if (!val) {
        return [];
    }
    return val.split(',').map(item => item.trim()).filter(item => item !== '');
};

/**
 * Parses a comma-separated list of numbers, reporting the first item that is not one.
 */
export const parseCommaSeparatedNumbers = (key: string) => (val: string, ctx: z.RefinementCtx): number[] => {
    const numbers: number[] = [];
    for (const item of parseCommaSeparatedString(val)) {
        const parsed = Number(item);
        if (!Number.isFinite(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${key}: '${item}' is not a number`, fatal: true });
            return z.NEVER;
        }
        numbers.push(parsed);
    }
    return numbers;
};

const DECLARABLE_TYPES: ReadonlySet<string> = new Set(COLUMN_TYPES.filter(type => type !== 'Unknown'));

const isDeclarableType = (value: string): value is DeclarableColumnType => DECLARABLE_TYPES.has(value);

/**
 * Parses `column:Type` pairs, e.g. `age:Numeric,signup:DateTime`.
 */
export const parseDeclaredTypes = (val: string | undefined, ctx: z.RefinementCtx): Record<string, DeclarableColumnType> => {
    const declared: Record<string, DeclarableColumnType> = {};
    for (const entry of parseCommaSeparatedString(val)) {
        const separator = entry.lastIndexOf(':');
        const column = entry.slice(0, separator).trim();
        const type = entry.slice(separator + 1).trim();
        if (separator <= 0 || column === '' || !isDeclarableType(type)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `PROFILE_DECLARED_TYPES: invalid entry '${entry}'`, fatal: true });
            return z.NEVER;
        }
        declared[column] = type;
    }
    return declared;
};

const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.enum(['true', 'false']).default(defaultValue).transform(val => val === 'true');

const ratio = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);
const driftThreshold = (defaultValue: number) => z.coerce.number().nonnegative().default(defaultValue);

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    /**
     * Pretty-print logs to stdout. Production always logs JSON.
     * @default true
     */
    LOG_TO_CONSOLE: booleanFlag('true'),
    LOG_TO_FILE: booleanFlag('false'),
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('app.log'),

    // --- Profiling Configuration ---
    /**
     * Minimum share of non-null values that must parse as a type for it to be inferred.
     * @default 0.95
     */
    PROFILE_MIN_MATCH_RATIO: z.coerce.number().gt(0).max(1).default(0.95),
    /**
     * Distinct values counted exactly per column before switching to HyperLogLog.
     * @default 10000
     */
    PROFILE_CARDINALITY_CAP: z.coerce.number().int().positive().default(10000),
    PROFILE_TOP_K: z.coerce.number().int().nonnegative().default(10),
    PROFILE_FREQUENCY_CAPACITY: z.coerce.number().int().positive().default(1000),
    /**
     * Histogram bucket count; merging adjacent buckets needs an even count.
     * @default 10
     */
    PROFILE_HISTOGRAM_BUCKETS: z.coerce.number().int().min(2)
        .refine(val => val % 2 === 0, { message: 'PROFILE_HISTOGRAM_BUCKETS must be even' })
        .default(10),
    PROFILE_QUANTILE_SAMPLE_SIZE: z.coerce.number().int().min(2).default(10000),
    PROFILE_QUANTILES: z.string().default('0.05,0.25,0.5,0.75,0.95')
        .transform(parseCommaSeparatedNumbers('PROFILE_QUANTILES'))
        .refine(values => values.every(p => p >= 0 && p <= 1), { message: 'PROFILE_QUANTILES must lie within [0, 1]' }),
    /**
     * Non-null values per column used for type inference. 0 inspects every value.
     * @default 0
     */
    PROFILE_TYPE_SAMPLE_SIZE: z.coerce.number().int().nonnegative().default(0),
    PROFILE_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
    PROFILE_NULL_TOKENS: z.string().default('NA,N/A,null,NULL,None,NaN').transform(parseCommaSeparatedString),
    PROFILE_DECLARED_TYPES: z.string().optional().transform(parseDeclaredTypes),

    // --- Drift Configuration ---
    DRIFT_MEAN_WARN: driftThreshold(0.1),
    DRIFT_MEAN_CRITICAL: driftThreshold(0.25),
    DRIFT_STDEV_WARN: driftThreshold(0.1),
    DRIFT_STDEV_CRITICAL: driftThreshold(0.25),
    DRIFT_NULL_RATE_WARN: driftThreshold(0.1),
    DRIFT_NULL_RATE_CRITICAL: driftThreshold(0.5),
    DRIFT_CATEGORICAL_WARN: ratio(0.1),
    DRIFT_CATEGORICAL_CRITICAL: ratio(0.25),
    /**
     * Floor for the denominator of relative deltas.
     * @default 1e-9
     */
    DRIFT_EPSILON: z.coerce.number().positive().default(1e-9),
    DRIFT_ALLOW_COLUMN_DROP: booleanFlag('false'),
    DRIFT_ALLOW_TYPE_CHANGE: booleanFlag('false'),

    // --- Rule Evaluation Configuration ---
    /**
     * What a rule whose guard errors yields: 'error' propagates the error, 'skip' skips the rule.
     * @default 'error'
     */
    RULE_GUARD_ERROR_MODE: z.enum(['error', 'skip']).default('error'),
    RULE_EVALUATION_CONCURRENCY: z.coerce.number().int().positive().default(4),
    /**
     * Relative breach size up to which a failure is attributed to an overly strict threshold.
     * @default 0.05
     */
    EXPLANATION_TOLERANCE_BAND: ratio(0.05),
}).superRefine((env, ctx) => {
    const pairs: [string, number, number][] = [
        ['DRIFT_MEAN', env.DRIFT_MEAN_WARN, env.DRIFT_MEAN_CRITICAL],
        ['DRIFT_STDEV', env.DRIFT_STDEV_WARN, env.DRIFT_STDEV_CRITICAL],
        ['DRIFT_NULL_RATE', env.DRIFT_NULL_RATE_WARN, env.DRIFT_NULL_RATE_CRITICAL],
        ['DRIFT_CATEGORICAL', env.DRIFT_CATEGORICAL_WARN, env.DRIFT_CATEGORICAL_CRITICAL],
    ];
    for (const [prefix, warn, critical] of pairs) {
        if (warn > critical) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [`${prefix}_WARN`],
                message: `${prefix}_WARN (${warn}) must not exceed ${prefix}_CRITICAL (${critical})`,
            });
        }
    }
});
