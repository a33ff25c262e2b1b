// src/utils/profiling/profileDataset.ts
import { DatasetProfile, ProfilingOptions, TabularSource } from '../../types';
import { AuditError, ConfigError, ProfilingCancelledError } from '../errors';
import { ColumnAccumulator } from './columnAccumulator';
import { deepFreeze } from './deepFreeze.utils';
import { computeSchemaFingerprint } from './fingerprint.utils';

export interface ProfileRunControl {
    signal?: AbortSignal;
    /** Called after every completed batch with the number of rows processed so far. */
    onBatch?: (rowsProcessed: number) => void;
}

export const validateProfilingOptions = (options: ProfilingOptions): string[] => {
    const issues: string[] = [];
    if (!(options.minMatchRatio > 0 && options.minMatchRatio <= 1)) {
        issues.push(`minMatchRatio must be within (0, 1], got ${options.minMatchRatio}`);
    }
    if (!Number.isInteger(options.histogramBuckets) || options.histogramBuckets < 2 || options.histogramBuckets % 2 !== 0) {
        issues.push(`histogramBuckets must be an even integer >= 2, got ${options.histogramBuckets}`);
    }
    if (!Number.isInteger(options.cardinalityCap) || options.cardinalityCap < 1) {
        issues.push(`cardinalityCap must be a positive integer, got ${options.cardinalityCap}`);
    }
    if (!Number.isInteger(options.frequencyCapacity) || options.frequencyCapacity < 1) {
        issues.push(`frequencyCapacity must be a positive integer, got ${options.frequencyCapacity}`);
    }
    if (!Number.isInteger(options.topK) || options.topK < 0) {
        issues.push(`topK must be a non-negative integer, got ${options.topK}`);
    }
    if (!Number.isInteger(options.quantileSampleSize) || options.quantileSampleSize < 2) {
        issues.push(`quantileSampleSize must be an integer >= 2, got ${options.quantileSampleSize}`);
    }
    if (options.quantiles.some(p => !(p >= 0 && p <= 1))) {
        issues.push(`quantiles must lie within [0, 1], got ${options.quantiles.join(',')}`);
    }
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
        issues.push(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    if (!Number.isInteger(options.typeSampleSize) || options.typeSampleSize < 0) {
        issues.push(`typeSampleSize must be a non-negative integer, got ${options.typeSampleSize}`);
    }
    return issues;
};

const isPlainRecord = (row: unknown): row is object => typeof row === 'object' && row !== null && !Array.isArray(row);

/**
 * Single streaming pass over `source`. Rows are either positional arrays aligned
 * with the header or objects keyed by column name; anything else is a malformed
 * row that still counts as a row of nulls.
 */
export const profileDataset = async (
    source: TabularSource,
    options: ProfilingOptions,
    control: ProfileRunControl = {}
): Promise<DatasetProfile> => {
    const issues = validateProfilingOptions(options);
    if (issues.length > 0) {
        throw new ConfigError('Invalid profiling options', issues);
    }

    const header = await source.readHeader();
    const seen = new Set<string>();
    for (const name of header) {
        if (seen.has(name)) {
            throw new AuditError('PARSE_ERROR', `Duplicate column '${name}' in header of '${source.name}'.`, { column: name });
        }
        seen.add(name);
    }

    const nullTokens: ReadonlySet<string> = new Set(options.nullTokens);
    const accumulators = header.map(name => new ColumnAccumulator(name, options, options.declaredTypes[name]));
    let rowCount = 0;
    let malformedRowCount = 0;

    const markMalformed = (): void => {
        malformedRowCount += 1;
        accumulators.forEach(accumulator => accumulator.addMissing());
    };

    for await (const row of source.rows()) {
        if (rowCount % options.batchSize === 0) {
            if (rowCount > 0) control.onBatch?.(rowCount);
            if (control.signal?.aborted) {
                throw new ProfilingCancelledError(rowCount);
            }
        }

        if (Array.isArray(row)) {
            if (row.length !== header.length) {
                markMalformed();
            } else {
                accumulators.forEach((accumulator, index) => accumulator.add(row[index], nullTokens));
            }
        } else if (isPlainRecord(row)) {
            const cells = new Map<string, unknown>(Object.entries(row));
            if ([...cells.keys()].some(key => !seen.has(key))) {
                markMalformed();
            } else {
                accumulators.forEach(accumulator => accumulator.add(cells.get(accumulator.name), nullTokens));
            }
        } else {
            markMalformed();
        }
        rowCount += 1;
    }

    if (control.signal?.aborted) {
        throw new ProfilingCancelledError(rowCount);
    }

    const columns = accumulators.map(accumulator => accumulator.finalize());
    const cellCount = rowCount * columns.length;
    const missingCellCount = columns.reduce((sum, column) => sum + column.nullCount, 0);

    return deepFreeze<DatasetProfile>({
        name: source.name,
        rowCount,
        columns,
        schemaFingerprint: computeSchemaFingerprint(columns),
        stats: {
            columnCount: columns.length,
            malformedRowCount,
            malformedValueCount: columns.reduce((sum, column) => sum + column.malformedValueCount, 0),
            missingCellCount,
            completeness: cellCount === 0 ? 1 : 1 - missingCellCount / cellCount,
        },
    });
};
