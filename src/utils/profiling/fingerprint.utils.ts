// src/utils/profiling/fingerprint.utils.ts
import { createHash } from 'crypto';
import { ColumnProfile } from '../../types';

/** SHA-256 over the ordered (name, type) pairs, hex encoded. */
export const computeSchemaFingerprint = (columns: readonly Pick<ColumnProfile, 'name' | 'inferredType'>[]): string => {
    const pairs = columns.map(column => [column.name, column.inferredType]);
    return createHash('sha256').update(JSON.stringify(pairs)).digest('hex');
};
