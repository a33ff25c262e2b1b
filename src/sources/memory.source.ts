// src/sources/memory.source.ts
import { TabularSource } from '../types';

/**
 * In-memory dataset. Rows may be positional arrays or objects keyed by column;
 * they are handed to the profiler as-is, malformed ones included.
 */
export class MemoryTabularSource implements TabularSource {
    constructor(
        public readonly name: string,
        private readonly header: readonly string[],
        private readonly records: readonly unknown[]
    ) {}

    /**
     * Builds a source from keyed records, taking the header from the keys in
     * first-seen order across all records.
     */
    static fromRecords(name: string, records: readonly Readonly<Record<string, unknown>>[]): MemoryTabularSource {
        const header: string[] = [];
        const seen = new Set<string>();
        for (const record of records) {
            for (const key of Object.keys(record)) {
                if (!seen.has(key)) {
                    seen.add(key);
                    header.push(key);
                }
            }
        }
        return new MemoryTabularSource(name, header, records);
    }

    async readHeader(): Promise<readonly string[]> {
        return this.header;
    }

    rows(): Iterable<unknown> {
        return this.records;
    }
}
