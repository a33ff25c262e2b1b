// src/sources/csvFile.source.ts
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream';
import { parse, Options as CsvParseOptions } from 'csv-parse';
import { TabularSource } from '../types';
import { AuditError } from '../utils/errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export interface CsvFileSourceOptions {
    /** Dataset name; defaults to the file name. */
    name?: string;
    delimiter?: string;
}

/**
 * Streams a delimited text file through csv-parse. The first line is the
 * header; every later line is yielded as an array of raw strings. Lines with a
 * wrong field count are passed on and end up as malformed rows.
 */
export class CsvFileSource implements TabularSource {
    public readonly name: string;
    private readonly delimiter: string;

    constructor(private readonly filePath: string, options: CsvFileSourceOptions = {}) {
        this.name = options.name ?? path.basename(filePath);
        this.delimiter = options.delimiter ?? ',';
    }

    async readHeader(): Promise<readonly string[]> {
        try {
            for await (const record of this.open({ to_line: 1 })) {
                if (Array.isArray(record)) {
                    return record.map(field => String(field).trim());
                }
            }
            return [];
        } catch (error) {
            throw this.toParseError(error);
        }
    }

    async *rows(): AsyncGenerator<unknown> {
        try {
            yield* this.open({ from_line: 2, relax_column_count: true, skip_empty_lines: true });
        } catch (error) {
            throw this.toParseError(error);
        }
    }

    private open(options: CsvParseOptions): AsyncIterable<unknown> {
        const input = fs.createReadStream(this.filePath);
        const parser = parse({ delimiter: this.delimiter, bom: true, ...options });
        // The pipeline closes the file whenever the parser is destroyed early.
        pipeline(input, parser, error => {
            if (error) parser.destroy(error);
        });
        return parser;
    }

    private toParseError(error: unknown): AuditError {
        const { message } = getErrorMessageAndStack(error);
        return new AuditError('PARSE_ERROR', `Failed to read CSV file "${this.filePath}": ${message}`, { filePath: this.filePath });
    }
}
