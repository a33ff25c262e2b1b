// src/types/audit/source.types.ts

/**
 * A cell as handed over by a source: already decoded by the loader,
 * but not yet classified.
 */
export type RawInput = null | undefined | string | number | boolean;

/**
 * A row keyed by column name, or a positional row aligned with the header.
 */
export type RawRow = Readonly<Record<string, RawInput>> | readonly RawInput[];

/**
 * Header-then-rows abstraction over a tabular dataset.
 * `readHeader()` fixes the column order; `rows()` yields rows lazily and is the
 * only point where profiling may suspend.
 */
export interface TabularSource {
    readonly name: string;
    readHeader(): Promise<readonly string[]>;
    rows(): AsyncIterable<unknown> | Iterable<unknown>;
}

/**
 * Tagged form of a classified cell. Resolved once per value, then passed around.
 */
export type RawValue =
    | { kind: 'null' }
    | { kind: 'number'; value: number }
    | { kind: 'text'; value: string }
    | { kind: 'boolean'; value: boolean };
