// src/utils/profiling/valueParsing.utils.ts
import { isValid, parse, parseISO } from 'date-fns';
import { RawValue } from '../../types';

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATETIME_PREFIX = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/;
const DATE_FORMATS = ['yyyy-MM-dd', 'M/d/yyyy'] as const;
const REFERENCE_DATE = new Date(0);

const TRUE_TOKENS: ReadonlySet<string> = new Set(['true', 't', 'yes', 'y']);
const FALSE_TOKENS: ReadonlySet<string> = new Set(['false', 'f', 'no', 'n']);

/**
 * Result of classifying one cell. `malformed` cells are values of a type no
 * loader should produce; they are tallied and treated as null.
 */
export interface ClassifiedCell {
    value: RawValue;
    malformed: boolean;
    emptyString: boolean;
}

const NULL_CELL: ClassifiedCell = { value: { kind: 'null' }, malformed: false, emptyString: false };
const MALFORMED_CELL: ClassifiedCell = { value: { kind: 'null' }, malformed: true, emptyString: false };
const EMPTY_STRING_CELL: ClassifiedCell = { value: { kind: 'null' }, malformed: false, emptyString: true };

export const classifyCell = (input: unknown, nullTokens: ReadonlySet<string>): ClassifiedCell => {
    if (input === null || input === undefined) {
        return NULL_CELL;
    }
    if (typeof input === 'number') {
        return Number.isFinite(input)
            ? { value: { kind: 'number', value: input }, malformed: false, emptyString: false }
            : MALFORMED_CELL;
    }
    if (typeof input === 'boolean') {
        return { value: { kind: 'boolean', value: input }, malformed: false, emptyString: false };
    }
    if (typeof input === 'string') {
        const trimmed = input.trim();
        if (trimmed === '') {
            return EMPTY_STRING_CELL;
        }
        if (nullTokens.has(trimmed)) {
            return NULL_CELL;
        }
        return { value: { kind: 'text', value: trimmed }, malformed: false, emptyString: false };
    }
    return MALFORMED_CELL;
};

export const parseNumber = (value: RawValue): number | null => {
    if (value.kind === 'number') return value.value;
    if (value.kind !== 'text' || !NUMERIC_PATTERN.test(value.value)) return null;
    const parsed = Number(value.value);
    return Number.isFinite(parsed) ? parsed : null;
};

export const parseBoolean = (value: RawValue): boolean | null => {
    if (value.kind === 'boolean') return value.value;
    if (value.kind !== 'text') return null;
    const lowered = value.value.toLowerCase();
    if (TRUE_TOKENS.has(lowered)) return true;
    if (FALSE_TOKENS.has(lowered)) return false;
    return null;
};

/**
 * Parses ISO dates/datetimes and US `MM/DD/YYYY` dates into epoch milliseconds.
 * Datetimes without a zone designator and plain dates are read as UTC so results
 * never depend on the host time zone.
 */
export const parseDate = (value: RawValue): number | null => {
    if (value.kind !== 'text') return null;
    const text = value.value;

    if (ISO_DATETIME_PREFIX.test(text)) {
        const parsed = parseISO(ZONE_SUFFIX.test(text) ? text : `${text}Z`);
        return isValid(parsed) ? parsed.getTime() : null;
    }

    for (const format of DATE_FORMATS) {
        const parsed = parse(text, format, REFERENCE_DATE);
        if (isValid(parsed)) {
            return Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate());
        }
    }
    return null;
};

/** Key under which a non-null value is counted for frequencies and distinct counts. */
export const valueKey = (value: RawValue): string | null => {
    switch (value.kind) {
        case 'null':
            return null;
        case 'number':
            return String(value.value);
        case 'boolean':
            return value.value ? 'true' : 'false';
        case 'text':
            return value.value;
    }
};
