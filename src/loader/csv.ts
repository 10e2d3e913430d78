import { dsvFormat } from 'd3-dsv';
import type { Table } from '../types/index.js';
import { MissingColumnError } from '../utils/errors.js';

/** A parsed row before typing, keyed by trimmed column name */
export type RawRow = Record<string, string>;

const ISO_DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse delimiter-separated text with a header row.
 * Header cells are trimmed; blank lines are skipped; short rows are padded
 * with empty cells.
 */
export function parseTable(text: string, delimiter = ','): Table<RawRow> {
    const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    const [header = [], ...records] = dsvFormat(delimiter).parseRows(body);
    const columns = header.map((name) => name.trim());

    const rows: RawRow[] = [];
    for (const record of records) {
        if (record.every((value) => value.trim() === '')) continue;

        const row: RawRow = {};
        columns.forEach((name, i) => {
            row[name] = record[i] ?? '';
        });
        rows.push(row);
    }

    return { columns, rows };
}

/**
 * Throw `MissingColumnError` for the first required column the header lacks.
 */
export function requireColumns(source: string, columns: string[], required: readonly string[]): void {
    for (const name of required) {
        if (!columns.includes(name)) {
            throw new MissingColumnError(source, name, columns);
        }
    }
}

/**
 * Cell text, or null when blank or absent.
 */
export function toText(value: string | undefined): string | null {
    if (value === undefined || value.trim() === '') return null;
    return value;
}

/**
 * Lenient numeric parse: blank or non-numeric cells become null.
 */
export function toNumber(value: string | undefined): number | null {
    const trimmed = value?.trim() ?? '';
    if (trimmed.length === 0) return null;

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Local date from calendar parts, or null when a part rolls over
 * (2024-02-31, 13/01/2024, 25:00).
 */
function localDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
    const date = new Date(year, month - 1, day, hours, minutes, seconds);
    const valid =
        date.getFullYear() === year &&
        date.getMonth() === month - 1 &&
        date.getDate() === day &&
        date.getHours() === hours &&
        date.getMinutes() === minutes &&
        date.getSeconds() === seconds;
    return valid ? date : null;
}

/**
 * Lenient date parse: blank or unparseable cells become null.
 *
 * Accepted shapes:
 * - `YYYY-MM-DD`, read as local midnight
 * - ISO date-time (`YYYY-MM-DDTHH:MM[:SS[.fff]][Z|±HH:MM]`, `T` or space)
 * - `MM/DD/YYYY` with an optional `HH:MM[:SS]`, read as local time
 *
 * Anything else, bare numbers included, is null.
 */
export function parseDate(value: string | undefined): Date | null {
    const trimmed = value?.trim() ?? '';
    if (trimmed.length === 0) return null;

    const isoDate = ISO_DATE_ONLY.exec(trimmed);
    if (isoDate) {
        const [year = NaN, month = NaN, day = NaN] = isoDate.slice(1).map(Number);
        return localDate(year, month, day);
    }

    const usDate = US_DATE.exec(trimmed);
    if (usDate) {
        const [month = NaN, day = NaN, year = NaN, hours = 0, minutes = 0, seconds = 0] = usDate
            .slice(1)
            .map((part) => (part === undefined ? undefined : Number(part)));
        return localDate(year, month, day, hours, minutes, seconds);
    }

    if (!ISO_DATE_TIME.test(trimmed)) return null;

    const time = Date.parse(trimmed);
    return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Columns of a row outside the given set, keyed by trimmed name.
 */
export function extraColumns(row: RawRow, modelled: ReadonlySet<string>): Record<string, string> {
    const extra: Record<string, string> = {};
    for (const [name, value] of Object.entries(row)) {
        if (!modelled.has(name)) extra[name] = value;
    }
    return extra;
}
