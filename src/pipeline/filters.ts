import type { ReaderRecord, JoinedArticleRecord, Table } from '../types/index.js';
import { InvalidSelectionError } from '../utils/errors.js';

/**
 * Sentinel meaning "no restriction" for the country and industry filters.
 */
export const ALL = 'All';

export const TIME_WINDOWS = ['all-time', 'last-7-days', 'last-30-days', 'last-90-days'] as const;

export type TimeWindow = (typeof TIME_WINDOWS)[number];

export const TIME_WINDOW_LABELS: Record<TimeWindow, string> = {
    'all-time': 'All Time',
    'last-7-days': 'Last 7 Days',
    'last-30-days': 'Last 30 Days',
    'last-90-days': 'Last 90 Days',
};

const WINDOW_DAYS: Record<TimeWindow, number | null> = {
    'all-time': null,
    'last-7-days': 7,
    'last-30-days': 30,
    'last-90-days': 90,
};

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReaderFilter {
    country?: string;
    industry?: string;
    cutoff?: Date | null;
}

export interface FilterOptions {
    countries: string[];
    industries: string[];
    windows: Array<{ value: TimeWindow; label: string }>;
}

/**
 * Accept either a window key ("last-7-days") or its display label ("Last 7 Days").
 */
export function parseTimeWindow(value: string): TimeWindow {
    const normalized = value.trim().toLowerCase();
    for (const window of TIME_WINDOWS) {
        if (window === normalized || TIME_WINDOW_LABELS[window].toLowerCase() === normalized) {
            return window;
        }
    }
    throw new InvalidSelectionError(`Unknown time window: ${value}`, {
        details: { valid: [...TIME_WINDOWS] },
    });
}

/**
 * Earliest timestamp (inclusive) a record must meet, or null for all time.
 */
export function resolveCutoff(window: TimeWindow, now: Date = new Date()): Date | null {
    const days = WINDOW_DAYS[window];
    return days === null ? null : new Date(now.getTime() - days * DAY_MS);
}

function isActive(value: string | undefined): value is string {
    return value !== undefined && value !== ALL;
}

function withinCutoff(date: Date | null, cutoff: Date | null | undefined): boolean {
    if (!cutoff) return true;
    return date !== null && date.getTime() >= cutoff.getTime();
}

/**
 * Filter reader rows by country, industry and last access date.
 * Predicates are ANDed; the input table is left untouched.
 */
export function filterReaders(readers: Table<ReaderRecord>, filter: ReaderFilter = {}): Table<ReaderRecord> {
    const { country, industry, cutoff } = filter;

    const rows = readers.rows.filter((row) =>
        (!isActive(country) || row.country === country) &&
        (!isActive(industry) || row.industry === industry) &&
        withinCutoff(row.lastAccessDate, cutoff)
    );

    return { columns: [...readers.columns], rows };
}

/**
 * Filter joined article rows by publication date.
 */
export function filterArticles(
    joined: Table<JoinedArticleRecord>,
    cutoff?: Date | null
): Table<JoinedArticleRecord> {
    return {
        columns: [...joined.columns],
        rows: joined.rows.filter((row) => withinCutoff(row.date, cutoff)),
    };
}

function distinctSorted(values: Array<string | null>): string[] {
    const seen = new Set<string>();
    for (const value of values) {
        if (value !== null) seen.add(value);
    }
    return [...seen].sort();
}

/**
 * Choices a presentation layer offers for each filter, "All" first.
 */
export function filterOptions(readers: Table<ReaderRecord>): FilterOptions {
    return {
        countries: [ALL, ...distinctSorted(readers.rows.map((r) => r.country))],
        industries: [ALL, ...distinctSorted(readers.rows.map((r) => r.industry))],
        windows: TIME_WINDOWS.map((value) => ({ value, label: TIME_WINDOW_LABELS[value] })),
    };
}
