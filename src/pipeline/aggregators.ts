import type { JoinedArticleRecord, RankedEntry, ArticleHighlight } from '../types/index.js';

/**
 * Null-safe sum: null and undefined contribute 0.
 */
export function sumReads(values: Iterable<number | null | undefined>): number {
    let total = 0;
    for (const value of values) {
        total += value ?? 0;
    }
    return total;
}

/**
 * Number of distinct non-null values.
 */
export function countDistinct<T>(values: Iterable<T | null>): number {
    const seen = new Set<T>();
    for (const value of values) {
        if (value !== null) seen.add(value);
    }
    return seen.size;
}

/**
 * Group rows by key, sum a value per group, rank descending by total.
 *
 * - Rows whose key is null are skipped.
 * - A null value contributes 0.
 * - Equal totals keep the order in which their keys first appeared.
 * - `n` truncates the result; omit it to keep every group.
 */
export function groupSumTopN<T>(
    rows: Iterable<T>,
    keyFn: (row: T) => string | null,
    valueFn: (row: T) => number | null,
    n?: number
): RankedEntry[] {
    const totals = new Map<string, number>();

    for (const row of rows) {
        const key = keyFn(row);
        if (key === null) continue;
        totals.set(key, (totals.get(key) ?? 0) + (valueFn(row) ?? 0));
    }

    // Array.prototype.sort is stable; Map iteration is insertion order
    const ranked = Array.from(totals, ([key, total]) => ({ key, total }))
        .sort((a, b) => b.total - a.total);

    return n === undefined ? ranked : ranked.slice(0, Math.max(0, n));
}

/**
 * Frequency of each non-null key, ranked like `groupSumTopN`.
 */
export function countBy<T>(
    rows: Iterable<T>,
    keyFn: (row: T) => string | null,
    n?: number
): RankedEntry[] {
    return groupSumTopN(rows, keyFn, () => 1, n);
}

/**
 * Rank a term-frequency table the same way as grouped totals.
 */
export function rankTerms(frequencies: Map<string, number>, n?: number): RankedEntry[] {
    return groupSumTopN(frequencies, ([term]) => term, ([, count]) => count, n);
}

/**
 * The `n` most-read articles. Ties keep input order; rows without a read
 * count sort after every counted row.
 */
export function topArticles(rows: JoinedArticleRecord[], n: number): ArticleHighlight[] {
    return [...rows]
        .sort((a, b) => {
            if (a.articleReads === null || b.articleReads === null) {
                return Number(a.articleReads === null) - Number(b.articleReads === null);
            }
            return b.articleReads - a.articleReads;
        })
        .slice(0, Math.max(0, n))
        .map((row) => ({
            title: row.title,
            authorName: row.authorName,
            articleReads: row.articleReads,
            date: row.date,
        }));
}
