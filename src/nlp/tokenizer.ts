import { TITLE_STOPWORDS } from './stopwords.js';

/**
 * Split one title into lowercase whitespace-delimited tokens.
 * Punctuation stays attached ("compliance:" and "compliance" are different
 * tokens) and there is no stemming.
 */
export function tokenize(text: string | null): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .split(/\s+/)
        .filter((token) => token.length > 0 && !TITLE_STOPWORDS.has(token));
}

/**
 * Term frequency across all titles, in first-seen order.
 * Null titles are skipped.
 */
export function tokenizeTitles(titles: Iterable<string | null>): Map<string, number> {
    const frequencies = new Map<string, number>();

    for (const title of titles) {
        for (const token of tokenize(title)) {
            frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
        }
    }

    return frequencies;
}
