/**
 * Words dropped from title keyword counts. Deliberately short: "of", "in",
 * "to" and similar are kept.
 */
export const TITLE_STOPWORDS: ReadonlySet<string> = new Set([
    'the', 'and', 'for', 'with', 'from', 'this', 'that', 'will', 'how', 'can', 'are',
]);
