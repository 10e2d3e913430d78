/**
 * Topic keywords in priority order. The first one found in a title wins.
 */
export const TOPIC_KEYWORDS = [
    'tax',
    'esg',
    'mergers',
    'acquisition',
    'privacy',
    'compliance',
    'digital',
    'technology',
    'employment',
] as const;

export const OTHER_TOPIC = 'other';

export type Topic = (typeof TOPIC_KEYWORDS)[number] | typeof OTHER_TOPIC;

/**
 * Classify a title by case-insensitive substring match against
 * `TOPIC_KEYWORDS`. List order breaks ties, not position in the title:
 * "ESG and tax" is `tax`.
 */
export function classifyTopic(title: string | null | undefined): Topic {
    const text = (title ?? '').toLowerCase();
    return TOPIC_KEYWORDS.find((keyword) => text.includes(keyword)) ?? OTHER_TOPIC;
}
