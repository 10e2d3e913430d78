import type { TimeWindow } from '../pipeline/filters.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Locations of the three delimiter-separated sources.
 */
export interface DataSources {
    readers: string;
    articles: string;
    authors: string;
    delimiter: string;
}

/**
 * Top-N sizes for the ranked lists of the summary.
 */
export interface LimitsConfig {
    topics: number;
    authors: number;
    positions: number;
    keywords: number;
    articles: number;
}

/**
 * Full readerlens configuration merged from CLI flags, env vars, and config file.
 */
export interface ReaderLensConfig {
    // Input
    sources: DataSources;

    // Filter selection
    country: string;
    industry: string;
    window: TimeWindow;

    // Ranked list sizes
    limits: LimitsConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ReaderLensConfig = {
    sources: {
        readers: 'Reader-Analytics.csv',
        articles: 'Article-Analytics.csv',
        authors: 'Author-Analytics.csv',
        delimiter: ',',
    },
    country: 'All',
    industry: 'All',
    window: 'all-time',
    limits: {
        topics: 5,
        authors: 10,
        positions: 10,
        keywords: 15,
        articles: 5,
    },
    logLevel: 'info',
    jsonLogs: false,
};
