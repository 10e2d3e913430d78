import type { TimeWindow } from '../pipeline/filters.js';

/**
 * One (key, total) pair of a grouped aggregation.
 */
export interface RankedEntry {
    key: string;
    total: number;
}

/**
 * Projection of a single article for the "top articles" list.
 */
export interface ArticleHighlight {
    title: string | null;
    authorName: string | null;
    articleReads: number | null;
    date: Date | null;
}

export interface FilterSelection {
    country: string;
    industry: string;
    window: TimeWindow;
}

export interface DashboardKpis {
    /** Distinct non-null reader emails */
    totalReaders: number;
    /** Sum of reader reads, blanks counted as 0 */
    totalReads: number;
}

export interface ReaderInsights {
    positions: RankedEntry[];
    /** Null when the reader source has no "Activity Desc" column */
    accessSources: RankedEntry[] | null;
    countries: RankedEntry[];
}

export interface ArticleInsights {
    topics: RankedEntry[];
    keywords: RankedEntry[];
    topArticles: ArticleHighlight[];
}

export interface AuthorInsights {
    topAuthors: RankedEntry[];
}

/**
 * Everything a presentation layer needs to draw the dashboard for one
 * filter selection.
 */
export interface DashboardSummary {
    generatedAt: string;
    selection: FilterSelection;
    /** ISO timestamp of the active cutoff, null for all time */
    cutoff: string | null;
    readerRows: number;
    articleRows: number;
    kpis: DashboardKpis;
    readers: ReaderInsights;
    articles: ArticleInsights;
    authors: AuthorInsights;
}
