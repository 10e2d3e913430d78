import type {
    Dataset,
    DashboardSummary,
    FilterSelection,
    LimitsConfig,
    RankedEntry,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { filterReaders, filterArticles, resolveCutoff, TIME_WINDOW_LABELS } from '../pipeline/filters.js';
import { groupSumTopN, countBy, rankTerms, topArticles, sumReads, countDistinct } from '../pipeline/aggregators.js';
import { classifyTopic } from '../nlp/topics.js';
import { tokenizeTitles } from '../nlp/tokenizer.js';
import { ACTIVITY_DESC } from '../loader/sources.js';
import { getLogger } from '../utils/logger.js';

export interface BuildDashboardOptions {
    limits?: LimitsConfig;
    /** Reference time for the time window (default: now) */
    now?: Date;
}

/**
 * Run one filter selection through the pipeline and collect every
 * aggregate the dashboard shows.
 */
export function buildDashboard(
    dataset: Dataset,
    selection: FilterSelection,
    options: BuildDashboardOptions = {}
): DashboardSummary {
    const limits = options.limits ?? DEFAULT_CONFIG.limits;
    const now = options.now ?? new Date();
    const cutoff = resolveCutoff(selection.window, now);

    const readers = filterReaders(dataset.readers, {
        country: selection.country,
        industry: selection.industry,
        cutoff,
    });
    const articles = filterArticles(dataset.joined, cutoff);

    getLogger().debug(
        { ...selection, readers: readers.rows.length, articles: articles.rows.length },
        'Applied filters'
    );

    const accessSources = readers.columns.includes(ACTIVITY_DESC)
        ? countBy(readers.rows, (r) => r.activityDesc)
        : null;

    return {
        generatedAt: now.toISOString(),
        selection,
        cutoff: cutoff ? cutoff.toISOString() : null,
        readerRows: readers.rows.length,
        articleRows: articles.rows.length,
        kpis: {
            totalReaders: countDistinct(readers.rows.map((r) => r.email)),
            totalReads: sumReads(readers.rows.map((r) => r.reads)),
        },
        readers: {
            positions: countBy(readers.rows, (r) => r.position, limits.positions),
            accessSources,
            countries: countBy(readers.rows, (r) => r.country),
        },
        articles: {
            topics: groupSumTopN(articles.rows, (a) => classifyTopic(a.title), (a) => a.articleReads, limits.topics),
            keywords: rankTerms(tokenizeTitles(articles.rows.map((a) => a.title)), limits.keywords),
            topArticles: topArticles(articles.rows, limits.articles),
        },
        authors: {
            topAuthors: groupSumTopN(articles.rows, (a) => a.authorName, (a) => a.articleReads, limits.authors),
        },
    };
}

function formatCount(value: number): string {
    return value.toLocaleString('en-US');
}

/**
 * Calendar day in local time (YYYY-MM-DD), matching how dates are parsed.
 */
export function formatDay(date: Date | null): string {
    if (!date) return 'n/a';
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function rankedSection(title: string, entries: RankedEntry[] | null): string[] {
    const lines = [`  ${title}`];
    if (entries === null) {
        lines.push('    (not available)');
    } else if (entries.length === 0) {
        lines.push('    (no data)');
    } else {
        for (const { key, total } of entries) {
            lines.push(`    ${key}: ${formatCount(total)}`);
        }
    }
    return lines;
}

/**
 * Plain-text rendering of a summary for the terminal.
 */
export function renderTextReport(summary: DashboardSummary): string {
    const { selection, kpis } = summary;
    const lines: string[] = [
        '',
        'Readership Analytics',
        '',
        `  Country:  ${selection.country}`,
        `  Industry: ${selection.industry}`,
        `  Window:   ${TIME_WINDOW_LABELS[selection.window]}`,
        '',
        `  Total Readers: ${formatCount(kpis.totalReaders)}`,
        `  Total Reads:   ${formatCount(kpis.totalReads)}`,
        '',
        'Reader Insights',
        ...rankedSection('Job Positions', summary.readers.positions),
        ...rankedSection('Access Source', summary.readers.accessSources),
        ...rankedSection('Readers by Country', summary.readers.countries),
        '',
        'Article Insights',
        ...rankedSection('Top Topics by Article Reads', summary.articles.topics),
        ...rankedSection('Common Title Terms', summary.articles.keywords),
        '  Top Articles',
    ];

    if (summary.articles.topArticles.length === 0) {
        lines.push('    (no data)');
    }
    for (const article of summary.articles.topArticles) {
        lines.push(`    ${article.title ?? '(untitled)'}`);
        lines.push(
            `      ${formatDay(article.date)} | ${article.authorName ?? 'unknown author'} | Reads: ${article.articleReads ?? 'n/a'}`
        );
    }

    lines.push('', 'Author Insights', ...rankedSection('Top Authors by Total Reads', summary.authors.topAuthors), '');
    return lines.join('\n');
}
