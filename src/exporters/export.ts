import { writeFileSync } from 'node:fs';
import { csvFormat } from 'd3-dsv';
import type { DashboardSummary, RankedEntry } from '../types/index.js';
import { TIME_WINDOW_LABELS } from '../pipeline/filters.js';
import { formatDay } from '../report/dashboard.js';
import { InvalidSelectionError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'markdown', 'csv'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    markdown: '.md',
    csv: '.csv',
};

export function isExportFormat(value: string): value is ExportFormat {
    const formats: readonly string[] = EXPORT_FORMATS;
    return formats.includes(value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Serialize a summary in the given format.
 */
export function formatSummary(summary: DashboardSummary, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(summary);
        case 'markdown':
            return exportMarkdown(summary);
        case 'csv':
            return exportCsv(summary);
        default:
            throw new InvalidSelectionError(`Unsupported export format: ${String(format)}`);
    }
}

/**
 * Write a summary to `outputPath`.
 */
export function exportSummary(summary: DashboardSummary, outputPath: string, format: ExportFormat): void {
    const content = formatSummary(summary, format);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ format, outputPath }, 'Summary exported');
}

// ─── Format Implementations ─────────────────────────────

function exportJson(summary: DashboardSummary): string {
    return JSON.stringify({
        readerlens: {
            version: '1.0.0',
            exported_at: summary.generatedAt,
        },
        selection: summary.selection,
        cutoff: summary.cutoff,
        rows: { readers: summary.readerRows, articles: summary.articleRows },
        kpis: summary.kpis,
        readers: summary.readers,
        articles: {
            topics: summary.articles.topics,
            keywords: summary.articles.keywords,
            top_articles: summary.articles.topArticles.map((a) => ({
                title: a.title,
                author: a.authorName,
                reads: a.articleReads,
                date: a.date ? formatDay(a.date) : null,
            })),
        },
        authors: summary.authors,
    }, null, 2);
}

function exportMarkdown(summary: DashboardSummary): string {
    const esc = (s: string | null) => (s ?? '').replace(/\|/g, '\\|');

    const table = (title: string, label: string, entries: RankedEntry[] | null): string[] => {
        const lines = [`### ${title}`, ''];
        if (entries === null || entries.length === 0) {
            lines.push(entries === null ? '_Not available._' : '_No data._', '');
            return lines;
        }
        lines.push(`| ${label} | Total |`, '| --- | ---: |');
        for (const { key, total } of entries) {
            lines.push(`| ${esc(key)} | ${total} |`);
        }
        lines.push('');
        return lines;
    };

    const lines = [
        '# Readership Analytics',
        '',
        `Country: **${esc(summary.selection.country)}** · Industry: **${esc(summary.selection.industry)}** · Window: **${TIME_WINDOW_LABELS[summary.selection.window]}**`,
        '',
        `- Total Readers: ${summary.kpis.totalReaders}`,
        `- Total Reads: ${summary.kpis.totalReads}`,
        '',
        '## Reader Insights',
        '',
        ...table('Job Positions', 'Position', summary.readers.positions),
        ...table('Access Source', 'Source', summary.readers.accessSources),
        ...table('Readers by Country', 'Country', summary.readers.countries),
        '## Article Insights',
        '',
        ...table('Top Topics by Article Reads', 'Topic', summary.articles.topics),
        ...table('Common Title Terms', 'Term', summary.articles.keywords),
        '### Top Articles',
        '',
    ];

    if (summary.articles.topArticles.length === 0) {
        lines.push('_No data._', '');
    } else {
        lines.push('| Title | Author | Reads | Date |', '| --- | --- | ---: | --- |');
        for (const a of summary.articles.topArticles) {
            lines.push(`| ${esc(a.title)} | ${esc(a.authorName)} | ${a.articleReads ?? ''} | ${a.date ? formatDay(a.date) : ''} |`);
        }
        lines.push('');
    }

    lines.push('## Author Insights', '', ...table('Top Authors by Total Reads', 'Author', summary.authors.topAuthors));
    return lines.join('\n');
}

/**
 * Long format: one row per (section, key, value).
 */
function exportCsv(summary: DashboardSummary): string {
    const rows: Array<{ section: string; key: string; value: string }> = [
        { section: 'kpi', key: 'total_readers', value: String(summary.kpis.totalReaders) },
        { section: 'kpi', key: 'total_reads', value: String(summary.kpis.totalReads) },
    ];

    const push = (section: string, entries: RankedEntry[] | null) => {
        for (const { key, total } of entries ?? []) {
            rows.push({ section, key, value: String(total) });
        }
    };

    push('position', summary.readers.positions);
    push('access_source', summary.readers.accessSources);
    push('country', summary.readers.countries);
    push('topic', summary.articles.topics);
    push('keyword', summary.articles.keywords);
    push('author', summary.authors.topAuthors);

    for (const a of summary.articles.topArticles) {
        rows.push({ section: 'top_article', key: a.title ?? '', value: a.articleReads === null ? '' : String(a.articleReads) });
    }

    return csvFormat(rows, ['section', 'key', 'value']);
}
