import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { exportSummary, formatSummary, isExportFormat } from '../exporters/export.js';
import { DatasetCache } from '../cache/dataset-cache.js';
import { parseReaders, parseArticles, parseAuthors } from '../loader/sources.js';
import { joinArticlesWithAuthors } from '../pipeline/joiner.js';
import { buildDashboard } from '../report/dashboard.js';
import type { Dataset, DashboardSummary } from '../types/index.js';
import { READER_CSV, ARTICLE_CSV, AUTHOR_CSV, NOW } from './fixtures.js';

function seedDataset(): Dataset {
    const articles = parseArticles(ARTICLE_CSV);
    const authors = parseAuthors(AUTHOR_CSV);
    return {
        readers: parseReaders(READER_CSV),
        articles,
        authors,
        joined: joinArticlesWithAuthors(articles, authors),
    };
}

function seedSummary(): DashboardSummary {
    return buildDashboard(seedDataset(), { country: 'All', industry: 'All', window: 'all-time' }, { now: NOW });
}

describe('Exporters', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'readerlens-export-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should export to JSON', () => {
        const outPath = join(dir, 'summary.json');
        exportSummary(seedSummary(), outPath, 'json');
        expect(existsSync(outPath)).toBe(true);

        const data = JSON.parse(readFileSync(outPath, 'utf-8'));
        expect(data.readerlens.version).toBe('1.0.0');
        expect(data.kpis).toEqual({ totalReaders: 3, totalReads: 10 });
        expect(data.selection).toEqual({ country: 'All', industry: 'All', window: 'all-time' });
        expect(data.articles.top_articles[0]).toEqual({
            title: 'Tax and ESG compliance update',
            author: 'Alice Smith',
            reads: 50,
            date: '2024-06-25',
        });
        expect(data.articles.top_articles[3].date).toBeNull();
    });

    it('should export to CSV in long format', () => {
        const outPath = join(dir, 'summary.csv');
        exportSummary(seedSummary(), outPath, 'csv');

        const lines = readFileSync(outPath, 'utf-8').split('\n');
        expect(lines.slice(0, 4)).toEqual([
            'section,key,value',
            'kpi,total_readers,3',
            'kpi,total_reads,10',
            'position,Partner,3',
        ]);
        expect(lines).toContain('topic,tax,50');
        expect(lines).toContain('author,Carol White,10');
        expect(lines).toContain('top_article,Quarterly roundup,7');
    });

    it('should export to Markdown', () => {
        const lines = formatSummary(seedSummary(), 'markdown').split('\n');

        expect(lines[0]).toBe('# Readership Analytics');
        expect(lines).toContain('- Total Readers: 3');
        expect(lines).toContain('| tax | 50 |');
        expect(lines).toContain('| Tax and ESG compliance update | Alice Smith | 50 | 2024-06-25 |');
        expect(lines).toContain('| Quarterly roundup |  | 7 |  |');
    });

    it('should write the same content it formats', () => {
        const summary = seedSummary();
        const outPath = join(dir, 'summary.md');
        exportSummary(summary, outPath, 'markdown');
        expect(readFileSync(outPath, 'utf-8')).toBe(formatSummary(summary, 'markdown'));
    });

    it('should recognise supported formats', () => {
        expect(isExportFormat('csv')).toBe(true);
        expect(isExportFormat('graphml')).toBe(false);
    });
});

describe('DatasetCache', () => {
    it('should load once and reuse the snapshot', () => {
        const loader = vi.fn(seedDataset);
        const cache = new DatasetCache(loader);

        expect(cache.isLoaded()).toBe(false);
        const first = cache.get();
        const second = cache.get();

        expect(second).toBe(first);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(cache.getStats()).toEqual({ loaded: true, loads: 1 });
    });

    it('should reload after clear', () => {
        const loader = vi.fn(seedDataset);
        const cache = new DatasetCache(loader);

        const first = cache.get();
        cache.clear();
        expect(cache.isLoaded()).toBe(false);

        const second = cache.get();
        expect(second).not.toBe(first);
        expect(second).toEqual(first);
        expect(loader).toHaveBeenCalledTimes(2);
    });

    it('should not cache a failed load', () => {
        const loader = vi.fn((): Dataset => {
            throw new Error('unreadable');
        });
        const cache = new DatasetCache(loader);

        expect(() => cache.get()).toThrow('unreadable');
        expect(cache.isLoaded()).toBe(false);
    });
});
