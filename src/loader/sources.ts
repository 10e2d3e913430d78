import { readFileSync } from 'node:fs';
import type {
    ReaderRecord,
    ArticleRecord,
    AuthorRecord,
    Dataset,
    DataSources,
    Table,
} from '../types/index.js';
import { joinArticlesWithAuthors } from '../pipeline/joiner.js';
import { DataSourceError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    parseTable,
    requireColumns,
    toText,
    toNumber,
    parseDate,
    extraColumns,
    type RawRow,
} from './csv.js';

export const READER_COLUMNS = ['Email', 'Country', 'Industry', 'Position', 'Reads', 'Last Access Date'] as const;
export const ARTICLE_COLUMNS = ['Title', 'Date', 'Author Id', 'Reads'] as const;
export const AUTHOR_COLUMNS = ['Author Id', 'Author Name'] as const;

/** Optional reader column holding the access source */
export const ACTIVITY_DESC = 'Activity Desc';

const ARTICLE_MODELLED: ReadonlySet<string> = new Set([...ARTICLE_COLUMNS, 'Author Name']);
const AUTHOR_MODELLED: ReadonlySet<string> = new Set(AUTHOR_COLUMNS);

/**
 * Parse a date column, logging how many non-blank values could not be read.
 */
function parseDates(source: string, column: string, rows: RawRow[]): Array<Date | null> {
    let unparseable = 0;
    const dates = rows.map((row) => {
        const date = parseDate(row[column]);
        if (date === null && toText(row[column]) !== null) unparseable++;
        return date;
    });

    if (unparseable > 0) {
        getLogger().warn({ source, column, unparseable, total: rows.length }, 'Unparseable dates treated as missing');
    }
    return dates;
}

export function parseReaders(text: string, delimiter = ','): Table<ReaderRecord> {
    const { columns, rows } = parseTable(text, delimiter);
    requireColumns('reader', columns, READER_COLUMNS);

    const dates = parseDates('reader', 'Last Access Date', rows);

    return {
        columns,
        rows: rows.map((row, i) => ({
            email: toText(row['Email']),
            country: toText(row['Country']),
            industry: toText(row['Industry']),
            position: toText(row['Position']),
            activityDesc: toText(row[ACTIVITY_DESC]),
            reads: toNumber(row['Reads']),
            lastAccessDate: dates[i] ?? null,
        })),
    };
}

export function parseArticles(text: string, delimiter = ','): Table<ArticleRecord> {
    const { columns, rows } = parseTable(text, delimiter);
    requireColumns('article', columns, ARTICLE_COLUMNS);

    const dates = parseDates('article', 'Date', rows);
    const hasAuthorName = columns.includes('Author Name');

    return {
        columns,
        rows: rows.map((row, i) => {
            const record: ArticleRecord = {
                title: toText(row['Title']),
                date: dates[i] ?? null,
                authorId: toText(row['Author Id']),
                reads: toNumber(row['Reads']),
                extra: extraColumns(row, ARTICLE_MODELLED),
            };
            if (hasAuthorName) record.authorName = toText(row['Author Name']);
            return record;
        }),
    };
}

export function parseAuthors(text: string, delimiter = ','): Table<AuthorRecord> {
    const { columns, rows } = parseTable(text, delimiter);
    requireColumns('author', columns, AUTHOR_COLUMNS);

    return {
        columns,
        rows: rows.map((row) => ({
            authorId: toText(row['Author Id']),
            authorName: toText(row['Author Name']),
            extra: extraColumns(row, AUTHOR_MODELLED),
        })),
    };
}

function readSource(source: string, path: string): string {
    try {
        return readFileSync(path, 'utf-8');
    } catch (error) {
        throw new DataSourceError(`Cannot read ${source} source at ${path}`, {
            cause: error,
            details: { source, path },
        });
    }
}

/**
 * Read, type and join the three sources. Same files in, same dataset out.
 */
export function loadDataset(sources: DataSources): Dataset {
    const readers = parseReaders(readSource('reader', sources.readers), sources.delimiter);
    const articles = parseArticles(readSource('article', sources.articles), sources.delimiter);
    const authors = parseAuthors(readSource('author', sources.authors), sources.delimiter);
    const joined = joinArticlesWithAuthors(articles, authors);

    getLogger().info(
        {
            readers: readers.rows.length,
            articles: articles.rows.length,
            authors: authors.rows.length,
        },
        'Loaded data sources'
    );

    return { readers, articles, authors, joined };
}
