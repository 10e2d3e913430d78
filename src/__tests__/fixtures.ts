import type { ArticleRecord, AuthorRecord, JoinedArticleRecord, ReaderRecord, Table } from '../types/index.js';

export function reader(overrides: Partial<ReaderRecord> = {}): ReaderRecord {
    return {
        email: 'reader@example.com',
        country: 'Germany',
        industry: 'Legal',
        position: 'Partner',
        activityDesc: null,
        reads: 1,
        lastAccessDate: null,
        ...overrides,
    };
}

export function article(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
    return {
        title: 'Untitled',
        date: null,
        authorId: '1',
        reads: 0,
        extra: {},
        ...overrides,
    };
}

export function author(overrides: Partial<AuthorRecord> = {}): AuthorRecord {
    return {
        authorId: '1',
        authorName: 'Alice Smith',
        extra: {},
        ...overrides,
    };
}

export function joined(overrides: Partial<JoinedArticleRecord> = {}): JoinedArticleRecord {
    return {
        title: 'Untitled',
        date: null,
        authorId: '1',
        articleReads: 0,
        authorName: 'Alice Smith',
        extra: {},
        ...overrides,
    };
}

export function table<T>(columns: string[], rows: T[]): Table<T> {
    return { columns, rows };
}

export const READER_CSV = [
    'Email , Country,Industry,Position,Activity Desc,Reads, Last Access Date',
    'a@example.com,Germany,Legal,Partner,Email Alert,5,2024-06-28',
    'a@example.com,Germany,Legal,Partner,Website,3,2024-06-01',
    'b@example.com,France,Finance,Associate,Website,,2024-06-29',
    'c@example.com,,Legal,Partner,Website,2,bad-date',
].join('\n');

export const ARTICLE_CSV = [
    'Title,Date,Author Id,Reads',
    'Tax and ESG compliance update,2024-06-25,1,50',
    'Privacy rules for the digital age,2024-05-01,2,50',
    'Employment law outlook,2024-06-27,3,10',
    'Quarterly roundup,,9,7',
].join('\n');

export const AUTHOR_CSV = [
    'Author Id,Author Name',
    '1,Alice Smith',
    '2,Bob Jones',
    '3,Carol White',
].join('\n');

/** Fixed reference time: 30 June 2024, noon local time */
export const NOW = new Date(2024, 5, 30, 12, 0, 0);
