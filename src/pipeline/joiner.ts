import type { ArticleRecord, AuthorRecord, JoinedArticleRecord, Table } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Article columns that are modelled as fields rather than carried in `extra` */
const ARTICLE_FIELDS = new Set(['Title', 'Date', 'Author Id', 'Reads', 'Author Name']);

/**
 * Author ids that occur on more than one author row, in first-seen order.
 */
export function findDuplicateAuthorIds(authors: Table<AuthorRecord>): string[] {
    const counts = new Map<string, number>();
    for (const author of authors.rows) {
        if (author.authorId === null) continue;
        counts.set(author.authorId, (counts.get(author.authorId) ?? 0) + 1);
    }
    return [...counts].filter(([, count]) => count > 1).map(([id]) => id);
}

/**
 * Column names present on both sides, other than the join key.
 */
function sharedColumns(articleColumns: string[], authorColumns: string[]): Set<string> {
    const authorSet = new Set(authorColumns);
    return new Set(articleColumns.filter((name) => name !== 'Author Id' && authorSet.has(name)));
}

function mergeExtras(
    article: ArticleRecord,
    author: AuthorRecord | undefined,
    shared: Set<string>
): Record<string, string> {
    const extra: Record<string, string> = {};

    for (const [name, value] of Object.entries(article.extra)) {
        extra[shared.has(name) ? `${name}_article` : name] = value;
    }

    if (!author) return extra;

    for (const [name, value] of Object.entries(author.extra)) {
        extra[shared.has(name) ? `${name}_author` : name] = value;
    }

    // Both sides named the author: the article side is canonical
    if (shared.has('Author Name') && author.authorName !== null) {
        extra['Author Name_author'] = author.authorName;
    }

    return extra;
}

function joinRow(
    article: ArticleRecord,
    author: AuthorRecord | undefined,
    shared: Set<string>
): JoinedArticleRecord {
    const authorName = article.authorName !== undefined
        ? article.authorName
        : author?.authorName ?? null;

    return {
        title: article.title,
        date: article.date,
        authorId: article.authorId,
        articleReads: article.reads,
        authorName,
        extra: mergeExtras(article, author, shared),
    };
}

/**
 * Left-join articles to authors on exact `authorId` equality.
 *
 * Every article is emitted. Unmatched (or null) author ids produce a null
 * `authorName`. Duplicate author ids fan out: an article matching two author
 * rows is emitted twice, once per author row, in author-table order.
 */
export function joinArticlesWithAuthors(
    articles: Table<ArticleRecord>,
    authors: Table<AuthorRecord>
): Table<JoinedArticleRecord> {
    const byId = new Map<string, AuthorRecord[]>();
    for (const author of authors.rows) {
        if (author.authorId === null) continue;
        const bucket = byId.get(author.authorId);
        if (bucket) {
            bucket.push(author);
        } else {
            byId.set(author.authorId, [author]);
        }
    }

    const duplicates = findDuplicateAuthorIds(authors);
    if (duplicates.length > 0) {
        getLogger().warn(
            { duplicates: duplicates.slice(0, 10), count: duplicates.length },
            'Author source has duplicate author ids; matching articles will appear once per author row'
        );
    }

    const shared = sharedColumns(articles.columns, authors.columns);
    const rows: JoinedArticleRecord[] = [];
    let unmatched = 0;

    for (const article of articles.rows) {
        const matches = article.authorId !== null ? byId.get(article.authorId) : undefined;
        if (!matches) {
            unmatched++;
            rows.push(joinRow(article, undefined, shared));
            continue;
        }
        for (const author of matches) {
            rows.push(joinRow(article, author, shared));
        }
    }

    getLogger().debug({ articles: articles.rows.length, joined: rows.length, unmatched }, 'Joined articles with authors');

    return { columns: joinedColumns(articles.columns, authors.columns), rows };
}

/**
 * Output column names after collision renaming.
 */
export function joinedColumns(articleColumns: string[], authorColumns: string[]): string[] {
    const shared = sharedColumns(articleColumns, authorColumns);
    const columns: string[] = [];

    for (const name of articleColumns) {
        if (name === 'Reads') {
            columns.push('Article Reads');
        } else if (ARTICLE_FIELDS.has(name) || !shared.has(name)) {
            columns.push(name);
        } else {
            columns.push(`${name}_article`);
        }
    }

    for (const name of authorColumns) {
        if (name === 'Author Id') continue;
        columns.push(shared.has(name) ? `${name}_author` : name);
    }

    return columns;
}
