/**
 * Record shapes for the three readership sources and the joined article view.
 * String cells that are blank in the source are carried as null.
 */

/**
 * One reader access row. The same email may appear on several rows.
 */
export interface ReaderRecord {
    email: string | null;
    country: string | null;
    industry: string | null;
    position: string | null;

    /** Access source ("Activity Desc"); null when blank or when the column is absent */
    activityDesc: string | null;

    /** Read count, null when blank or non-numeric */
    reads: number | null;

    lastAccessDate: Date | null;
}

export interface ArticleRecord {
    title: string | null;
    date: Date | null;
    authorId: string | null;
    reads: number | null;

    /** Only set when the article source carries its own "Author Name" column */
    authorName?: string | null;

    /** Every other column of the row, keyed by trimmed column name */
    extra: Record<string, string>;
}

export interface AuthorRecord {
    authorId: string | null;
    authorName: string | null;
    extra: Record<string, string>;
}

/**
 * Article row left-joined with its author.
 */
export interface JoinedArticleRecord {
    title: string | null;
    date: Date | null;
    authorId: string | null;

    /** Article-side "Reads" */
    articleReads: number | null;

    /** Null when the author id has no match */
    authorName: string | null;

    /**
     * Remaining columns from both sides. Names present on both sides are
     * suffixed `_article` / `_author`.
     */
    extra: Record<string, string>;
}

/**
 * A parsed table: trimmed header plus typed rows.
 */
export interface Table<T> {
    columns: string[];
    rows: T[];
}

/**
 * The three loaded sources plus the joined article table.
 * Treated as immutable once loaded.
 */
export interface Dataset {
    readers: Table<ReaderRecord>;
    articles: Table<ArticleRecord>;
    authors: Table<AuthorRecord>;
    joined: Table<JoinedArticleRecord>;
}
