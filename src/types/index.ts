/**
 * Barrel export for all shared types.
 */
export type {
    ReaderRecord,
    ArticleRecord,
    AuthorRecord,
    JoinedArticleRecord,
    Table,
    Dataset,
} from './records.js';
export type {
    RankedEntry,
    ArticleHighlight,
    FilterSelection,
    DashboardKpis,
    ReaderInsights,
    ArticleInsights,
    AuthorInsights,
    DashboardSummary,
} from './summary.js';
export { DEFAULT_CONFIG } from './config.js';
export type { ReaderLensConfig, DataSources, LimitsConfig, LogLevel } from './config.js';
