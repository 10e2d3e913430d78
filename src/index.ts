/**
 * Library entry point: the pipeline as pure functions over explicit tables.
 */
export * from './types/index.js';
export { parseTable, toNumber, parseDate, toText } from './loader/csv.js';
export {
    parseReaders,
    parseArticles,
    parseAuthors,
    loadDataset,
    READER_COLUMNS,
    ARTICLE_COLUMNS,
    AUTHOR_COLUMNS,
    ACTIVITY_DESC,
} from './loader/sources.js';
export { joinArticlesWithAuthors, findDuplicateAuthorIds, joinedColumns } from './pipeline/joiner.js';
export {
    ALL,
    TIME_WINDOWS,
    TIME_WINDOW_LABELS,
    parseTimeWindow,
    resolveCutoff,
    filterReaders,
    filterArticles,
    filterOptions,
} from './pipeline/filters.js';
export type { TimeWindow, ReaderFilter, FilterOptions } from './pipeline/filters.js';
export { groupSumTopN, countBy, rankTerms, topArticles, sumReads, countDistinct } from './pipeline/aggregators.js';
export { classifyTopic, TOPIC_KEYWORDS, OTHER_TOPIC } from './nlp/topics.js';
export type { Topic } from './nlp/topics.js';
export { tokenize, tokenizeTitles } from './nlp/tokenizer.js';
export { TITLE_STOPWORDS } from './nlp/stopwords.js';
export { DatasetCache } from './cache/dataset-cache.js';
export { buildDashboard, renderTextReport, formatDay } from './report/dashboard.js';
export type { BuildDashboardOptions } from './report/dashboard.js';
export { exportSummary, formatSummary, EXPORT_FORMATS } from './exporters/export.js';
export type { ExportFormat } from './exporters/export.js';
export { resolveConfig } from './utils/config.js';
export type { ConfigOverrides, ResolveConfigOptions } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    ReaderLensError,
    MissingColumnError,
    DataSourceError,
    InvalidSelectionError,
    ConfigError,
} from './utils/errors.js';
