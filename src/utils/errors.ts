export interface ReaderLensErrorOptions extends ErrorOptions {
    details?: Record<string, unknown>;
}

/**
 * Base class for structural failures that abort a load or a command.
 * Row-level problems (bad dates, bad numbers, unmatched authors) never
 * surface as errors; they become nulls.
 */
export class ReaderLensError extends Error {
    readonly code: string;

    readonly details: Record<string, unknown>;

    constructor(code: string, message: string, options: ReaderLensErrorOptions = {}) {
        const { details, ...errorOptions } = options;
        super(message, errorOptions);
        this.name = this.constructor.name;
        this.code = code;
        this.details = details ?? {};
    }
}

export class MissingColumnError extends ReaderLensError {
    readonly source: string;
    readonly column: string;

    constructor(source: string, column: string, available: string[]) {
        super('MISSING_COLUMN', `Column "${column}" not found in ${source} source`, {
            details: { source, column, available },
        });
        this.source = source;
        this.column = column;
    }
}

export class DataSourceError extends ReaderLensError {
    constructor(message: string, options: ReaderLensErrorOptions = {}) {
        super('DATA_SOURCE_UNREADABLE', message, options);
    }
}

export class InvalidSelectionError extends ReaderLensError {
    constructor(message: string, options: ReaderLensErrorOptions = {}) {
        super('INVALID_SELECTION', message, options);
    }
}

export class ConfigError extends ReaderLensError {
    constructor(message: string, options: ReaderLensErrorOptions = {}) {
        super('INVALID_CONFIG', message, options);
    }
}
