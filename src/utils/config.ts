import { isAbsolute, join } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ReaderLensConfig, type DataSources, type LimitsConfig } from '../types/index.js';
import { TIME_WINDOWS } from '../pipeline/filters.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silent'] as const;

const positiveInt = z.number().int().positive();

/**
 * Shape of readerlens.config.json. Every key is optional.
 */
export const fileConfigSchema = z
    .object({
        sources: z
            .object({
                readers: z.string().min(1),
                articles: z.string().min(1),
                authors: z.string().min(1),
                delimiter: z.string().length(1, 'delimiter must be a single character'),
            })
            .partial()
            .strict()
            .optional(),
        country: z.string().min(1).optional(),
        industry: z.string().min(1).optional(),
        window: z.enum(TIME_WINDOWS).optional(),
        limits: z
            .object({
                topics: positiveInt,
                authors: positiveInt,
                positions: positiveInt,
                keywords: positiveInt,
                articles: positiveInt,
            })
            .partial()
            .strict()
            .optional(),
        logLevel: z.enum(LOG_LEVELS).optional(),
        jsonLogs: z.boolean().optional(),
    })
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Values supplied on the command line. Nested groups may be partial.
 */
export type ConfigOverrides = Partial<Omit<ReaderLensConfig, 'sources' | 'limits'>> & {
    sources?: Partial<DataSources>;
    limits?: Partial<LimitsConfig>;
};

export interface ResolveConfigOptions {
    /** Directory to look for readerlens.config.json in (default: cwd) */
    searchFrom?: string;
    /** Environment to read READERLENS_* variables from (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from readerlens.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('readerlens', {
        searchPlaces: ['readerlens.config.json'],
    });

    const result = await explorer.search(searchFrom).catch((error: unknown) => {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    });
    if (!result || result.isEmpty) return null;

    const filepath = result.filepath;
    const raw: unknown = result.config;

    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const messages = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid config file ${filepath}: ${messages.join(', ')}`, {
            details: { path: filepath },
        });
    }

    getLogger().debug({ path: filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): { dataDir?: string; config: ConfigOverrides } {
    const config: ConfigOverrides = {};

    const level = env['READERLENS_LOG_LEVEL'];
    if (level) {
        const parsed = z.enum(LOG_LEVELS).safeParse(level.trim().toLowerCase());
        if (!parsed.success) {
            throw new ConfigError(`READERLENS_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = parsed.data;
    }

    const dataDir = env['READERLENS_DATA_DIR']?.trim();
    return dataDir ? { dataDir, config } : { config };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * READERLENS_DATA_DIR resolves relative source paths that did not come
 * from the command line.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: ResolveConfigOptions = {}
): Promise<ReaderLensConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const { dataDir, config: envConfig } = loadEnvVars(options.env ?? process.env);

    const fileSources: DataSources = { ...DEFAULT_CONFIG.sources, ...fileConfig?.sources };
    if (dataDir) {
        for (const key of ['readers', 'articles', 'authors'] as const) {
            if (!isAbsolute(fileSources[key])) {
                fileSources[key] = join(dataDir, fileSources[key]);
            }
        }
    }

    // Deep merge with precedence. Overrides carry only the keys that were set.
    const merged: ReaderLensConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        sources: {
            ...fileSources,
            ...cliFlags.sources,
        },
        limits: {
            ...DEFAULT_CONFIG.limits,
            ...fileConfig?.limits,
            ...cliFlags.limits,
        },
    };

    return merged;
}
