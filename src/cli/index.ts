#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { loadDataset } from '../loader/sources.js';
import { DatasetCache } from '../cache/dataset-cache.js';
import { filterOptions, parseTimeWindow, TIME_WINDOW_LABELS } from '../pipeline/filters.js';
import { buildDashboard, renderTextReport } from '../report/dashboard.js';
import { exportSummary, isExportFormat, EXPORT_FORMATS, EXPORT_EXTENSIONS } from '../exporters/export.js';
import type { ReaderLensConfig, DataSources, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface SharedOptions {
    readers?: string;
    articles?: string;
    authors?: string;
    delimiter?: string;
    country?: string;
    industry?: string;
    window?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

const program = new Command();

program
    .name('readerlens')
    .description('Summarise readership, article and author analytics from CSV exports.')
    .version(VERSION);

function withSharedOptions(command: Command): Command {
    return command
        .option('--readers <path>', 'Reader source file')
        .option('--articles <path>', 'Article source file')
        .option('--authors <path>', 'Author source file')
        .option('--delimiter <char>', 'Field delimiter of the source files')
        .option('-c, --country <country>', 'Filter readers by country ("All" for every country)')
        .option('-i, --industry <industry>', 'Filter readers by industry ("All" for every industry)')
        .option('-w, --window <window>', 'Time window: all-time | last-7-days | last-30-days | last-90-days')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Turn parsed flags into config overrides, leaving unset flags out.
 */
function toOverrides(opts: SharedOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const sources: Partial<DataSources> = {};

    if (opts.readers) sources.readers = opts.readers;
    if (opts.articles) sources.articles = opts.articles;
    if (opts.authors) sources.authors = opts.authors;
    if (opts.delimiter) sources.delimiter = opts.delimiter;
    if (Object.keys(sources).length > 0) overrides.sources = sources;

    if (opts.country) overrides.country = opts.country;
    if (opts.industry) overrides.industry = opts.industry;
    if (opts.window) overrides.window = parseTimeWindow(opts.window);
    if (opts.logLevel) overrides.logLevel = parseLogLevel(opts.logLevel);
    if (opts.jsonLogs) overrides.jsonLogs = true;

    return overrides;
}

function parseLogLevel(value: string): LogLevel {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            throw new Error(`Invalid log level: ${value}. Valid: debug, info, warn, error, silent`);
    }
}

async function prepare(opts: SharedOptions): Promise<{ config: ReaderLensConfig; cache: DatasetCache }> {
    const config = await resolveConfig(toOverrides(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const cache = new DatasetCache(() => loadDataset(config.sources));
    return { config, cache };
}

function fail(message: string, error: unknown): never {
    getLogger().error({ error }, message);
    process.exit(1);
}

// ─── SUMMARY command ──────────────────────────────────────

withSharedOptions(program.command('summary'))
    .description('Print KPIs and ranked insights for a filter selection')
    .option('--json', 'Print the summary as JSON', false)
    .action(async (opts: SharedOptions & { json: boolean }) => {
        try {
            const { config, cache } = await prepare(opts);
            const summary = buildDashboard(
                cache.get(),
                { country: config.country, industry: config.industry, window: config.window },
                { limits: config.limits }
            );
            console.log(opts.json ? JSON.stringify(summary, null, 2) : renderTextReport(summary));
        } catch (error) {
            fail('Summary failed', error);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

withSharedOptions(program.command('export'))
    .description('Write the summary to JSON, Markdown, or CSV')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: SharedOptions & { format: string; out?: string }) => {
        const format = opts.format.toLowerCase();

        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exit(1);
        }

        const outputPath = opts.out ?? `readerlens-summary${EXPORT_EXTENSIONS[format]}`;

        try {
            const { config, cache } = await prepare(opts);
            const summary = buildDashboard(
                cache.get(),
                { country: config.country, industry: config.industry, window: config.window },
                { limits: config.limits }
            );
            exportSummary(summary, outputPath, format);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            fail('Export failed', error);
        }
    });

// ─── OPTIONS command ──────────────────────────────────────

withSharedOptions(program.command('options'))
    .description('List the available filter values')
    .action(async (opts: SharedOptions) => {
        try {
            const { cache } = await prepare(opts);
            const options = filterOptions(cache.get().readers);

            console.log('\nCountries:');
            for (const country of options.countries) console.log(`  ${country}`);
            console.log('\nIndustries:');
            for (const industry of options.industries) console.log(`  ${industry}`);
            console.log('\nTime windows:');
            for (const { value } of options.windows) console.log(`  ${value} (${TIME_WINDOW_LABELS[value]})`);
            console.log('');
        } catch (error) {
            fail('Listing options failed', error);
        }
    });

await program.parseAsync();
