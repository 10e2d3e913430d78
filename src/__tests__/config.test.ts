import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'readerlens-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(config: unknown): void {
        writeFileSync(join(dir, 'readerlens.config.json'), JSON.stringify(config), 'utf-8');
    }

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: dir, env: {} });
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should merge nested groups from the config file and CLI flags', async () => {
        writeConfig({ country: 'Germany', limits: { topics: 3 }, sources: { delimiter: ';' } });

        const config = await resolveConfig(
            { industry: 'Legal', limits: { authors: 4 } },
            { searchFrom: dir, env: {} }
        );

        expect(config.country).toBe('Germany');
        expect(config.industry).toBe('Legal');
        expect(config.limits).toEqual({ topics: 3, authors: 4, positions: 10, keywords: 15, articles: 5 });
        expect(config.sources.delimiter).toBe(';');
        expect(config.sources.readers).toBe('Reader-Analytics.csv');
    });

    it('should let CLI flags win over the config file', async () => {
        writeConfig({ window: 'last-30-days', country: 'Germany' });

        const config = await resolveConfig({ window: 'last-7-days' }, { searchFrom: dir, env: {} });
        expect(config.window).toBe('last-7-days');
        expect(config.country).toBe('Germany');
    });

    it('should resolve default file names against READERLENS_DATA_DIR', async () => {
        const config = await resolveConfig(
            { sources: { authors: 'mine.csv' } },
            { searchFrom: dir, env: { READERLENS_DATA_DIR: '/data/exports' } }
        );

        expect(config.sources.readers).toBe(join('/data/exports', 'Reader-Analytics.csv'));
        expect(config.sources.articles).toBe(join('/data/exports', 'Article-Analytics.csv'));
        expect(config.sources.authors).toBe('mine.csv');
    });

    it('should read the log level from the environment below CLI flags', async () => {
        const fromEnv = await resolveConfig({}, { searchFrom: dir, env: { READERLENS_LOG_LEVEL: 'DEBUG' } });
        expect(fromEnv.logLevel).toBe('debug');

        const fromCli = await resolveConfig(
            { logLevel: 'warn' },
            { searchFrom: dir, env: { READERLENS_LOG_LEVEL: 'debug' } }
        );
        expect(fromCli.logLevel).toBe('warn');
    });

    it('should reject an invalid environment log level', async () => {
        await expect(
            resolveConfig({}, { searchFrom: dir, env: { READERLENS_LOG_LEVEL: 'loud' } })
        ).rejects.toThrow(ConfigError);
    });

    it('should reject invalid config file values', async () => {
        writeConfig({ window: 'forever' });
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject unknown config keys', async () => {
        writeConfig({ limits: { topcs: 3 } });
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(/limits/);
    });
});
