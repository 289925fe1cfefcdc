// src/config/config.service.test.ts
import 'reflect-metadata';
import path from 'path';
import { ConfigService } from './config.service';
import { ConfigurationError } from '../errors/analysis.errors';

describe('ConfigService', () => {
    it('applies defaults for an empty environment', () => {
        const config = new ConfigService({});

        expect(config.port).toBe(3001);
        expect(config.chunking).toEqual({ chunkSize: 2000, chunkOverlap: 200 });
        expect(config.dispatch.maxConcurrentRequests).toBe(5);
        expect(config.rateLimits).toEqual({ perMinute: 10, perHour: 100, perDay: 1000 });
        expect(config.cache).toEqual({ enabled: true, maxEntries: 1000, ttlSeconds: 86400, directory: undefined });
        expect(config.llm).toEqual({ apiKey: undefined, model: 'gemini-2.0-flash', temperature: 0.2, maxOutputTokens: 2048 });
        expect(config.corsAllowedOrigins).toEqual(['*']);
        expect(config.costLedgerPath).toBeUndefined();
        expect(config.dailyBudgetUsd).toBeUndefined();
    });

    it('parses numbers, booleans and lists from strings', () => {
        const config = new ConfigService({
            CHUNK_SIZE: '500',
            CHUNK_OVERLAP: '50',
            CACHE_ENABLED: 'false',
            CORS_ALLOWED_ORIGINS: 'http://a.test, http://b.test',
            LLM_TEMPERATURE: '0.7',
            DAILY_BUDGET_USD: '2.5',
        });

        expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50 });
        expect(config.cache.enabled).toBe(false);
        expect(config.corsAllowedOrigins).toEqual(['http://a.test', 'http://b.test']);
        expect(config.llm.temperature).toBe(0.7);
        expect(config.dailyBudgetUsd).toBe(2.5);
    });

    it('treats empty strings as unset for optional keys', () => {
        const config = new ConfigService({ GEMINI_API_KEY: '', CACHE_DIRECTORY: '  ', MONTHLY_BUDGET_USD: '' });

        expect(config.llm.apiKey).toBeUndefined();
        expect(config.cache.directory).toBeUndefined();
        expect(config.monthlyBudgetUsd).toBeUndefined();
    });

    it('resolves directories to absolute paths', () => {
        const config = new ConfigService({ CACHE_DIRECTORY: 'var/cache', COST_LEDGER_PATH: 'var/costs.jsonl' });

        expect(config.cache.directory).toBe(path.resolve('var/cache'));
        expect(config.costLedgerPath).toBe(path.resolve('var/costs.jsonl'));
    });

    it('rejects an overlap that is not smaller than the chunk size', () => {
        expect(() => new ConfigService({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(ConfigurationError);
    });

    it('lists every invalid key in the error', () => {
        let caught: unknown;
        try {
            new ConfigService({ PORT: 'not-a-port', CACHE_ENABLED: 'yes' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        const issues = caught instanceof ConfigurationError ? caught.issues : [];
        expect(issues).toHaveLength(2);
        expect(issues.some(issue => issue.startsWith('PORT:'))).toBe(true);
        expect(issues.some(issue => issue.startsWith('CACHE_ENABLED:'))).toBe(true);
    });

    it('freezes the parsed configuration', () => {
        const config = new ConfigService({});
        expect(Object.isFrozen(config.config)).toBe(true);
    });
});
