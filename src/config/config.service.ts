// src/config/config.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import path from 'path';
import { LevelWithSilent } from 'pino';

import { envSchema } from './schemas';
import {
    AppConfig,
    CacheOptions,
    ChunkingOptions,
    DispatchOptions,
    ENV_SOURCE,
    EnvSource,
    LlmOptions,
    RateLimitOptions,
} from './types';
import { ConfigurationError } from '../errors/analysis.errors';
import { LogSeverity } from '../types/logAnalysis.types';

/**
 * Validated, immutable view of the process configuration.
 * Values are read once at construction and never change afterwards.
 */
@singleton()
export class ConfigService {
    public readonly config: Readonly<AppConfig>;

    constructor(@inject(ENV_SOURCE) env: EnvSource) {
        const parsed = envSchema.safeParse(env);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
        }

        const config = parsed.data;
        if (config.CORS_ALLOWED_ORIGINS.length === 0) {
            config.CORS_ALLOWED_ORIGINS = ['*'];
        }
        this.config = Object.freeze(config);
    }

    // --- General ---
    get nodeEnv(): AppConfig['NODE_ENV'] { return this.config.NODE_ENV; }
    get isProduction(): boolean { return this.config.NODE_ENV === 'production'; }
    get port(): number { return this.config.PORT; }
    get corsAllowedOrigins(): string[] { return this.config.CORS_ALLOWED_ORIGINS; }
    get analysisTimeoutMs(): number { return this.config.ANALYSIS_TIMEOUT_MS; }
    get uploadMaxBytes(): number { return this.config.UPLOAD_MAX_BYTES; }
    get uploadRateLimitPerMinute(): number { return this.config.UPLOAD_RATE_LIMIT_PER_MINUTE; }

    // --- Logging ---
    get logLevel(): LevelWithSilent { return this.config.LOG_LEVEL; }
    get logToConsole(): boolean { return this.config.LOG_TO_CONSOLE; }
    get logToFile(): boolean { return this.config.LOG_TO_FILE; }
    get logsDirectory(): string { return path.resolve(this.config.LOGS_DIRECTORY); }
    get appLogFilePath(): string { return path.join(this.logsDirectory, this.config.APP_LOG_FILE_NAME); }
    get analysisLogFilePath(): string { return path.join(this.logsDirectory, this.config.ANALYSIS_LOG_FILE_NAME); }

    // --- Pipeline ---
    get chunking(): ChunkingOptions {
        return { chunkSize: this.config.CHUNK_SIZE, chunkOverlap: this.config.CHUNK_OVERLAP };
    }

    get dispatch(): DispatchOptions {
        return {
            maxConcurrentRequests: this.config.MAX_CONCURRENT_REQUESTS,
            backendMaxRetries: this.config.BACKEND_MAX_RETRIES,
            backendInitialDelayMs: this.config.BACKEND_INITIAL_DELAY_MS,
            backendMaxDelayMs: this.config.BACKEND_MAX_DELAY_MS,
            rateLimitMaxRetries: this.config.RATE_LIMIT_MAX_RETRIES,
            rateLimitMaxWaitMs: this.config.RATE_LIMIT_MAX_WAIT_MS,
        };
    }

    get rateLimits(): RateLimitOptions {
        return {
            perMinute: this.config.RATE_LIMIT_PER_MINUTE,
            perHour: this.config.RATE_LIMIT_PER_HOUR,
            perDay: this.config.RATE_LIMIT_PER_DAY,
        };
    }

    get cache(): CacheOptions {
        return {
            enabled: this.config.CACHE_ENABLED,
            maxEntries: this.config.CACHE_MAX_ENTRIES,
            ttlSeconds: this.config.CACHE_TTL_SECONDS,
            directory: this.config.CACHE_DIRECTORY ? path.resolve(this.config.CACHE_DIRECTORY) : undefined,
        };
    }

    get llm(): LlmOptions {
        return {
            apiKey: this.config.GEMINI_API_KEY,
            model: this.config.LLM_MODEL,
            temperature: this.config.LLM_TEMPERATURE,
            maxOutputTokens: this.config.LLM_MAX_OUTPUT_TOKENS,
        };
    }

    get promptsDirectory(): string { return path.resolve(this.config.PROMPTS_DIRECTORY); }

    get preprocessing(): { enabled: boolean; filterDebug: boolean; minSeverity: LogSeverity } {
        return {
            enabled: this.config.PREPROCESS_LOGS,
            filterDebug: this.config.FILTER_DEBUG,
            minSeverity: this.config.MIN_LOG_SEVERITY,
        };
    }

    // --- Cost ---
    get costLedgerPath(): string | undefined {
        return this.config.COST_LEDGER_PATH ? path.resolve(this.config.COST_LEDGER_PATH) : undefined;
    }
    get dailyBudgetUsd(): number | undefined { return this.config.DAILY_BUDGET_USD; }
    get monthlyBudgetUsd(): number | undefined { return this.config.MONTHLY_BUDGET_USD; }
}
