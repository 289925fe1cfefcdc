// src/config/schemas.ts
import { z } from 'zod';
import { LevelWithSilent } from 'pino';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a comma-separated string from an environment variable into an array of trimmed strings.
 */
export const parseCommaSeparatedString = (val: string | undefined): string[] => {
    if (!val) {
        return [];
    }
    return val.split(',').map(item => item.trim()).filter(item => item !== '');
};

const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.enum(['true', 'false']).default(defaultValue).transform(val => val === 'true');

/** Empty strings in .env files mean "not set". */
const optionalString = z.preprocess(
    val => (typeof val === 'string' && val.trim() === '' ? undefined : val),
    z.string().optional(),
);

const optionalPositiveNumber = z.preprocess(
    val => (typeof val === 'string' && val.trim() === '' ? undefined : val),
    z.coerce.number().positive().optional(),
);

// --- Zod Schema Definition for Environment Variables ---
/**
 * Structure and validation rules for the environment.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- General Server Configuration ---
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ALLOWED_ORIGINS: z.string().optional().transform(parseCommaSeparatedString),
    /** Hard ceiling on one analysis request, in milliseconds. */
    ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    /** Per-client-IP ceiling on analysis uploads. */
    UPLOAD_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as [LevelWithSilent, ...LevelWithSilent[]]).default('info'),
    LOG_TO_CONSOLE: booleanFlag('true'),
    LOG_TO_FILE: booleanFlag('false'),
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('app.log'),
    ANALYSIS_LOG_FILE_NAME: z.string().default('analysis.log'),

    // --- Chunking ---
    CHUNK_SIZE: z.coerce.number().int().positive().default(2000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),

    // --- Dispatch ---
    /** Maximum number of backend invocations in flight for one document. */
    MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(5),
    BACKEND_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    BACKEND_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    BACKEND_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),

    // --- Response Cache ---
    CACHE_ENABLED: booleanFlag('true'),
    /** 0 keeps every entry until restart. */
    CACHE_MAX_ENTRIES: z.coerce.number().int().nonnegative().default(1000),
    /** 0 disables age-based expiry. */
    CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(86400),
    /** When set, entries are also written through to one JSON file per fingerprint. */
    CACHE_DIRECTORY: optionalString,

    // --- Rate Limiting (process-wide, per backend invocation) ---
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
    RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_PER_DAY: z.coerce.number().int().positive().default(1000),
    /** Denials tolerated per invocation before the segment fails. */
    RATE_LIMIT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    /** Upper bound on a single wait after a denial. */
    RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().nonnegative().default(60000),

    // --- Language Model Backend ---
    GEMINI_API_KEY: optionalString,
    LLM_MODEL: z.string().min(1).default('gemini-2.0-flash'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
    PROMPTS_DIRECTORY: z.string().default('./prompts'),

    // --- Preprocessing ---
    PREPROCESS_LOGS: booleanFlag('true'),
    FILTER_DEBUG: booleanFlag('true'),
    MIN_LOG_SEVERITY: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL']).default('WARN'),

    // --- Cost Accounting ---
    /** Append-only JSONL ledger of cost records. Memory only when unset. */
    COST_LEDGER_PATH: optionalString,
    DAILY_BUDGET_USD: optionalPositiveNumber,
    MONTHLY_BUDGET_USD: optionalPositiveNumber,
}).superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['CHUNK_OVERLAP'],
            message: `CHUNK_OVERLAP (${env.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
        });
    }
    if (env.BACKEND_MAX_DELAY_MS < env.BACKEND_INITIAL_DELAY_MS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['BACKEND_MAX_DELAY_MS'],
            message: 'BACKEND_MAX_DELAY_MS must not be smaller than BACKEND_INITIAL_DELAY_MS',
        });
    }
});

export type EnvInput = z.input<typeof envSchema>;
