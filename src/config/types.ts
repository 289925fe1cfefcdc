// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * The validated environment, as produced by `envSchema`.
 */
export type AppConfig = z.infer<typeof envSchema>;

/** Raw key/value source the configuration is parsed from. */
export type EnvSource = Record<string, string | undefined>;

export const ENV_SOURCE = Symbol('EnvSource');

export interface ChunkingOptions {
    chunkSize: number;
    chunkOverlap: number;
}

export interface DispatchOptions {
    maxConcurrentRequests: number;
    backendMaxRetries: number;
    backendInitialDelayMs: number;
    backendMaxDelayMs: number;
    rateLimitMaxRetries: number;
    rateLimitMaxWaitMs: number;
}

export interface RateLimitOptions {
    perMinute: number;
    perHour: number;
    perDay: number;
}

export interface CacheOptions {
    enabled: boolean;
    maxEntries: number;
    ttlSeconds: number;
    directory?: string;
}

export interface LlmOptions {
    apiKey?: string;
    model: string;
    temperature: number;
    maxOutputTokens: number;
}
