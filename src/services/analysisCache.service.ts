// src/services/analysisCache.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { CacheOptions } from '../config/types';
import { LoggingService } from './logging.service';
import { AnalysisCachePersistenceService } from './analysisCachePersistence.service';
import { CacheCorruptionError } from '../errors/analysis.errors';
import { CacheEntry, CacheStats } from '../types/cache.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Process-wide, content-addressed store of segment analyses.
 *
 * Memory tier is an LRU over a `Map` (insertion order = recency), bounded by `CACHE_MAX_ENTRIES`
 * and aged out by `CACHE_TTL_SECONDS`. When a cache directory is configured, writes go through to
 * disk and memory misses fall back to it. Storage problems are logged and surface as misses.
 */
@singleton()
export class AnalysisCacheService {
    private readonly serviceLogger: Logger;
    private readonly options: CacheOptions;
    private readonly entries = new Map<string, CacheEntry>();
    private sizeBytes = 0;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject(AnalysisCachePersistenceService) private readonly persistence: AnalysisCachePersistenceService,
    ) {
        this.options = configService.cache;
        this.serviceLogger = loggingService.getLogger('app', { service: 'AnalysisCacheService' });
        this.serviceLogger.info(
            { event: 'cache_init', enabled: this.options.enabled, maxEntries: this.options.maxEntries, ttlSeconds: this.options.ttlSeconds, persistent: this.persistence.enabled },
            'Analysis cache initialized.',
        );
    }

    public get enabled(): boolean {
        return this.options.enabled;
    }

    public get entryCount(): number {
        return this.entries.size;
    }

    public get totalSizeBytes(): number {
        return this.sizeBytes;
    }

    public async get(fingerprint: string): Promise<string | undefined> {
        if (!this.options.enabled) {
            return undefined;
        }

        const entry = this.entries.get(fingerprint);
        if (entry) {
            if (this.isExpired(entry)) {
                this.removeEntry(fingerprint);
            } else {
                // Refresh recency.
                this.entries.delete(fingerprint);
                this.entries.set(fingerprint, entry);
                return entry.analysis;
            }
        }

        const stored = await this.readFromDisk(fingerprint);
        if (!stored) {
            return undefined;
        }
        if (!this.entries.has(fingerprint)) {
            this.storeEntry(stored);
        }
        return stored.analysis;
    }

    public async put(fingerprint: string, analysis: string): Promise<void> {
        if (!this.options.enabled) {
            return;
        }
        const entry: CacheEntry = {
            fingerprint,
            analysis,
            createdAt: Date.now(),
            sizeBytes: Buffer.byteLength(analysis, 'utf8'),
        };
        this.storeEntry(entry);

        if (!this.persistence.enabled) {
            return;
        }
        try {
            await this.persistence.write(entry);
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            this.serviceLogger.error({ event: 'cache_write_failed', fingerprint, err: message }, 'Failed to persist cache entry; keeping it in memory only.');
        }
    }

    /**
     * Removes every entry, or only those older than `olderThanSeconds`.
     * @returns number of distinct fingerprints removed across both tiers
     */
    public async clear(olderThanSeconds?: number): Promise<number> {
        const cutoff = olderThanSeconds === undefined ? undefined : Date.now() - olderThanSeconds * 1000;
        const removed = new Set<string>();

        for (const [fingerprint, entry] of [...this.entries]) {
            if (cutoff === undefined || entry.createdAt < cutoff) {
                this.removeEntry(fingerprint);
                removed.add(fingerprint);
            }
        }
        if (this.persistence.enabled) {
            for (const fingerprint of await this.persistence.clear(cutoff)) {
                removed.add(fingerprint);
            }
        }

        this.serviceLogger.info({ event: 'cache_cleared', removed: removed.size, olderThanSeconds }, 'Analysis cache cleared.');
        return removed.size;
    }

    public stats(): CacheStats {
        return {
            enabled: this.options.enabled,
            entryCount: this.entryCount,
            totalSizeBytes: this.totalSizeBytes,
            maxEntries: this.options.maxEntries,
            ttlSeconds: this.options.ttlSeconds,
            persistent: this.persistence.enabled,
        };
    }

    private isExpired(entry: CacheEntry): boolean {
        return this.options.ttlSeconds > 0 && Date.now() - entry.createdAt >= this.options.ttlSeconds * 1000;
    }

    private storeEntry(entry: CacheEntry): void {
        this.removeEntry(entry.fingerprint);
        this.entries.set(entry.fingerprint, entry);
        this.sizeBytes += entry.sizeBytes;

        const { maxEntries } = this.options;
        while (maxEntries > 0 && this.entries.size > maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) {
                break;
            }
            this.removeEntry(oldest.value);
            this.serviceLogger.debug({ event: 'cache_evicted', fingerprint: oldest.value }, 'Evicted least recently used cache entry.');
        }
    }

    private removeEntry(fingerprint: string): void {
        const existing = this.entries.get(fingerprint);
        if (existing) {
            this.entries.delete(fingerprint);
            this.sizeBytes -= existing.sizeBytes;
        }
    }

    private async readFromDisk(fingerprint: string): Promise<CacheEntry | undefined> {
        if (!this.persistence.enabled) {
            return undefined;
        }
        try {
            const stored = await this.persistence.read(fingerprint);
            if (stored && this.isExpired(stored)) {
                return undefined;
            }
            return stored;
        } catch (error: unknown) {
            if (error instanceof CacheCorruptionError) {
                this.serviceLogger.warn({ event: 'cache_entry_corrupt', fingerprint, err: error.message }, 'Discarded corrupt cache entry; treating as a miss.');
            } else {
                const { message } = getErrorMessageAndStack(error);
                this.serviceLogger.error({ event: 'cache_read_failed', fingerprint, err: message }, 'Failed to read cache entry; treating as a miss.');
            }
            return undefined;
        }
    }
}
