// src/types/cache.types.ts

export interface CacheEntry {
    fingerprint: string;
    analysis: string;
    /** Unix epoch milliseconds. */
    createdAt: number;
    sizeBytes: number;
}

export interface CacheStats {
    enabled: boolean;
    entryCount: number;
    totalSizeBytes: number;
    maxEntries: number;
    ttlSeconds: number;
    persistent: boolean;
}
