// src/services/analysisCachePersistence.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { CacheCorruptionError } from '../errors/analysis.errors';
import { CacheEntry } from '../types/cache.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const SAFE_FINGERPRINT = /^[A-Za-z0-9_-]{1,128}$/;

const cacheFileSchema = z.object({
    fingerprint: z.string().min(1),
    analysis: z.string(),
    createdAt: z.number().int().nonnegative(),
    sizeBytes: z.number().int().nonnegative(),
});

const isMissingFile = (error: unknown): boolean =>
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Disk tier of the analysis cache: one JSON document per fingerprint under `CACHE_DIRECTORY`.
 * Disabled (every call a no-op or miss) when no directory is configured.
 */
@singleton()
export class AnalysisCachePersistenceService {
    private readonly serviceLogger: Logger;
    private readonly directory?: string;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.serviceLogger = loggingService.getLogger('app', { service: 'AnalysisCachePersistenceService' });
        const { enabled, directory } = configService.cache;
        if (enabled && directory) {
            this.ensureDirectoryExists(directory);
            this.directory = directory;
        }
    }

    private ensureDirectoryExists(directory: string): void {
        try {
            if (!fs.existsSync(directory)) {
                fs.mkdirSync(directory, { recursive: true });
                this.serviceLogger.info({ event: 'cache_directory_created', directory }, 'Created analysis cache directory.');
            }
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            throw new Error(`Failed to create cache directory "${directory}": ${message}`);
        }
    }

    public get enabled(): boolean {
        return this.directory !== undefined;
    }

    private filePathFor(directory: string, fingerprint: string): string {
        if (!SAFE_FINGERPRINT.test(fingerprint)) {
            throw new Error(`Fingerprint "${fingerprint.slice(0, 32)}" cannot be used as a file name`);
        }
        return path.join(directory, `${fingerprint}.json`);
    }

    /**
     * Reads one entry. A file that does not parse or validate is deleted and reported as
     * `CacheCorruptionError`; a missing file is a plain miss.
     */
    public async read(fingerprint: string): Promise<CacheEntry | undefined> {
        if (!this.directory) {
            return undefined;
        }
        const filePath = this.filePathFor(this.directory, fingerprint);

        let raw: string;
        try {
            raw = await fsPromises.readFile(filePath, 'utf8');
        } catch (error: unknown) {
            if (isMissingFile(error)) {
                return undefined;
            }
            throw error;
        }

        const reason = this.validate(raw, fingerprint);
        if (typeof reason === 'string') {
            await this.removeFile(filePath);
            throw new CacheCorruptionError(fingerprint, reason);
        }
        return reason;
    }

    private validate(raw: string, expectedFingerprint?: string): CacheEntry | string {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error: unknown) {
            return `invalid JSON (${getErrorMessageAndStack(error).message})`;
        }
        const parsed = cacheFileSchema.safeParse(json);
        if (!parsed.success) {
            return parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        }
        if (expectedFingerprint !== undefined && parsed.data.fingerprint !== expectedFingerprint) {
            return 'fingerprint does not match file name';
        }
        return parsed.data;
    }

    /** Temp file + rename, so a reader never observes a half-written entry. */
    public async write(entry: CacheEntry): Promise<void> {
        if (!this.directory) {
            return;
        }
        const filePath = this.filePathFor(this.directory, entry.fingerprint);
        const tempPath = `${filePath}.${uuidv4()}.tmp`;
        try {
            await fsPromises.writeFile(tempPath, JSON.stringify(entry), 'utf8');
            await fsPromises.rename(tempPath, filePath);
        } catch (error: unknown) {
            await this.removeFile(tempPath);
            throw error;
        }
    }

    /**
     * Deletes entries created before `cutoffTimestamp` (all entries when omitted), corrupt files included.
     * @returns the fingerprints whose files were removed
     */
    public async clear(cutoffTimestamp?: number): Promise<string[]> {
        if (!this.directory) {
            return [];
        }
        const removed: string[] = [];
        const fileNames = (await fsPromises.readdir(this.directory)).filter(name => name.endsWith('.json'));
        for (const fileName of fileNames) {
            const filePath = path.join(this.directory, fileName);
            const fingerprint = fileName.slice(0, -'.json'.length);
            if (cutoffTimestamp !== undefined) {
                const raw = await fsPromises.readFile(filePath, 'utf8').catch((error: unknown) => {
                    if (isMissingFile(error)) return undefined;
                    throw error;
                });
                if (raw === undefined) {
                    continue;
                }
                const entry = this.validate(raw);
                if (typeof entry !== 'string' && entry.createdAt >= cutoffTimestamp) {
                    continue;
                }
            }
            await this.removeFile(filePath);
            removed.push(fingerprint);
        }
        return removed;
    }

    private async removeFile(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(filePath);
        } catch (error: unknown) {
            if (!isMissingFile(error)) {
                const { message } = getErrorMessageAndStack(error);
                this.serviceLogger.warn({ event: 'cache_file_remove_failed', filePath, err: message }, 'Failed to remove cache file.');
            }
        }
    }
}
