// src/services/logPreprocessor.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { LogSeverity } from '../types/logAnalysis.types';

const SEVERITY_ORDER: Record<LogSeverity, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, FATAL: 4 };

const CRITICAL_PATTERNS: RegExp[] = [
    /(fatal|critical|error|exception|failed|failure|crash|timeout)/i,
    /(panic|abort|segfault|oom|out of memory)/i,
    /(connection.*refused|connection.*timeout|connection.*failed)/i,
    /(database.*error|sql.*error|query.*failed)/i,
    /(authentication.*failed|authorization.*denied|permission.*denied)/i,
];

/** Below this share of surviving lines, filtering is considered too aggressive. */
const MIN_RETAINED_RATIO = 0.1;

export interface PreprocessOptions {
    filterDebug: boolean;
    minSeverity: LogSeverity;
}

export interface PreprocessResult {
    text: string;
    originalLength: number;
    filteredLength: number;
    /** False when filtering left too little and the original text was kept. */
    applied: boolean;
}

/**
 * Drops noise lines before chunking so fewer tokens are spent on them.
 */
@singleton()
export class LogPreprocessorService {
    private readonly defaults: PreprocessOptions;

    constructor(@inject(ConfigService) configService: ConfigService) {
        const { filterDebug, minSeverity } = configService.preprocessing;
        this.defaults = { filterDebug, minSeverity };
    }

    public preprocess(text: string, options: Partial<PreprocessOptions> = {}): PreprocessResult {
        const { filterDebug, minSeverity } = { ...this.defaults, ...options };
        const minLevel = SEVERITY_ORDER[minSeverity];
        const lines = text.split('\n');

        const kept = lines.filter(line => {
            const trimmed = line.trim();
            if (trimmed === '' || trimmed.startsWith('#')) {
                return false;
            }
            if (filterDebug && /\bDEBUG\b/i.test(line)) {
                return false;
            }
            if (CRITICAL_PATTERNS.some(pattern => pattern.test(line))) {
                return true;
            }
            const severity = this.severityOf(line);
            return severity === undefined || SEVERITY_ORDER[severity] >= minLevel;
        });

        if (kept.length < lines.length * MIN_RETAINED_RATIO) {
            return { text, originalLength: text.length, filteredLength: text.length, applied: false };
        }
        const filtered = kept.join('\n');
        return { text: filtered, originalLength: text.length, filteredLength: filtered.length, applied: true };
    }

    private severityOf(line: string): LogSeverity | undefined {
        const upper = line.toUpperCase();
        if (upper.includes('FATAL') || upper.includes('CRITICAL')) return 'FATAL';
        if (upper.includes('ERROR') || upper.includes('EXCEPTION')) return 'ERROR';
        if (upper.includes('WARN')) return 'WARN';
        if (upper.includes('INFO')) return 'INFO';
        if (upper.includes('DEBUG')) return 'DEBUG';
        return undefined;
    }
}
