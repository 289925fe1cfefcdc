// src/errors/analysis.errors.ts
import type { RateWindowName } from '../types/rateLimit.types';
import type { SegmentFailure } from '../types/logAnalysis.types';

export type AnalysisErrorCode =
    | 'EMPTY_INPUT'
    | 'BACKEND_ERROR'
    | 'RATE_LIMITED'
    | 'CACHE_CORRUPTION'
    | 'CANCELLED'
    | 'ANALYSIS_FAILED'
    | 'CONFIGURATION_ERROR';

/**
 * Base class for every error the analysis pipeline raises on purpose.
 * `status` is the HTTP status the transport layer should answer with;
 * `isOperational` marks errors whose message is safe to show a client.
 */
export abstract class AnalysisError extends Error {
    public abstract readonly code: AnalysisErrorCode;
    public abstract readonly status: number;
    public readonly isOperational: boolean = true;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** No content to chunk. Fatal for the request. */
export class EmptyInputError extends AnalysisError {
    public readonly code = 'EMPTY_INPUT';
    public readonly status = 400;

    constructor(message = 'Log document is empty') {
        super(message);
    }
}

const NON_RETRYABLE_BACKEND_STATUSES = new Set([400, 401, 403, 404]);

/** Transport, auth or quota failure reported by the language-model provider. */
export class BackendError extends AnalysisError {
    public readonly code = 'BACKEND_ERROR';
    public readonly status = 502;

    constructor(
        public readonly providerStatus: number,
        message: string,
    ) {
        super(message);
    }

    get retryable(): boolean {
        return !NON_RETRYABLE_BACKEND_STATUSES.has(this.providerStatus);
    }
}

/** The local limiter kept denying after the retry budget was spent. */
export class RateLimitExceededError extends AnalysisError {
    public readonly code = 'RATE_LIMITED';
    public readonly status = 429;

    constructor(
        public readonly retryAfterMs: number,
        public readonly scope: RateWindowName,
    ) {
        super(`Rate limit exceeded for the ${scope} window; retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    }
}

/** A persisted cache entry could not be read back. Never leaves the cache layer. */
export class CacheCorruptionError extends AnalysisError {
    public readonly code = 'CACHE_CORRUPTION';
    public readonly status = 500;
    public readonly isOperational = false;

    constructor(
        public readonly fingerprint: string,
        reason: string,
    ) {
        super(`Cache entry ${fingerprint.slice(0, 12)} is corrupt: ${reason}`);
    }
}

export class AnalysisCancelledError extends AnalysisError {
    public readonly code = 'CANCELLED';
    public readonly status = 499;

    constructor(message = 'Analysis was cancelled') {
        super(message);
    }
}

export type AnalysisFailureKind = 'backend_unavailable' | 'rate_limited' | 'cancelled';

const FAILURE_KIND_STATUS: Record<AnalysisFailureKind, number> = {
    backend_unavailable: 503,
    rate_limited: 429,
    cancelled: 499,
};

/** Every segment of a document failed. */
export class AnalysisFailedError extends AnalysisError {
    public readonly code = 'ANALYSIS_FAILED';
    public readonly status: number;

    constructor(
        public readonly kind: AnalysisFailureKind,
        public readonly failures: SegmentFailure[],
    ) {
        super(`All ${failures.length} segment(s) failed to analyze (${kind})`);
        this.status = FAILURE_KIND_STATUS[kind];
    }

    /** Longest retry hint among rate-limited segments, if any. */
    get retryAfterMs(): number | undefined {
        const hints = this.failures
            .map(failure => failure.retryAfterMs)
            .filter((hint): hint is number => hint !== undefined);
        return hints.length > 0 ? Math.max(...hints) : undefined;
    }
}

export class ConfigurationError extends AnalysisError {
    public readonly code = 'CONFIGURATION_ERROR';
    public readonly status = 500;
    public readonly isOperational = false;

    constructor(
        message: string,
        public readonly issues: string[] = [],
    ) {
        super(message);
    }
}
