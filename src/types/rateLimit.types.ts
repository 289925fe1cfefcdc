// src/types/rateLimit.types.ts

export type RateWindowName = 'minute' | 'hour' | 'day';

export const RATE_WINDOW_DURATIONS_SECONDS: Record<RateWindowName, number> = {
    minute: 60,
    hour: 3600,
    day: 86400,
};

export interface RateWindowState {
    limit: number;
    used: number;
    remaining: number;
    /** Milliseconds until the window's counter resets; 0 when the window has not started. */
    resetsInMs: number;
}

export type RateLimitSnapshot = Record<RateWindowName, RateWindowState>;

export type RateLimitDecision =
    | { allowed: true }
    | {
        allowed: false;
        /** The exhausted window that frees up last. */
        scope: RateWindowName;
        retryAfterMs: number;
        exhausted: RateWindowName[];
    };
