// src/services/requestRateLimiter.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { RateLimiterMemory, type IRateLimiterOptions } from 'rate-limiter-flexible';
import { Mutex } from 'async-mutex';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import {
    RATE_WINDOW_DURATIONS_SECONDS,
    RateLimitDecision,
    RateLimitSnapshot,
    RateWindowName,
    RateWindowState,
} from '../types/rateLimit.types';

const WINDOW_NAMES: readonly RateWindowName[] = ['minute', 'hour', 'day'];
const GLOBAL_KEY = 'backend';

interface RateWindow {
    name: RateWindowName;
    limit: number;
    limiter: RateLimiterMemory;
}

/**
 * Process-wide gate in front of the language-model backend.
 *
 * Three fixed windows (minute, hour, day) each count every allowed call. A call passes only when
 * all three have room, and then consumes one point from each. The check and the consume run under
 * one mutex, so concurrent callers never observe a partial acquisition.
 */
@singleton()
export class RequestRateLimiterService {
    private readonly logger: Logger;
    private readonly windows: Record<RateWindowName, RateWindow>;
    private readonly mutex = new Mutex();

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.logger = loggingService.getLogger('app', { service: 'RequestRateLimiterService' });
        const { perMinute, perHour, perDay } = configService.rateLimits;
        const limits: Record<RateWindowName, number> = { minute: perMinute, hour: perHour, day: perDay };

        const createWindow = (name: RateWindowName): RateWindow => {
            const options: IRateLimiterOptions = {
                points: limits[name],
                duration: RATE_WINDOW_DURATIONS_SECONDS[name],
                keyPrefix: `llm_${name}`,
            };
            return { name, limit: limits[name], limiter: new RateLimiterMemory(options) };
        };
        this.windows = { minute: createWindow('minute'), hour: createWindow('hour'), day: createWindow('day') };
        this.logger.info({ event: 'rate_limiter_init', limits }, 'Backend rate limiter initialized.');
    }

    public tryAcquire(): Promise<RateLimitDecision> {
        return this.mutex.runExclusive(async (): Promise<RateLimitDecision> => {
            const states = await this.readAll();

            const exhausted = WINDOW_NAMES.filter(name => states[name].remaining <= 0);
            if (exhausted.length > 0) {
                const scope = exhausted.reduce((longest, name) =>
                    (states[name].resetsInMs > states[longest].resetsInMs ? name : longest));
                const decision: RateLimitDecision = {
                    allowed: false,
                    scope,
                    retryAfterMs: states[scope].resetsInMs,
                    exhausted,
                };
                this.logger.debug({ event: 'rate_limit_denied', ...decision }, 'Backend call denied by rate limiter.');
                return decision;
            }

            // Every window has room, so none of these can reject.
            await Promise.all(WINDOW_NAMES.map(name => this.windows[name].limiter.consume(GLOBAL_KEY, 1)));
            return { allowed: true };
        });
    }

    public snapshot(): Promise<RateLimitSnapshot> {
        return this.mutex.runExclusive(() => this.readAll());
    }

    private async readAll(): Promise<RateLimitSnapshot> {
        const [minute, hour, day] = await Promise.all(WINDOW_NAMES.map(name => this.readWindow(this.windows[name])));
        return { minute, hour, day };
    }

    /**
     * Current state of one window. A window whose period has elapsed is reset here, on read,
     * rather than by a timer.
     */
    private async readWindow(window: RateWindow): Promise<RateWindowState> {
        const empty: RateWindowState = { limit: window.limit, used: 0, remaining: window.limit, resetsInMs: 0 };

        const res = await window.limiter.get(GLOBAL_KEY);
        if (!res) {
            return empty;
        }
        if (res.msBeforeNext <= 0) {
            await window.limiter.delete(GLOBAL_KEY);
            this.logger.trace({ event: 'rate_window_rolled', window: window.name }, 'Rate window rolled over.');
            return empty;
        }
        const used = Math.min(res.consumedPoints, window.limit);
        return {
            limit: window.limit,
            used,
            remaining: window.limit - used,
            resetsInMs: res.msBeforeNext,
        };
    }
}
