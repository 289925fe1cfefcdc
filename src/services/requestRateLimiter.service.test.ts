// src/services/requestRateLimiter.service.test.ts
import 'reflect-metadata';
import { RequestRateLimiterService } from './requestRateLimiter.service';
import { LoggingService } from './logging.service';
import { createTestConfig } from '../test/helpers';
import { EnvSource } from '../config/types';

const createLimiter = (overrides: EnvSource): RequestRateLimiterService => {
    const config = createTestConfig(overrides);
    return new RequestRateLimiterService(config, new LoggingService(config));
};

describe('RequestRateLimiterService', () => {
    describe('with fake clock', () => {
        beforeEach(() => {
            jest.useFakeTimers({ now: new Date('2026-03-02T10:00:00Z') });
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('grants exactly the per-minute limit, then denies with the minute scope', async () => {
            const limiter = createLimiter({ RATE_LIMIT_PER_MINUTE: '3' });

            for (let i = 0; i < 3; i++) {
                await expect(limiter.tryAcquire()).resolves.toEqual({ allowed: true });
            }
            const denied = await limiter.tryAcquire();

            expect(denied.allowed).toBe(false);
            if (!denied.allowed) {
                expect(denied.scope).toBe('minute');
                expect(denied.exhausted).toEqual(['minute']);
                expect(denied.retryAfterMs).toBeGreaterThan(0);
                expect(denied.retryAfterMs).toBeLessThanOrEqual(60_000);
            }
        });

        it('allows calls again once the minute window has rolled over', async () => {
            const limiter = createLimiter({ RATE_LIMIT_PER_MINUTE: '2' });
            await limiter.tryAcquire();
            await limiter.tryAcquire();
            expect((await limiter.tryAcquire()).allowed).toBe(false);

            jest.advanceTimersByTime(60_000);

            await expect(limiter.tryAcquire()).resolves.toEqual({ allowed: true });
            const snapshot = await limiter.snapshot();
            expect(snapshot.minute).toMatchObject({ limit: 2, used: 1, remaining: 1 });
            expect(snapshot.hour).toMatchObject({ limit: 100, used: 3, remaining: 97 });
            expect(snapshot.day).toMatchObject({ limit: 1000, used: 3, remaining: 997 });
        });

        it('reports the window that frees up last when several are exhausted', async () => {
            const limiter = createLimiter({ RATE_LIMIT_PER_MINUTE: '2', RATE_LIMIT_PER_HOUR: '2' });
            await limiter.tryAcquire();
            await limiter.tryAcquire();

            const denied = await limiter.tryAcquire();

            expect(denied.allowed).toBe(false);
            if (!denied.allowed) {
                expect(denied.scope).toBe('hour');
                expect(denied.exhausted).toEqual(['minute', 'hour']);
                expect(denied.retryAfterMs).toBeGreaterThan(60_000);
            }
        });

        it('does not consume from any window on a denial', async () => {
            const limiter = createLimiter({ RATE_LIMIT_PER_MINUTE: '1' });
            await limiter.tryAcquire();
            await limiter.tryAcquire();
            await limiter.tryAcquire();

            const snapshot = await limiter.snapshot();
            expect(snapshot.hour.used).toBe(1);
            expect(snapshot.day.used).toBe(1);
        });
    });

    it('reports empty windows before any call', async () => {
        const limiter = createLimiter({});

        await expect(limiter.snapshot()).resolves.toEqual({
            minute: { limit: 10, used: 0, remaining: 10, resetsInMs: 0 },
            hour: { limit: 100, used: 0, remaining: 100, resetsInMs: 0 },
            day: { limit: 1000, used: 0, remaining: 1000, resetsInMs: 0 },
        });
    });

    it('never grants more than the limit to concurrent callers', async () => {
        const limiter = createLimiter({ RATE_LIMIT_PER_MINUTE: '5' });

        const decisions = await Promise.all(Array.from({ length: 20 }, () => limiter.tryAcquire()));

        expect(decisions.filter(decision => decision.allowed)).toHaveLength(5);
        expect((await limiter.snapshot()).minute.used).toBe(5);
    });
});
