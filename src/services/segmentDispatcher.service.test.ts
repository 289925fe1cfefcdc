// src/services/segmentDispatcher.service.test.ts
import 'reflect-metadata';
import { DispatchRequest } from './segmentDispatcher.service';
import { BackendError } from '../errors/analysis.errors';
import { EnvSource } from '../config/types';
import { Segment, SegmentOutcome } from '../types/logAnalysis.types';
import { BackendHandler, FakeLlmBackend, createPipeline, defaultBackendHandler, makeSegments, sleep } from '../test/helpers';

const SEGMENT_NAME = /seg-[a-z0-9]+/;

/** Which test segment a rendered prompt was built from. */
const segmentName = (prompt: string): string => SEGMENT_NAME.exec(prompt)?.[0] ?? 'unknown';

const echoSegmentName: BackendHandler = prompt => ({ text: `analysis:${segmentName(prompt)}`, tokensIn: 100, tokensOut: 20 });

const request = (segments: Segment[], extra: Partial<DispatchRequest> = {}): DispatchRequest => ({
    segments,
    formatHint: 'unstructured',
    complexity: 'simple',
    promptVariant: 'standard',
    ...extra,
});

const setup = (handler: BackendHandler = defaultBackendHandler, overrides: EnvSource = {}) => {
    const backend = new FakeLlmBackend(handler);
    const pipeline = createPipeline({ RATE_LIMIT_PER_MINUTE: '1000', RATE_LIMIT_PER_HOUR: '1000', ...overrides }, backend);
    return { ...pipeline, backend };
};

const analyses = (outcomes: SegmentOutcome[]): Array<string | undefined> =>
    outcomes.map(outcome => (outcome.status === 'fulfilled' ? outcome.result.analysis : undefined));

describe('SegmentDispatcherService', () => {
    it('returns outcomes in segment order when completions arrive out of order', async () => {
        const delays: Record<string, number> = { 'seg-0': 30, 'seg-1': 15, 'seg-2': 0 };
        const { dispatcher } = setup(async prompt => {
            await sleep(delays[segmentName(prompt)] ?? 0);
            return echoSegmentName(prompt, 0);
        });

        const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0', 'seg-1', 'seg-2'])));

        expect(outcomes.map(outcome => outcome.segment.index)).toEqual([0, 1, 2]);
        expect(analyses(outcomes)).toEqual(['analysis:seg-0', 'analysis:seg-1', 'analysis:seg-2']);
    });

    it('never runs more backend calls at once than the concurrency bound', async () => {
        const { dispatcher, backend } = setup(async prompt => {
            await sleep(10);
            return echoSegmentName(prompt, 0);
        });
        const segments = makeSegments(Array.from({ length: 10 }, (_, i) => `seg-${i}`));

        const { totals } = await dispatcher.dispatch(request(segments, { concurrency: 3 }));

        expect(backend.maxActive).toBe(3);
        expect(backend.calls).toHaveLength(10);
        expect(totals.invocations).toBe(10);
    });

    it('rejects a concurrency that is not a positive integer', async () => {
        const { dispatcher } = setup();

        await expect(dispatcher.dispatch(request(makeSegments(['seg-0']), { concurrency: 0 }))).rejects.toThrow(RangeError);
    });

    it('collapses identical segments across concurrent requests into one backend call', async () => {
        const { dispatcher, backend } = setup(async prompt => {
            await sleep(20);
            return echoSegmentName(prompt, 0);
        });
        const segments = makeSegments(['seg-shared']);

        const results = await Promise.all(Array.from({ length: 5 }, () => dispatcher.dispatch(request(segments))));

        expect(backend.calls).toHaveLength(1);
        expect(results.map(result => analyses(result.outcomes)[0])).toEqual(Array(5).fill('analysis:seg-shared'));
        expect(results.reduce((sum, result) => sum + result.totals.invocations, 0)).toBe(1);
        expect(results.reduce((sum, result) => sum + result.totals.collapsed, 0)).toBe(4);
        expect(dispatcher.inFlightCount).toBe(0);
    });

    it('serves a repeated segment from the cache without calling the backend', async () => {
        const { dispatcher, backend } = setup(echoSegmentName);
        const segments = makeSegments(['seg-0']);
        await dispatcher.dispatch(request(segments));

        const { outcomes, totals } = await dispatcher.dispatch(request(segments));

        expect(backend.calls).toHaveLength(1);
        expect(totals).toMatchObject({ invocations: 0, cacheHits: 1 });
        expect(outcomes[0]).toMatchObject({ status: 'fulfilled', result: { index: 0, analysis: 'analysis:seg-0', fromCache: true } });
    });

    it('does not share results between different prompt variants', async () => {
        const { dispatcher, backend } = setup(echoSegmentName);
        const segments = makeSegments(['seg-0']);

        await dispatcher.dispatch(request(segments, { promptVariant: 'standard' }));
        await dispatcher.dispatch(request(segments, { promptVariant: 'quick' }));

        expect(backend.calls).toHaveLength(2);
    });

    it('fails only the segment whose backend call failed', async () => {
        const { dispatcher, backend } = setup(prompt => {
            if (segmentName(prompt) === 'seg-1') {
                throw new BackendError(400, 'request rejected by provider');
            }
            return echoSegmentName(prompt, 0);
        });

        const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0', 'seg-1', 'seg-2'])));

        expect(analyses(outcomes)).toEqual(['analysis:seg-0', undefined, 'analysis:seg-2']);
        expect(outcomes[1]).toEqual({
            status: 'failed',
            segment: { index: 1, text: 'seg-1', start: 5, end: 10 },
            failure: { index: 1, start: 5, end: 10, reason: 'backend', message: 'request rejected by provider' },
        });
        expect(backend.calls).toHaveLength(3);
    });

    it('retries a retryable backend failure and succeeds', async () => {
        const { dispatcher, backend } = setup((prompt, callIndex) => {
            if (callIndex === 0) {
                throw new BackendError(503, 'overloaded');
            }
            return echoSegmentName(prompt, callIndex);
        });

        const { outcomes, totals } = await dispatcher.dispatch(request(makeSegments(['seg-0'])));

        expect(analyses(outcomes)).toEqual(['analysis:seg-0']);
        expect(backend.calls).toHaveLength(2);
        expect(totals.invocations).toBe(2);
    });

    it('gives up after the configured number of retries', async () => {
        const { dispatcher, backend } = setup(() => {
            throw new Error('socket hang up');
        }, { BACKEND_MAX_RETRIES: '2' });

        const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0'])));

        expect(backend.calls).toHaveLength(3);
        expect(outcomes[0]).toMatchObject({ status: 'failed', failure: { reason: 'backend', message: 'socket hang up' } });
    });

    it('does not retry an authentication failure', async () => {
        const { dispatcher, backend } = setup(() => {
            throw new BackendError(401, 'invalid api key');
        });

        const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0'])));

        expect(backend.calls).toHaveLength(1);
        expect(outcomes[0]).toMatchObject({ status: 'failed', failure: { reason: 'backend', message: 'invalid api key' } });
    });

    it('fails a segment as rate limited once the limiter keeps denying', async () => {
        const { dispatcher, backend } = setup(echoSegmentName, { RATE_LIMIT_PER_MINUTE: '1', RATE_LIMIT_MAX_RETRIES: '2' });

        const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0', 'seg-1']), { concurrency: 1 }));

        expect(backend.calls).toHaveLength(1);
        expect(outcomes[0].status).toBe('fulfilled');
        const second = outcomes[1];
        expect(second.status).toBe('failed');
        if (second.status === 'failed') {
            expect(second.failure.reason).toBe('rate_limited');
            expect(second.failure.retryAfterMs).toBeGreaterThan(0);
            expect(second.failure.retryAfterMs).toBeLessThanOrEqual(60_000);
        }
    });

    it('waits out a short denial and then calls the backend', async () => {
        const { dispatcher, backend, rateLimiter } = setup(echoSegmentName);
        const tryAcquire = jest.spyOn(rateLimiter, 'tryAcquire')
            .mockResolvedValueOnce({ allowed: false, scope: 'minute', retryAfterMs: 3, exhausted: ['minute'] });

        const { outcomes, totals } = await dispatcher.dispatch(request(makeSegments(['seg-0'])));

        expect(tryAcquire).toHaveBeenCalledTimes(2);
        expect(analyses(outcomes)).toEqual(['analysis:seg-0']);
        expect(backend.calls).toHaveLength(1);
        expect(totals.invocations).toBe(1);
    });

    it('fails fast when the exhausted window frees up later than the wait budget', async () => {
        const { dispatcher, backend } = setup(echoSegmentName, {
            RATE_LIMIT_PER_HOUR: '1',
            RATE_LIMIT_MAX_WAIT_MS: '60',
            RATE_LIMIT_MAX_RETRIES: '3',
        });
        await dispatcher.dispatch(request(makeSegments(['seg-first'])));
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), 300);

        const startedAt = Date.now();
        const { outcomes } = await dispatcher.dispatch(
            request(makeSegments(['seg-0', 'seg-1', 'seg-2', 'seg-3']), { concurrency: 1, signal: controller.signal }),
        );
        const elapsedMs = Date.now() - startedAt;
        clearTimeout(timer);

        expect(elapsedMs).toBeLessThan(200);
        expect(backend.calls).toHaveLength(1);
        for (const outcome of outcomes) {
            expect(outcome.status).toBe('failed');
            if (outcome.status === 'failed') {
                expect(outcome.failure.reason).toBe('rate_limited');
                expect(outcome.failure.retryAfterMs).toBeGreaterThan(60);
            }
        }
    });

    it('records the cost of every completed call', async () => {
        const { dispatcher, costAccountant } = setup(echoSegmentName);

        const { totals } = await dispatcher.dispatch(request(makeSegments(['seg-0', 'seg-1'])));

        // gemini-2.0-flash: 0.0001 in / 0.0004 out per 1K tokens; 100 in and 20 out per call.
        expect(totals).toMatchObject({ tokensIn: 200, tokensOut: 40 });
        expect(totals.costUsd).toBeCloseTo(2 * (0.1 * 0.0001 + 0.02 * 0.0004), 12);
        expect(costAccountant.summary().dailyUsd).toBeCloseTo(totals.costUsd, 12);
    });

    describe('cancellation', () => {
        it('reports every segment as cancelled without calling the backend when already aborted', async () => {
            const { dispatcher, backend } = setup();
            const controller = new AbortController();
            controller.abort();

            const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0', 'seg-1']), { signal: controller.signal }));

            expect(outcomes.map(outcome => (outcome.status === 'failed' ? outcome.failure.reason : outcome.status))).toEqual(['cancelled', 'cancelled']);
            expect(backend.calls).toHaveLength(0);
        });

        it('lets a running backend call finish and populate the cache', async () => {
            const { dispatcher, cache } = setup(async prompt => {
                await sleep(40);
                return echoSegmentName(prompt, 0);
            });
            const controller = new AbortController();
            setTimeout(() => controller.abort(), 10);

            const { outcomes } = await dispatcher.dispatch(request(makeSegments(['seg-0']), { signal: controller.signal }));

            expect(outcomes[0]).toMatchObject({ status: 'failed', failure: { reason: 'cancelled' } });
            await sleep(60);
            expect(cache.entryCount).toBe(1);
        });

        it('recomputes for a waiting request when the owning request is cancelled first', async () => {
            const { dispatcher, backend } = setup(async prompt => {
                await sleep(segmentName(prompt) === 'seg-slow' ? 40 : 5);
                return echoSegmentName(prompt, 0);
            });
            const owner = new AbortController();

            // The owner queues seg-x behind seg-slow, so seg-x has not started when the owner goes away.
            const ownerRun = dispatcher.dispatch(request(makeSegments(['seg-slow', 'seg-x']), { concurrency: 1, signal: owner.signal }));
            await sleep(5);
            const waiterRun = dispatcher.dispatch(request(makeSegments(['seg-x'])));
            await sleep(5);
            owner.abort();

            const [ownerResult, waiterResult] = await Promise.all([ownerRun, waiterRun]);

            expect(ownerResult.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'failed']);
            expect(analyses(waiterResult.outcomes)).toEqual(['analysis:seg-x']);
            expect(waiterResult.totals).toMatchObject({ collapsed: 1, invocations: 1 });
            expect(backend.calls.map(call => segmentName(call.prompt))).toEqual(['seg-slow', 'seg-x']);
        });
    });
});
