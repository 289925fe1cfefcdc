// src/services/segmentDispatcher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import PQueue from 'p-queue';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { DispatchOptions } from '../config/types';
import { LoggingService } from './logging.service';
import { AnalysisCacheService } from './analysisCache.service';
import { RequestRateLimiterService } from './requestRateLimiter.service';
import { CostAccountantService } from './costAccountant.service';
import { PromptTemplateService } from './promptTemplate.service';
import { ILlmBackend, LlmCompletion, LLM_BACKEND_TOKEN } from './interfaces/llmBackend.interface';
import {
    AnalysisCancelledError,
    BackendError,
    RateLimitExceededError,
} from '../errors/analysis.errors';
import {
    DispatchResult,
    DispatchTotals,
    LogComplexity,
    LogFormatHint,
    PromptVariant,
    Segment,
    SegmentFailure,
    SegmentOutcome,
} from '../types/logAnalysis.types';
import { computeFingerprint } from '../utils/fingerprint';
import { delay, raceWithSignal, throwIfAborted } from '../utils/abortUtils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export interface DispatchRequest {
    segments: readonly Segment[];
    formatHint: LogFormatHint;
    complexity: LogComplexity;
    promptVariant: PromptVariant;
    /** Defaults to `LLM_MODEL`. */
    model?: string;
    /** Defaults to `LLM_TEMPERATURE`. */
    temperature?: number;
    /** Defaults to `MAX_CONCURRENT_REQUESTS`. */
    concurrency?: number;
    signal?: AbortSignal;
    logger?: Logger;
}

/** Settled result of one shared backend computation. Never rejects, so waiters can come and go. */
type FlightResult =
    | { ok: true; analysis: string; fromCache: boolean }
    | { ok: false; error: unknown };

interface DispatchContext {
    model: string;
    temperature: number;
    formatHint: LogFormatHint;
    complexity: LogComplexity;
    promptVariant: PromptVariant;
    queue: PQueue;
    totals: DispatchTotals;
    logger: Logger;
    signal?: AbortSignal;
}

/**
 * Resolves segments through cache, rate limiter and backend.
 *
 * - At most `concurrency` backend calls of one dispatch run at a time (one p-queue per dispatch).
 * - Identical fingerprints share one computation process-wide. If the request that owns a
 *   computation is cancelled, waiters from other requests start their own instead of failing.
 * - Every segment ends as either a result or a failure; one segment never fails its siblings.
 */
@singleton()
export class SegmentDispatcherService {
    private readonly serviceLogger: Logger;
    private readonly options: DispatchOptions;
    private readonly defaultModel: string;
    private readonly defaultTemperature: number;
    private readonly inFlight = new Map<string, Promise<FlightResult>>();

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject(AnalysisCacheService) private readonly cache: AnalysisCacheService,
        @inject(RequestRateLimiterService) private readonly rateLimiter: RequestRateLimiterService,
        @inject(CostAccountantService) private readonly costAccountant: CostAccountantService,
        @inject(PromptTemplateService) private readonly prompts: PromptTemplateService,
        @inject(LLM_BACKEND_TOKEN) private readonly backend: ILlmBackend,
    ) {
        this.serviceLogger = loggingService.getLogger('analysis', { service: 'SegmentDispatcherService' });
        this.options = configService.dispatch;
        this.defaultModel = configService.llm.model;
        this.defaultTemperature = configService.llm.temperature;
    }

    /** Number of distinct computations currently shared through the single-flight registry. */
    public get inFlightCount(): number {
        return this.inFlight.size;
    }

    public async dispatch(request: DispatchRequest): Promise<DispatchResult> {
        const concurrency = request.concurrency ?? this.options.maxConcurrentRequests;
        if (!Number.isInteger(concurrency) || concurrency <= 0) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }

        const context: DispatchContext = {
            model: request.model ?? this.defaultModel,
            temperature: request.temperature ?? this.defaultTemperature,
            formatHint: request.formatHint,
            complexity: request.complexity,
            promptVariant: request.promptVariant,
            queue: new PQueue({ concurrency }),
            totals: { invocations: 0, cacheHits: 0, collapsed: 0, tokensIn: 0, tokensOut: 0, costUsd: 0 },
            logger: (request.logger ?? this.serviceLogger).child({ component: 'dispatcher' }),
            signal: request.signal,
        };

        context.logger.info(
            { event: 'dispatch_start', segments: request.segments.length, concurrency, model: context.model, promptVariant: context.promptVariant },
            `Dispatching ${request.segments.length} segment(s).`,
        );

        // Each promise settles to an outcome and never rejects, so the array keeps segment order.
        const outcomes = await Promise.all(request.segments.map(segment => this.resolveSegment(segment, context)));

        const failed = outcomes.filter(outcome => outcome.status === 'failed').length;
        context.logger.info({ event: 'dispatch_complete', failed, ...context.totals }, 'Dispatch complete.');
        return { outcomes, totals: context.totals };
    }

    private async resolveSegment(segment: Segment, context: DispatchContext): Promise<SegmentOutcome> {
        const fingerprint = computeFingerprint({
            text: segment.text,
            model: context.model,
            promptVariant: context.promptVariant,
            formatHint: context.formatHint,
            complexity: context.complexity,
        });
        const logger = context.logger.child({ segmentIndex: segment.index, fingerprint: fingerprint.slice(0, 12) });

        try {
            const { analysis, fromCache } = await this.resolveFingerprint(fingerprint, segment, context, logger);
            return { status: 'fulfilled', segment, result: { index: segment.index, analysis, fromCache } };
        } catch (error: unknown) {
            const failure = this.toFailure(segment, error);
            logger.warn({ event: 'segment_failed', reason: failure.reason, err: failure.message }, 'Segment could not be analyzed.');
            return { status: 'failed', segment, failure };
        }
    }

    private async resolveFingerprint(
        fingerprint: string,
        segment: Segment,
        context: DispatchContext,
        logger: Logger,
    ): Promise<{ analysis: string; fromCache: boolean }> {
        for (;;) {
            throwIfAborted(context.signal);

            const cached = await this.cache.get(fingerprint);
            if (cached !== undefined) {
                context.totals.cacheHits += 1;
                logger.debug({ event: 'cache_hit' }, 'Segment served from cache.');
                return { analysis: cached, fromCache: true };
            }

            const existing = this.inFlight.get(fingerprint);
            if (existing) {
                context.totals.collapsed += 1;
                logger.debug({ event: 'single_flight_joined' }, 'Waiting on an identical in-flight segment.');
                const shared = await raceWithSignal(existing, context.signal);
                if (shared.ok) {
                    return { analysis: shared.analysis, fromCache: shared.fromCache };
                }
                if (shared.error instanceof AnalysisCancelledError && !context.signal?.aborted) {
                    // The owning request went away; start over and take ownership if nobody else has.
                    logger.debug({ event: 'single_flight_owner_cancelled' }, 'Shared computation was cancelled by its owner; retrying.');
                    continue;
                }
                throw shared.error;
            }

            const flight: Promise<FlightResult> = context.queue
                .add(() => this.runFlight(fingerprint, segment, context, logger))
                .then(result => {
                    if (this.inFlight.get(fingerprint) === flight) {
                        this.inFlight.delete(fingerprint);
                    }
                    return result;
                });
            this.inFlight.set(fingerprint, flight);

            const own = await raceWithSignal(flight, context.signal);
            if (own.ok) {
                return { analysis: own.analysis, fromCache: own.fromCache };
            }
            throw own.error;
        }
    }

    /** Runs inside the dispatch queue. Settles instead of throwing. */
    private async runFlight(fingerprint: string, segment: Segment, context: DispatchContext, logger: Logger): Promise<FlightResult> {
        try {
            throwIfAborted(context.signal);

            // Another request may have filled the cache while this task waited in the queue.
            const cached = await this.cache.get(fingerprint);
            if (cached !== undefined) {
                context.totals.cacheHits += 1;
                return { ok: true, analysis: cached, fromCache: true };
            }

            const prompt = this.prompts.render(context.promptVariant, {
                logData: segment.text,
                logFormat: context.formatHint,
                complexity: context.complexity,
            });
            const completion = await this.invokeWithRetries(prompt, context, logger);

            const costUsd = this.costAccountant.record(completion.tokensIn, completion.tokensOut, context.model);
            context.totals.tokensIn += completion.tokensIn;
            context.totals.tokensOut += completion.tokensOut;
            context.totals.costUsd += costUsd;

            await this.cache.put(fingerprint, completion.text);
            return { ok: true, analysis: completion.text, fromCache: false };
        } catch (error: unknown) {
            return { ok: false, error };
        }
    }

    private async invokeWithRetries(prompt: string, context: DispatchContext, logger: Logger): Promise<LlmCompletion> {
        const { backendMaxRetries, backendInitialDelayMs, backendMaxDelayMs } = this.options;

        for (let attempt = 0; ; attempt++) {
            await this.acquireRateLimit(context, logger);
            throwIfAborted(context.signal);

            context.totals.invocations += 1;
            try {
                return await this.backend.invoke(prompt, context.model, context.temperature);
            } catch (error: unknown) {
                const backendError = error instanceof BackendError
                    ? error
                    : new BackendError(500, getErrorMessageAndStack(error).message);
                if (!backendError.retryable || attempt >= backendMaxRetries) {
                    throw backendError;
                }
                const backoffMs = Math.min(backendInitialDelayMs * 2 ** attempt, backendMaxDelayMs);
                logger.warn(
                    { event: 'backend_invoke_failed', attempt: attempt + 1, providerStatus: backendError.providerStatus, backoffMs, err: backendError.message },
                    `Backend call failed; retrying in ${backoffMs}ms.`,
                );
                await delay(backoffMs, context.signal);
            }
        }
    }

    private async acquireRateLimit(context: DispatchContext, logger: Logger): Promise<void> {
        const { rateLimitMaxRetries, rateLimitMaxWaitMs } = this.options;

        for (let denials = 0; ; denials++) {
            throwIfAborted(context.signal);
            const decision = await this.rateLimiter.tryAcquire();
            if (decision.allowed) {
                return;
            }
            // Fail at once when the window frees up later than the wait budget.
            if (denials >= rateLimitMaxRetries || decision.retryAfterMs > rateLimitMaxWaitMs) {
                throw new RateLimitExceededError(decision.retryAfterMs, decision.scope);
            }
            logger.info(
                { event: 'rate_limit_wait', scope: decision.scope, retryAfterMs: decision.retryAfterMs, denial: denials + 1 },
                `Rate limited on the ${decision.scope} window; waiting ${decision.retryAfterMs}ms.`,
            );
            await delay(decision.retryAfterMs, context.signal);
        }
    }

    private toFailure(segment: Segment, error: unknown): SegmentFailure {
        const base = { index: segment.index, start: segment.start, end: segment.end };
        if (error instanceof AnalysisCancelledError) {
            return { ...base, reason: 'cancelled', message: error.message };
        }
        if (error instanceof RateLimitExceededError) {
            return { ...base, reason: 'rate_limited', message: error.message, retryAfterMs: error.retryAfterMs };
        }
        return { ...base, reason: 'backend', message: getErrorMessageAndStack(error).message };
    }
}
