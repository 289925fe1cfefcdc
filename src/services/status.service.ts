// src/services/status.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { AnalysisCacheService } from './analysisCache.service';
import { RequestRateLimiterService } from './requestRateLimiter.service';
import { CostAccountantService } from './costAccountant.service';
import { ILlmBackend, LLM_BACKEND_TOKEN } from './interfaces/llmBackend.interface';
import { CacheStats } from '../types/cache.types';
import { RateLimitSnapshot } from '../types/rateLimit.types';
import { BudgetStatus, CostSummary, UsageStats } from '../types/cost.types';

/** Trailing window reported under `usage`. */
const USAGE_WINDOW_DAYS = 7;

export interface StatusSnapshot {
    status: 'ok' | 'degraded';
    uptimeSeconds: number;
    backendConfigured: boolean;
    model: string;
    cache: CacheStats;
    rateLimits: RateLimitSnapshot;
    costs: CostSummary;
    usage: UsageStats;
    budget: BudgetStatus;
}

/** Read-only view over the shared pipeline resources, for the status endpoint. */
@singleton()
export class StatusService {
    private readonly startedAt = Date.now();

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(AnalysisCacheService) private readonly cache: AnalysisCacheService,
        @inject(RequestRateLimiterService) private readonly rateLimiter: RequestRateLimiterService,
        @inject(CostAccountantService) private readonly costAccountant: CostAccountantService,
        @inject(LLM_BACKEND_TOKEN) private readonly backend: ILlmBackend,
    ) { }

    public async snapshot(): Promise<StatusSnapshot> {
        const budget = this.costAccountant.checkBudget();
        const degraded = !this.backend.isConfigured || budget.dailyExceeded || budget.monthlyExceeded;
        return {
            status: degraded ? 'degraded' : 'ok',
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            backendConfigured: this.backend.isConfigured,
            model: this.configService.llm.model,
            cache: this.cache.stats(),
            rateLimits: await this.rateLimiter.snapshot(),
            costs: this.costAccountant.summary(),
            usage: this.costAccountant.usageStats(USAGE_WINDOW_DAYS),
            budget,
        };
    }
}
