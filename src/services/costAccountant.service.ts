// src/services/costAccountant.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fsPromises from 'fs/promises';
import path from 'path';
import { Mutex } from 'async-mutex';
import { isSameDay, isSameMonth, startOfDay, subDays } from 'date-fns';
import { z } from 'zod';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { MODEL_PRICING } from '../config/pricing';
import { LoggingService } from './logging.service';
import { BudgetStatus, CostRecord, CostSummary, ModelPricing, UsageStats } from '../types/cost.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const ZERO_PRICING: ModelPricing = { inputPer1K: 0, outputPer1K: 0 };

const costRecordSchema = z.object({
    model: z.string(),
    tokensIn: z.number().int().nonnegative(),
    tokensOut: z.number().int().nonnegative(),
    costUsd: z.number().nonnegative(),
    timestamp: z.number().int().nonnegative(),
});

/**
 * Prices every completed backend call and keeps running aggregates.
 * Records are append-only. With `COST_LEDGER_PATH` set they are also appended to a JSONL file
 * that `initialize()` replays on start-up.
 */
@singleton()
export class CostAccountantService {
    private readonly logger: Logger;
    private readonly records: CostRecord[] = [];
    private readonly ledgerMutex = new Mutex();
    private readonly pendingWrites = new Set<Promise<void>>();
    private readonly ledgerPath?: string;
    private readonly defaultModel: string;
    private readonly dailyBudgetUsd?: number;
    private readonly monthlyBudgetUsd?: number;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.logger = loggingService.getLogger('app', { service: 'CostAccountantService' });
        this.ledgerPath = configService.costLedgerPath;
        this.defaultModel = configService.llm.model;
        this.dailyBudgetUsd = configService.dailyBudgetUsd;
        this.monthlyBudgetUsd = configService.monthlyBudgetUsd;
    }

    /**
     * Replays the ledger file, if one is configured. Malformed lines are skipped.
     * @returns number of records loaded
     */
    public async initialize(): Promise<number> {
        if (!this.ledgerPath) {
            return 0;
        }
        let content: string;
        try {
            content = await fsPromises.readFile(this.ledgerPath, 'utf8');
        } catch (error: unknown) {
            if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
                this.logger.info({ event: 'cost_ledger_missing', ledgerPath: this.ledgerPath }, 'No cost ledger yet; starting empty.');
                return 0;
            }
            throw error;
        }

        const replayed: CostRecord[] = [];
        content.split('\n').forEach((line, lineIndex) => {
            if (line.trim() === '') {
                return;
            }
            const parsed = this.parseLedgerLine(line);
            if (parsed) {
                replayed.push(parsed);
            } else {
                this.logger.warn({ event: 'cost_ledger_line_skipped', line: lineIndex + 1 }, 'Skipping malformed cost ledger line.');
            }
        });
        this.records.unshift(...replayed);
        this.logger.info({ event: 'cost_ledger_loaded', records: replayed.length }, 'Cost ledger replayed.');
        return replayed.length;
    }

    private parseLedgerLine(line: string): CostRecord | undefined {
        try {
            const parsed = costRecordSchema.safeParse(JSON.parse(line));
            return parsed.success ? parsed.data : undefined;
        } catch {
            return undefined;
        }
    }

    public priceFor(model: string): ModelPricing {
        const pricing = MODEL_PRICING[model];
        if (pricing) {
            return pricing;
        }
        this.logger.warn({ event: 'unknown_model_pricing', model, fallbackModel: this.defaultModel }, 'No price known for model; using the default model price.');
        return MODEL_PRICING[this.defaultModel] ?? ZERO_PRICING;
    }

    /** @returns the dollar cost of this call */
    public record(tokensIn: number, tokensOut: number, model: string): number {
        if (!Number.isInteger(tokensIn) || tokensIn < 0 || !Number.isInteger(tokensOut) || tokensOut < 0) {
            throw new RangeError(`Token counts must be non-negative integers (got ${tokensIn}/${tokensOut})`);
        }
        const pricing = this.priceFor(model);
        const costUsd = (tokensIn / 1000) * pricing.inputPer1K + (tokensOut / 1000) * pricing.outputPer1K;
        const record: CostRecord = { model, tokensIn, tokensOut, costUsd, timestamp: Date.now() };
        this.records.push(record);

        if (this.ledgerPath) {
            this.appendToLedger(this.ledgerPath, record);
        }
        return costUsd;
    }

    private appendToLedger(ledgerPath: string, record: CostRecord): void {
        const write = this.ledgerMutex
            .runExclusive(async () => {
                await fsPromises.mkdir(path.dirname(ledgerPath), { recursive: true });
                await fsPromises.appendFile(ledgerPath, `${JSON.stringify(record)}\n`, 'utf8');
            })
            .catch((error: unknown) => {
                const { message } = getErrorMessageAndStack(error);
                this.logger.error({ event: 'cost_ledger_write_failed', err: message }, 'Failed to append cost record to ledger.');
            })
            .finally(() => {
                this.pendingWrites.delete(write);
            });
        this.pendingWrites.add(write);
    }

    /** Resolves once every ledger append issued so far has settled. */
    public async flush(): Promise<void> {
        await Promise.all([...this.pendingWrites]);
    }

    public summary(now: Date = new Date()): CostSummary {
        let dailyUsd = 0;
        let monthlyUsd = 0;
        let requestsToday = 0;
        for (const record of this.records) {
            const at = new Date(record.timestamp);
            if (isSameMonth(at, now)) {
                monthlyUsd += record.costUsd;
            }
            if (isSameDay(at, now)) {
                dailyUsd += record.costUsd;
                requestsToday += 1;
            }
        }
        return {
            dailyUsd,
            monthlyUsd,
            averagePerRequestUsd: requestsToday > 0 ? dailyUsd / requestsToday : 0,
            requestsToday,
        };
    }

    /** Aggregates over the last `days` calendar days, today included. */
    public usageStats(days: number, now: Date = new Date()): UsageStats {
        if (!Number.isInteger(days) || days <= 0) {
            throw new RangeError(`days must be a positive integer, got ${days}`);
        }
        const from = startOfDay(subDays(now, days - 1)).getTime();
        let totalCostUsd = 0;
        let totalRequests = 0;
        for (const record of this.records) {
            if (record.timestamp >= from && record.timestamp <= now.getTime()) {
                totalCostUsd += record.costUsd;
                totalRequests += 1;
            }
        }
        return {
            days,
            totalCostUsd,
            totalRequests,
            averageDailyCostUsd: totalCostUsd / days,
            averageCostPerRequestUsd: totalRequests > 0 ? totalCostUsd / totalRequests : 0,
        };
    }

    public checkBudget(now: Date = new Date()): BudgetStatus {
        const { dailyUsd, monthlyUsd } = this.summary(now);
        const status: BudgetStatus = {
            dailyExceeded: this.dailyBudgetUsd !== undefined && dailyUsd > this.dailyBudgetUsd,
            monthlyExceeded: this.monthlyBudgetUsd !== undefined && monthlyUsd > this.monthlyBudgetUsd,
            dailyUsd,
            monthlyUsd,
            dailyBudgetUsd: this.dailyBudgetUsd,
            monthlyBudgetUsd: this.monthlyBudgetUsd,
        };
        if (status.dailyExceeded || status.monthlyExceeded) {
            this.logger.warn({ event: 'budget_exceeded', ...status }, 'Cost budget exceeded.');
        }
        return status;
    }
}
