// src/types/cost.types.ts

export interface CostRecord {
    model: string;
    tokensIn: number;
    tokensOut: number;
    costUsd: number;
    /** Unix epoch milliseconds. */
    timestamp: number;
}

export interface CostSummary {
    dailyUsd: number;
    monthlyUsd: number;
    averagePerRequestUsd: number;
    requestsToday: number;
}

export interface UsageStats {
    days: number;
    totalCostUsd: number;
    totalRequests: number;
    averageDailyCostUsd: number;
    averageCostPerRequestUsd: number;
}

export interface BudgetStatus {
    dailyExceeded: boolean;
    monthlyExceeded: boolean;
    dailyUsd: number;
    monthlyUsd: number;
    dailyBudgetUsd?: number;
    monthlyBudgetUsd?: number;
}

export interface ModelPricing {
    /** USD per 1K prompt tokens. */
    inputPer1K: number;
    /** USD per 1K completion tokens. */
    outputPer1K: number;
}
