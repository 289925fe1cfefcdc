// src/config/pricing.ts
import { ModelPricing } from '../types/cost.types';

/**
 * Static list prices in USD per 1K tokens. Update when providers change pricing.
 */
export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
    'gemini-2.0-flash': { inputPer1K: 0.0001, outputPer1K: 0.0004 },
    'gemini-2.0-flash-lite': { inputPer1K: 0.000075, outputPer1K: 0.0003 },
    'gemini-1.5-flash': { inputPer1K: 0.000075, outputPer1K: 0.0003 },
    'gemini-1.5-pro': { inputPer1K: 0.00125, outputPer1K: 0.005 },
    'gemini-2.5-pro': { inputPer1K: 0.00125, outputPer1K: 0.01 },
    'gpt-4o-mini': { inputPer1K: 0.00015, outputPer1K: 0.0006 },
    'gpt-4o': { inputPer1K: 0.0025, outputPer1K: 0.01 },
    'gpt-3.5-turbo': { inputPer1K: 0.0005, outputPer1K: 0.0015 },
};
