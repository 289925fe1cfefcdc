// src/services/llm/geminiResponse.mapper.ts
import type { GenerateContentResponse } from '@google/genai';
import { BackendError } from '../../errors/analysis.errors';
import { getErrorMessageAndStack } from '../../utils/errorUtils';
import { LlmCompletion } from '../interfaces/llmBackend.interface';

/** Status used when the provider error carries none (network resets, SDK bugs). */
const UNKNOWN_PROVIDER_STATUS = 500;

type GeminiResponseLike = Pick<GenerateContentResponse, 'text' | 'usageMetadata'>;

/**
 * Turns an SDK response into a completion. An empty answer counts as a provider failure
 * (safety block, truncated stream), and is retried like one.
 */
export const toLlmCompletion = (response: GeminiResponseLike): LlmCompletion => {
    const text = response.text?.trim();
    if (!text) {
        throw new BackendError(UNKNOWN_PROVIDER_STATUS, 'Gemini returned an empty response');
    }
    return {
        text,
        tokensIn: response.usageMetadata?.promptTokenCount ?? 0,
        tokensOut: response.usageMetadata?.candidatesTokenCount ?? 0,
    };
};

const readStatus = (error: unknown): number | undefined => {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    if ('code' in error && typeof error.code === 'number') {
        return error.code;
    }
    return undefined;
};

export const toBackendError = (error: unknown): BackendError => {
    if (error instanceof BackendError) {
        return error;
    }
    const { message } = getErrorMessageAndStack(error);
    return new BackendError(readStatus(error) ?? UNKNOWN_PROVIDER_STATUS, `Gemini request failed: ${message}`);
};
