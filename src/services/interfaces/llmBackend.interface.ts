// src/services/interfaces/llmBackend.interface.ts

export interface LlmCompletion {
    text: string;
    tokensIn: number;
    tokensOut: number;
}

/**
 * A language-model provider. Implementations throw `BackendError` for every provider-side failure.
 */
export interface ILlmBackend {
    /** False when the backend lacks credentials and every call would fail. */
    readonly isConfigured: boolean;
    invoke(prompt: string, model: string, temperature: number): Promise<LlmCompletion>;
}

export const LLM_BACKEND_TOKEN = 'ILlmBackend';
