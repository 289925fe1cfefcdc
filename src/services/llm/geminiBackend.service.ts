// src/services/llm/geminiBackend.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { GoogleGenAI } from '@google/genai';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { BackendError } from '../../errors/analysis.errors';
import { ILlmBackend, LlmCompletion } from '../interfaces/llmBackend.interface';
import { toBackendError, toLlmCompletion } from './geminiResponse.mapper';

@singleton()
export class GeminiBackendService implements ILlmBackend {
    private readonly logger: Logger;
    private readonly client?: GoogleGenAI;
    private readonly maxOutputTokens: number;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.logger = loggingService.getLogger('app', { service: 'GeminiBackendService' });
        const { apiKey, maxOutputTokens } = configService.llm;
        this.maxOutputTokens = maxOutputTokens;

        if (apiKey) {
            this.client = new GoogleGenAI({ apiKey });
            this.logger.info({ event: 'gemini_client_init_success' }, 'Gemini client initialized.');
        } else {
            this.logger.warn({ event: 'gemini_client_not_configured' }, 'GEMINI_API_KEY is not set; analysis calls will fail.');
        }
    }

    public get isConfigured(): boolean {
        return this.client !== undefined;
    }

    public async invoke(prompt: string, model: string, temperature: number): Promise<LlmCompletion> {
        if (!this.client) {
            throw new BackendError(401, 'Gemini backend is not configured (GEMINI_API_KEY missing)');
        }
        const startedAt = Date.now();
        try {
            const response = await this.client.models.generateContent({
                model,
                contents: prompt,
                config: { temperature, maxOutputTokens: this.maxOutputTokens },
            });
            const completion = toLlmCompletion(response);
            this.logger.debug(
                { event: 'gemini_generate_success', model, tokensIn: completion.tokensIn, tokensOut: completion.tokensOut, durationMs: Date.now() - startedAt },
                'Gemini generateContent succeeded.',
            );
            return completion;
        } catch (error: unknown) {
            const backendError = toBackendError(error);
            this.logger.warn(
                { event: 'gemini_generate_failed', model, providerStatus: backendError.providerStatus, err: backendError.message },
                'Gemini generateContent failed.',
            );
            throw backendError;
        }
    }
}
