// src/services/promptTemplate.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { LogComplexity, LogFormatHint, PromptVariant } from '../types/logAnalysis.types';

const PROMPT_VARIANTS: readonly PromptVariant[] = ['standard', 'quick', 'detailed'];

export interface PromptValues {
    logData: string;
    logFormat: LogFormatHint;
    complexity: LogComplexity;
}

/**
 * Loads the prompt templates from `PROMPTS_DIRECTORY` (`<variant>.txt`) once, at construction.
 * Template wording is opaque here; only the placeholders are interpreted.
 */
@singleton()
export class PromptTemplateService {
    private readonly logger: Logger;
    private readonly templates = new Map<PromptVariant, string>();

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.logger = loggingService.getLogger('app', { service: 'PromptTemplateService' });
        const directory = configService.promptsDirectory;

        for (const variant of PROMPT_VARIANTS) {
            const filePath = path.join(directory, `${variant}.txt`);
            try {
                this.templates.set(variant, fs.readFileSync(filePath, 'utf8'));
            } catch (error: unknown) {
                const { message } = getErrorMessageAndStack(error);
                this.logger.fatal({ event: 'prompt_template_load_failed', filePath, err: message }, 'Could not load prompt template.');
                throw new Error(`Failed to load prompt template "${variant}" from ${filePath}: ${message}`);
            }
        }
        this.logger.info({ event: 'prompt_templates_loaded', directory, variants: PROMPT_VARIANTS }, 'Prompt templates loaded.');
    }

    public static isPromptVariant(value: unknown): value is PromptVariant {
        return typeof value === 'string' && PROMPT_VARIANTS.some(variant => variant === value);
    }

    /** An explicit choice wins; otherwise complex logs get the detailed prompt. */
    public selectVariant(complexity: LogComplexity, requested?: PromptVariant): PromptVariant {
        if (requested) {
            return requested;
        }
        return complexity === 'complex' ? 'detailed' : 'standard';
    }

    public render(variant: PromptVariant, values: PromptValues): string {
        const template = this.templates.get(variant);
        if (template === undefined) {
            throw new Error(`Unknown prompt variant "${variant}"`);
        }
        // Log data goes last so placeholders inside the log text stay untouched.
        return template
            .replaceAll('{log_format}', () => values.logFormat)
            .replaceAll('{complexity}', () => values.complexity)
            .replaceAll('{log_data}', () => values.logData);
    }
}
