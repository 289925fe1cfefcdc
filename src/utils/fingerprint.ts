// src/utils/fingerprint.ts
import { createHash } from 'crypto';
import { LogComplexity, LogFormatHint, PromptVariant } from '../types/logAnalysis.types';

export interface FingerprintInput {
    text: string;
    model: string;
    promptVariant: PromptVariant;
    formatHint: LogFormatHint;
    complexity: LogComplexity;
}

/**
 * Content address of one segment's analysis. Everything that shapes the prompt or picks the model
 * is part of the key, so a cached answer is never served across models or prompts.
 */
export const computeFingerprint = ({ text, model, promptVariant, formatHint, complexity }: FingerprintInput): string =>
    createHash('sha256')
        .update([model, promptVariant, formatHint, complexity, text].join('\u0000'), 'utf8')
        .digest('hex');
