// src/services/logFormatClassifier.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { LogComplexity, LogFormatHint } from '../types/logAnalysis.types';

const SAMPLE_LINES = 50;
const STRUCTURED_SAMPLE_LINES = 10;

const ACCESS_LINE = /^\d{1,3}(?:\.\d{1,3}){3}\s.*\[[^\]]+\].*"/;
const SYSLOG_LINE = /^[A-Z][a-z]{2}\s+\d{1,2}\s+\d{2}:\d{2}:\d{2}/;
const KEY_VALUE_PAIR = /\w+=\w+/;
const ERROR_MARKERS = ['ERROR', 'FATAL', 'EXCEPTION', 'FAILED'];

/**
 * Advisory classification of raw log text. Used to pick a prompt variant;
 * never fails the pipeline.
 */
@singleton()
export class LogFormatClassifierService {
    private readonly logger: Logger;

    constructor(@inject(LoggingService) loggingService: LoggingService) {
        this.logger = loggingService.getLogger('app', { service: 'LogFormatClassifierService' });
    }

    public detectFormat(text: string): LogFormatHint {
        try {
            return this.classify(text);
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            this.logger.warn({ event: 'format_detection_failed', err: message }, 'Format detection failed; treating log as unstructured.');
            return 'unstructured';
        }
    }

    private classify(text: string): LogFormatHint {
        const lines = text.split('\n').slice(0, SAMPLE_LINES);

        const jsonLines = lines.filter(line => {
            const trimmed = line.trim();
            return trimmed.startsWith('{') && trimmed.includes('}');
        }).length;
        if (jsonLines > lines.length * 0.5) {
            return 'json';
        }
        if (lines.some(line => ACCESS_LINE.test(line))) {
            return 'access';
        }
        if (lines.some(line => SYSLOG_LINE.test(line))) {
            return 'syslog';
        }
        if (lines.slice(0, STRUCTURED_SAMPLE_LINES).some(line => KEY_VALUE_PAIR.test(line))) {
            return 'structured';
        }
        return 'unstructured';
    }

    public estimateComplexity(text: string): LogComplexity {
        const lines = text.split('\n');
        const errorLines = lines.filter(line => {
            const upper = line.toUpperCase();
            return ERROR_MARKERS.some(marker => upper.includes(marker));
        });
        if (errorLines.length === 0) {
            return 'simple';
        }
        const distinctErrors = new Set(
            lines.filter(line => line.toUpperCase().includes('ERROR')).map(line => line.trim()),
        );
        if (errorLines.length < 10 && distinctErrors.size < 5) {
            return 'moderate';
        }
        return 'complex';
    }
}
