// src/services/logAnalyzer.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { LogPreprocessorService } from './logPreprocessor.service';
import { LogFormatClassifierService } from './logFormatClassifier.service';
import { LogChunkerService } from './logChunker.service';
import { PromptTemplateService } from './promptTemplate.service';
import { SegmentDispatcherService } from './segmentDispatcher.service';
import { AnalysisAggregatorService } from './analysisAggregator.service';
import { EmptyInputError } from '../errors/analysis.errors';
import { AnalysisReport, LogDocument, PromptVariant } from '../types/logAnalysis.types';
import { throwIfAborted } from '../utils/abortUtils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export interface AnalyzeOptions {
    signal?: AbortSignal;
    requestId?: string;
    promptVariant?: PromptVariant;
}

/**
 * Entry point of the pipeline: preprocess, classify, chunk, dispatch, aggregate.
 */
@singleton()
export class LogAnalyzerService {
    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
        @inject(LogPreprocessorService) private readonly preprocessor: LogPreprocessorService,
        @inject(LogFormatClassifierService) private readonly classifier: LogFormatClassifierService,
        @inject(LogChunkerService) private readonly chunker: LogChunkerService,
        @inject(PromptTemplateService) private readonly prompts: PromptTemplateService,
        @inject(SegmentDispatcherService) private readonly dispatcher: SegmentDispatcherService,
        @inject(AnalysisAggregatorService) private readonly aggregator: AnalysisAggregatorService,
    ) { }

    public async analyze(text: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
        const requestId = options.requestId ?? uuidv4();
        const logger = this.loggingService.getRequestLogger(requestId, { service: 'LogAnalyzerService' });
        const startedAt = Date.now();

        if (text.trim() === '') {
            throw new EmptyInputError();
        }
        throwIfAborted(options.signal);

        const formatHint = this.classifier.detectFormat(text);
        const complexity = this.classifier.estimateComplexity(text);
        const promptVariant = this.prompts.selectVariant(complexity, options.promptVariant);

        let documentText = text;
        if (this.configService.preprocessing.enabled) {
            const preprocessed = this.preprocessor.preprocess(text);
            documentText = preprocessed.text;
            logger.debug(
                { event: 'log_preprocessed', applied: preprocessed.applied, originalLength: preprocessed.originalLength, filteredLength: preprocessed.filteredLength },
                'Log preprocessed.',
            );
        }
        const document: LogDocument = {
            text: documentText,
            byteLength: Buffer.byteLength(documentText, 'utf8'),
            formatHint,
        };

        const segments = this.chunker.split(document.text);
        logger.info(
            { event: 'analysis_start', byteLength: document.byteLength, formatHint, complexity, promptVariant, segments: segments.length },
            `Analyzing ${segments.length} segment(s).`,
        );

        try {
            const { outcomes, totals } = await this.dispatcher.dispatch({
                segments,
                formatHint,
                complexity,
                promptVariant,
                signal: options.signal,
                logger,
            });
            throwIfAborted(options.signal);

            const report = this.aggregator.aggregate(outcomes);
            const failedSegments = outcomes.filter(outcome => outcome.status === 'failed').length;
            const cachedSegments = outcomes.filter(outcome => outcome.status === 'fulfilled' && outcome.result.fromCache).length;

            const result: AnalysisReport = {
                requestId,
                report,
                formatHint,
                complexity,
                promptVariant,
                segmentCount: segments.length,
                failedSegments,
                cachedSegments,
                invocations: totals.invocations,
                tokensIn: totals.tokensIn,
                tokensOut: totals.tokensOut,
                costUsd: totals.costUsd,
                durationMs: Date.now() - startedAt,
            };
            logger.info({ event: 'analysis_complete', ...result, report: undefined }, 'Analysis complete.');
            return result;
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            logger.error({ event: 'analysis_failed', err: message, durationMs: Date.now() - startedAt }, 'Analysis failed.');
            throw error;
        }
    }
}
