// src/test/helpers.ts
import 'reflect-metadata';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { EnvSource } from '../config/types';
import { LoggingService } from '../services/logging.service';
import { AnalysisCachePersistenceService } from '../services/analysisCachePersistence.service';
import { AnalysisCacheService } from '../services/analysisCache.service';
import { RequestRateLimiterService } from '../services/requestRateLimiter.service';
import { CostAccountantService } from '../services/costAccountant.service';
import { PromptTemplateService } from '../services/promptTemplate.service';
import { LogChunkerService } from '../services/logChunker.service';
import { LogFormatClassifierService } from '../services/logFormatClassifier.service';
import { LogPreprocessorService } from '../services/logPreprocessor.service';
import { SegmentDispatcherService } from '../services/segmentDispatcher.service';
import { AnalysisAggregatorService } from '../services/analysisAggregator.service';
import { LogAnalyzerService } from '../services/logAnalyzer.service';
import { StatusService } from '../services/status.service';
import { ILlmBackend, LlmCompletion } from '../services/interfaces/llmBackend.interface';
import { Segment } from '../types/logAnalysis.types';

export const PROMPTS_DIRECTORY = path.resolve(__dirname, '..', '..', 'prompts');

/** Configuration for tests: silent logging, fast retries, the repository's prompt templates. */
export const createTestConfig = (overrides: EnvSource = {}): ConfigService =>
    new ConfigService({
        NODE_ENV: 'test',
        LOG_LEVEL: 'silent',
        PROMPTS_DIRECTORY,
        BACKEND_INITIAL_DELAY_MS: '1',
        BACKEND_MAX_DELAY_MS: '4',
        RATE_LIMIT_MAX_WAIT_MS: '5',
        ...overrides,
    });

export interface BackendCall {
    prompt: string;
    model: string;
    temperature: number;
}

export type BackendHandler = (prompt: string, callIndex: number) => Promise<LlmCompletion> | LlmCompletion;

/** Deterministic default: the answer depends only on the prompt. */
export const defaultBackendHandler: BackendHandler = prompt => ({
    text: `analysis of a ${prompt.length}-character prompt`,
    tokensIn: Math.ceil(prompt.length / 4),
    tokensOut: 50,
});

/** In-process stand-in for the language-model backend. */
export class FakeLlmBackend implements ILlmBackend {
    public readonly calls: BackendCall[] = [];
    public isConfigured = true;
    private active = 0;
    public maxActive = 0;

    constructor(private readonly handler: BackendHandler = defaultBackendHandler) { }

    public async invoke(prompt: string, model: string, temperature: number): Promise<LlmCompletion> {
        const callIndex = this.calls.length;
        this.calls.push({ prompt, model, temperature });
        this.active += 1;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            return await this.handler(prompt, callIndex);
        } finally {
            this.active -= 1;
        }
    }
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const makeSegments = (texts: string[]): Segment[] => {
    let offset = 0;
    return texts.map((text, index) => {
        const segment: Segment = { index, text, start: offset, end: offset + text.length };
        offset += text.length;
        return segment;
    });
};

export interface Pipeline {
    config: ConfigService;
    logging: LoggingService;
    backend: FakeLlmBackend;
    persistence: AnalysisCachePersistenceService;
    cache: AnalysisCacheService;
    rateLimiter: RequestRateLimiterService;
    costAccountant: CostAccountantService;
    prompts: PromptTemplateService;
    chunker: LogChunkerService;
    classifier: LogFormatClassifierService;
    preprocessor: LogPreprocessorService;
    dispatcher: SegmentDispatcherService;
    aggregator: AnalysisAggregatorService;
    analyzer: LogAnalyzerService;
    status: StatusService;
}

/** Wires an isolated set of pipeline services, sharing nothing with other tests. */
export const createPipeline = (overrides: EnvSource = {}, backend: FakeLlmBackend = new FakeLlmBackend()): Pipeline => {
    const config = createTestConfig(overrides);
    const logging = new LoggingService(config);
    const persistence = new AnalysisCachePersistenceService(config, logging);
    const cache = new AnalysisCacheService(config, logging, persistence);
    const rateLimiter = new RequestRateLimiterService(config, logging);
    const costAccountant = new CostAccountantService(config, logging);
    const prompts = new PromptTemplateService(config, logging);
    const chunker = new LogChunkerService(config);
    const classifier = new LogFormatClassifierService(logging);
    const preprocessor = new LogPreprocessorService(config);
    const dispatcher = new SegmentDispatcherService(config, logging, cache, rateLimiter, costAccountant, prompts, backend);
    const aggregator = new AnalysisAggregatorService();
    const analyzer = new LogAnalyzerService(config, logging, preprocessor, classifier, chunker, prompts, dispatcher, aggregator);
    const status = new StatusService(config, cache, rateLimiter, costAccountant, backend);
    return {
        config, logging, backend, persistence, cache, rateLimiter, costAccountant, prompts,
        chunker, classifier, preprocessor, dispatcher, aggregator, analyzer, status,
    };
};
