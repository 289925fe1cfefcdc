// src/container.ts
import 'reflect-metadata';
import dotenv from 'dotenv';
import { container } from 'tsyringe';

import { ENV_SOURCE, EnvSource } from './config/types';
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { ILlmBackend, LLM_BACKEND_TOKEN } from './services/interfaces/llmBackend.interface';
import { GeminiBackendService } from './services/llm/geminiBackend.service';
import { AnalysisCachePersistenceService } from './services/analysisCachePersistence.service';
import { AnalysisCacheService } from './services/analysisCache.service';
import { RequestRateLimiterService } from './services/requestRateLimiter.service';
import { CostAccountantService } from './services/costAccountant.service';
import { PromptTemplateService } from './services/promptTemplate.service';
import { LogChunkerService } from './services/logChunker.service';
import { LogFormatClassifierService } from './services/logFormatClassifier.service';
import { LogPreprocessorService } from './services/logPreprocessor.service';
import { SegmentDispatcherService } from './services/segmentDispatcher.service';
import { AnalysisAggregatorService } from './services/analysisAggregator.service';
import { LogAnalyzerService } from './services/logAnalyzer.service';
import { StatusService } from './services/status.service';

dotenv.config();

/**
 * Registers every application service with the tsyringe container. Shared resources
 * (cache, rate limiter, cost accountant, single-flight registry) are singletons.
 */
container.register<EnvSource>(ENV_SOURCE, { useValue: process.env });

container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);

container.registerSingleton<ILlmBackend>(LLM_BACKEND_TOKEN, GeminiBackendService);

container.registerSingleton(AnalysisCachePersistenceService);
container.registerSingleton(AnalysisCacheService);
container.registerSingleton(RequestRateLimiterService);
container.registerSingleton(CostAccountantService);
container.registerSingleton(PromptTemplateService);

container.registerSingleton(LogChunkerService);
container.registerSingleton(LogFormatClassifierService);
container.registerSingleton(LogPreprocessorService);
container.registerSingleton(SegmentDispatcherService);
container.registerSingleton(AnalysisAggregatorService);
container.registerSingleton(LogAnalyzerService);
container.registerSingleton(StatusService);

export { container };
