// src/api/v1/index.ts
import { Router } from 'express';
import createLogAnalysisRouter from './logAnalysis/logAnalysis.routes';
import { createLogAnalysisController } from './logAnalysis/logAnalysis.controller';
import { createGetStatusHandler } from './status/status.controller';
import { createClearCacheHandler } from './cache/cache.controller';
import type { ApiDependencies } from '../index';

/**
 * Routes of API version 1, mounted under `/api/v1`.
 */
const createV1Router = (deps: ApiDependencies): Router => {
    const router = Router();
    const { configService } = deps;

    const logAnalysisController = createLogAnalysisController(deps.logAnalyzer, deps.loggingService, configService.analysisTimeoutMs);
    router.use('/logs', createLogAnalysisRouter(logAnalysisController, {
        uploadMaxBytes: configService.uploadMaxBytes,
        uploadRateLimitPerMinute: configService.uploadRateLimitPerMinute,
    }));
    router.get('/status', createGetStatusHandler(deps.statusService));
    router.delete('/cache', createClearCacheHandler(deps.cache));

    return router;
};

export default createV1Router;
