// src/api/index.ts
import { Router } from 'express';
import createV1Router from './v1';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import { LogAnalyzerService } from '../services/logAnalyzer.service';
import { StatusService } from '../services/status.service';
import { AnalysisCacheService } from '../services/analysisCache.service';

export interface ApiDependencies {
    configService: ConfigService;
    loggingService: LoggingService;
    logAnalyzer: LogAnalyzerService;
    statusService: StatusService;
    cache: AnalysisCacheService;
}

/**
 * Top-level API router; each API version is mounted under its own prefix.
 */
const createApiRouter = (deps: ApiDependencies): Router => {
    const router = Router();
    router.use('/v1', createV1Router(deps));
    return router;
};

export default createApiRouter;
