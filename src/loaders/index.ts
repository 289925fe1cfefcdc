// src/loaders/index.ts
import { Express } from 'express';
import { Server as HttpServer } from 'http';
import { container } from 'tsyringe';
import { loadExpress } from './express.loader';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import { LogAnalyzerService } from '../services/logAnalyzer.service';
import { StatusService } from '../services/status.service';
import { CostAccountantService } from '../services/costAccountant.service';
import { AnalysisCacheService } from '../services/analysisCache.service';

interface LoadersResult {
    app: Express;
    httpServer: HttpServer;
}

/**
 * Resolves the application services from the container, replays persisted state and builds the
 * HTTP server. Errors propagate so start-up halts.
 */
export const initLoaders = async (): Promise<LoadersResult> => {
    const configService = container.resolve(ConfigService);
    const loggingService = container.resolve(LoggingService);
    const logger = loggingService.getLogger('app', { service: 'Loaders' });

    const replayed = await container.resolve(CostAccountantService).initialize();
    logger.info({ event: 'cost_ledger_ready', records: replayed }, 'Cost accountant ready.');

    const app = loadExpress({
        configService,
        loggingService,
        logAnalyzer: container.resolve(LogAnalyzerService),
        statusService: container.resolve(StatusService),
        cache: container.resolve(AnalysisCacheService),
    });
    const httpServer = new HttpServer(app);
    httpServer.requestTimeout = configService.analysisTimeoutMs + 30000;

    logger.info({ event: 'loaders_complete' }, 'Express application loaded.');
    return { app, httpServer };
};
