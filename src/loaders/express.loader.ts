// src/loaders/express.loader.ts
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import createApiRouter, { ApiDependencies } from '../api';
import { createRequestLoggerMiddleware } from '../middleware/requestLogger.middleware';
import { createErrorHandlerMiddleware, notFoundHandler } from '../middleware/errorHandler.middleware';

/**
 * Builds the Express application: CORS, body parsing, request logging, API routes and the
 * error handlers, in that order.
 */
export const loadExpress = (deps: ApiDependencies): Express => {
    const { configService, loggingService } = deps;
    const app = express();

    // A '*' entry anywhere in the allow-list opens CORS to every origin.
    const corsOptions = {
        origin: configService.corsAllowedOrigins.includes('*') ? '*' : configService.corsAllowedOrigins,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        optionsSuccessStatus: 200,
    };

    // --- Core Middleware Setup ---
    app.use(cors(corsOptions));

    // Logs every request on completion and assigns the X-Request-Id the handlers echo.
    app.use(createRequestLoggerMiddleware(loggingService));

    // Raw log bodies; multipart uploads are handled per route by multer.
    app.use(express.text({ type: 'text/plain', limit: configService.uploadMaxBytes }));

    // --- Health Probe ---
    // Answers without touching the pipeline; /api/v1/status has the detailed view.
    app.get('/health', (_req: Request, res: Response) => {
        res.status(200).json({ status: 'ok' });
    });

    // --- API Routes ---
    app.use('/api', createApiRouter(deps));

    // --- Error Handling Middleware ---
    // Unknown routes become a 404 HttpError for the error handler below.
    app.use(notFoundHandler);

    // Maps analysis and HTTP errors to JSON responses (with Retry-After on 429).
    app.use(createErrorHandlerMiddleware(loggingService, configService));
    return app;
};
