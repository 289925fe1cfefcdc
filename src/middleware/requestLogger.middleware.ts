// src/middleware/requestLogger.middleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { LoggingService } from '../services/logging.service';

const REQUEST_ID_HEADER = 'x-request-id';

/** Request id chosen for this request by the request logger. */
export const getRequestId = (res: Response): string | undefined => {
    const requestId: unknown = res.locals.requestId;
    return typeof requestId === 'string' ? requestId : undefined;
};

/**
 * Assigns a request id (honouring an incoming `X-Request-Id`) and logs each response with its
 * status and duration. Skips the health probe.
 */
export const createRequestLoggerMiddleware = (loggingService: LoggingService): RequestHandler => {
    const logger = loggingService.getLogger('app', { service: 'HttpServer' });

    return (req: Request, res: Response, next: NextFunction): void => {
        const incoming = req.header(REQUEST_ID_HEADER);
        const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
        res.locals.requestId = requestId;
        res.setHeader('X-Request-Id', requestId);

        if (req.path === '/health' || req.path === '/favicon.ico') {
            next();
            return;
        }

        const startedAt = process.hrtime.bigint();
        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
            const entry = {
                event: 'http_request_complete',
                requestId,
                method: req.method,
                url: req.originalUrl,
                statusCode: res.statusCode,
                durationMs: Math.round(durationMs),
            };
            if (res.statusCode >= 500) {
                logger.error(entry, 'Request failed.');
            } else if (res.statusCode >= 400) {
                logger.warn(entry, 'Request rejected.');
            } else {
                logger.info(entry, 'Request completed.');
            }
        });
        next();
    };
};
