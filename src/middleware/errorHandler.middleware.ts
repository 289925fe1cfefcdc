// src/middleware/errorHandler.middleware.ts
import { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';
import { LoggingService } from '../services/logging.service';
import { ConfigService } from '../config/config.service';
import {
    AnalysisError,
    AnalysisFailedError,
    RateLimitExceededError,
} from '../errors/analysis.errors';
import { HttpError } from '../errors/http.errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { getRequestId } from './requestLogger.middleware';

interface ErrorResponseBody {
    status: 'error';
    statusCode: number;
    code: string;
    message: string;
    kind?: string;
    retryAfterMs?: number;
    failures?: AnalysisFailedError['failures'];
}

interface ResolvedError {
    statusCode: number;
    code: string;
    message: string;
    isOperational: boolean;
    retryAfterMs?: number;
}

/** Body-parser and similar libraries attach the intended status to the error object. */
const readAttachedStatus = (err: unknown): number | undefined => {
    if (typeof err !== 'object' || err === null) {
        return undefined;
    }
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
    return undefined;
};

const resolveError = (err: unknown): ResolvedError => {
    if (err instanceof AnalysisError) {
        const retryAfterMs = err instanceof RateLimitExceededError || err instanceof AnalysisFailedError
            ? err.retryAfterMs
            : undefined;
        return { statusCode: err.status, code: err.code, message: err.message, isOperational: err.isOperational, retryAfterMs };
    }
    if (err instanceof multer.MulterError) {
        const statusCode = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
        return { statusCode, code: err.code, message: err.message, isOperational: true };
    }
    if (err instanceof HttpError) {
        return { statusCode: err.status, code: `HTTP_${err.status}`, message: err.message, isOperational: err.isOperational };
    }
    const { message } = getErrorMessageAndStack(err);
    const attached = readAttachedStatus(err);
    if (attached !== undefined && attached >= 400 && attached < 500) {
        return { statusCode: attached, code: `HTTP_${attached}`, message, isOperational: true };
    }
    return { statusCode: 500, code: 'INTERNAL_ERROR', message, isOperational: false };
};

/**
 * Final error handler: logs, then answers with a JSON error body. Rate-limit failures carry a
 * `Retry-After` header; details of unexpected server errors are hidden in production.
 */
export const createErrorHandlerMiddleware = (
    loggingService: LoggingService,
    configService: ConfigService,
): ErrorRequestHandler => {
    const logger = loggingService.getLogger('app', { service: 'ErrorHandler' });

    // Express recognises error handlers by their four parameters.
    return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
        const resolved = resolveError(err);
        const requestId = getRequestId(res);
        const logEntry = { event: 'http_error', requestId, method: req.method, url: req.originalUrl, statusCode: resolved.statusCode, code: resolved.code };

        if (!resolved.isOperational || resolved.statusCode >= 500) {
            const { message, stack } = getErrorMessageAndStack(err);
            logger.error({ ...logEntry, err: { message, stack } }, 'Unhandled server error.');
        } else {
            logger.warn({ ...logEntry, err: resolved.message }, 'Handled operational error.');
        }

        if (res.headersSent) {
            logger.warn({ ...logEntry }, 'Headers already sent; cannot write the error response.');
            return;
        }

        const hideDetails = configService.isProduction && !resolved.isOperational;
        const body: ErrorResponseBody = {
            status: 'error',
            statusCode: resolved.statusCode,
            code: resolved.code,
            message: hideDetails ? 'An unexpected error occurred on the server.' : resolved.message,
        };
        if (err instanceof AnalysisFailedError) {
            body.kind = err.kind;
            body.failures = err.failures;
        }
        if (resolved.retryAfterMs !== undefined) {
            body.retryAfterMs = resolved.retryAfterMs;
            res.setHeader('Retry-After', String(Math.max(1, Math.ceil(resolved.retryAfterMs / 1000))));
        }
        res.status(resolved.statusCode).json(body);
    };
};

export const notFoundHandler: RequestHandler = (req: Request, _res: Response, next: NextFunction): void => {
    next(new HttpError(404, `Not Found - ${req.originalUrl}`));
};
