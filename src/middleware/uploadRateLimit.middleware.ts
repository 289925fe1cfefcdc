// src/middleware/uploadRateLimit.middleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { HttpError } from '../errors/http.errors';

/**
 * Per-client-IP ceiling on analysis submissions, independent of the backend call limiter.
 */
export const createUploadRateLimitMiddleware = (pointsPerMinute: number): RequestHandler => {
    const limiter = new RateLimiterMemory({ points: pointsPerMinute, duration: 60, keyPrefix: 'upload_ip' });

    return (req: Request, res: Response, next: NextFunction): void => {
        const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
        void limiter.consume(key, 1).then(
            () => next(),
            (rejection: unknown) => {
                if (rejection instanceof RateLimiterRes) {
                    const retryAfterSeconds = Math.max(1, Math.ceil(rejection.msBeforeNext / 1000));
                    res.setHeader('Retry-After', String(retryAfterSeconds));
                    next(new HttpError(429, `Too many uploads from this client; retry in ${retryAfterSeconds}s`));
                    return;
                }
                next(rejection);
            },
        );
    };
};
