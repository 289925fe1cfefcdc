// src/api/v1/cache/cache.controller.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AnalysisCacheService } from '../../../services/analysisCache.service';
import { HttpError } from '../../../errors/http.errors';

const parseOlderThanSeconds = (req: Request): number | undefined => {
    const { olderThanSeconds } = req.query;
    if (olderThanSeconds === undefined) {
        return undefined;
    }
    const seconds = typeof olderThanSeconds === 'string' && /^\d+$/.test(olderThanSeconds)
        ? Number(olderThanSeconds)
        : NaN;
    if (!Number.isSafeInteger(seconds)) {
        throw new HttpError(400, 'Query parameter "olderThanSeconds" must be a non-negative integer');
    }
    return seconds;
};

/**
 * DELETE /api/v1/cache: drops cached analyses, all of them or only those older than
 * `?olderThanSeconds=N`, from memory and disk.
 */
export const createClearCacheHandler = (cache: AnalysisCacheService): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const removed = await cache.clear(parseOlderThanSeconds(req));
            res.status(200).json({ removed });
        } catch (error: unknown) {
            next(error);
        }
    };
