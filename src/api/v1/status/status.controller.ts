// src/api/v1/status/status.controller.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { StatusService } from '../../../services/status.service';

export const createGetStatusHandler = (statusService: StatusService): RequestHandler =>
    async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            res.status(200).json(await statusService.snapshot());
        } catch (error: unknown) {
            next(error);
        }
    };
