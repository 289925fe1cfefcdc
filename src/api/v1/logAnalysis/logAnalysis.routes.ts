// src/api/v1/logAnalysis/logAnalysis.routes.ts
import { Router } from 'express';
import multer from 'multer';
import path from 'path';
import { HttpError } from '../../../errors/http.errors';
import { createUploadRateLimitMiddleware } from '../../../middleware/uploadRateLimit.middleware';
import { LogAnalysisController } from './logAnalysis.controller';

const ALLOWED_EXTENSIONS = new Set(['.txt', '.log']);

export interface LogAnalysisRouterOptions {
    uploadMaxBytes: number;
    uploadRateLimitPerMinute: number;
}

const createLogAnalysisRouter = (controller: LogAnalysisController, options: LogAnalysisRouterOptions): Router => {
    const router = Router();

    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: options.uploadMaxBytes, files: 1 },
        fileFilter: (_req, file, callback) => {
            const extension = path.extname(file.originalname).toLowerCase();
            if (!ALLOWED_EXTENSIONS.has(extension)) {
                callback(new HttpError(400, `Unsupported file type "${extension || file.originalname}"; upload a .txt or .log file`));
                return;
            }
            callback(null, true);
        },
    }).single('file');

    router.post(
        '/analyze',
        createUploadRateLimitMiddleware(options.uploadRateLimitPerMinute),
        upload,
        controller.analyzeLogs,
    );

    return router;
};

export default createLogAnalysisRouter;
