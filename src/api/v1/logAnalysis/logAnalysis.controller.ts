// src/api/v1/logAnalysis/logAnalysis.controller.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Logger } from 'pino';
import { LogAnalyzerService } from '../../../services/logAnalyzer.service';
import { LoggingService } from '../../../services/logging.service';
import { PromptTemplateService } from '../../../services/promptTemplate.service';
import { AnalysisCancelledError } from '../../../errors/analysis.errors';
import { HttpError } from '../../../errors/http.errors';
import { getRequestId } from '../../../middleware/requestLogger.middleware';
import { PromptVariant } from '../../../types/logAnalysis.types';
import { getErrorMessageAndStack } from '../../../utils/errorUtils';

export interface LogAnalysisController {
    analyzeLogs: RequestHandler;
}

/** Uploaded file first, then a `text/plain` body. */
const readLogText = (req: Request): string | undefined => {
    if (req.file) {
        return req.file.buffer.toString('utf8');
    }
    return typeof req.body === 'string' ? req.body : undefined;
};

const readPromptVariant = (req: Request): PromptVariant | undefined => {
    const { variant } = req.query;
    if (variant === undefined) {
        return undefined;
    }
    if (!PromptTemplateService.isPromptVariant(variant)) {
        throw new HttpError(400, 'Query parameter "variant" must be one of standard, quick, detailed');
    }
    return variant;
};

export const createLogAnalysisController = (
    logAnalyzer: LogAnalyzerService,
    loggingService: LoggingService,
    analysisTimeoutMs: number,
): LogAnalysisController => {
    const baseLogger = loggingService.getLogger('app', { controller: 'LogAnalysisController' });

    const analyzeLogs = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const requestId = getRequestId(res);
        const logger: Logger = baseLogger.child({ route: 'analyzeLogs', requestId });

        const abortController = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            abortController.abort();
        }, analysisTimeoutMs);
        const onClose = (): void => {
            if (!res.writableFinished) {
                logger.info({ event: 'client_disconnected' }, 'Client went away; cancelling analysis.');
                abortController.abort();
            }
        };
        res.on('close', onClose);

        try {
            const text = readLogText(req);
            if (text === undefined) {
                throw new HttpError(400, 'Send the log as a multipart "file" field (.txt or .log) or as a text/plain body');
            }
            const promptVariant = readPromptVariant(req);

            const report = await logAnalyzer.analyze(text, { requestId, promptVariant, signal: abortController.signal });
            res.status(200).json(report);
        } catch (error: unknown) {
            if (timedOut && error instanceof AnalysisCancelledError) {
                next(new HttpError(504, `Analysis did not finish within ${analysisTimeoutMs}ms`));
                return;
            }
            const { message } = getErrorMessageAndStack(error);
            logger.debug({ event: 'analyze_request_failed', err: message }, 'Analysis request failed.');
            next(error);
        } finally {
            clearTimeout(timer);
            res.off('close', onClose);
        }
    };

    return { analyzeLogs };
};
