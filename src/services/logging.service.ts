// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, stdTimeFunctions, StreamEntry } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; requestId?: string; [key: string]: unknown };
export type LoggerType = 'app' | 'analysis';

interface SharedLoggerEntry {
    logger: Logger;
    fileStream?: ReturnType<typeof pino.destination>;
}

/**
 * Owns the process-wide pino loggers.
 * `app` carries service lifecycle and HTTP events; `analysis` carries the events of individual pipeline runs.
 */
@singleton()
export class LoggingService {
    private readonly loggers = new Map<LoggerType, SharedLoggerEntry>();
    private readonly baseOptions: LoggerOptions;
    private isShuttingDown = false;

    constructor(@inject(ConfigService) private readonly configService: ConfigService) {
        this.baseOptions = {
            level: this.configService.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined,
        };
    }

    /**
     * Creates the file-backed loggers. Without this call loggers write to the console only,
     * which is what tests rely on.
     */
    public initialize(): void {
        if (this.configService.logToFile) {
            this.ensureDirectory(this.configService.logsDirectory);
        }
        const toFile = this.configService.logToFile;
        this.loggers.set('app', this.createSharedLogger('app', toFile ? this.configService.appLogFilePath : undefined));
        this.loggers.set('analysis', this.createSharedLogger('analysis', toFile ? this.configService.analysisLogFilePath : undefined));
        this.getLogger('app', { service: 'LoggingService' }).info({ event: 'loggers_initialized' }, 'Shared loggers initialized.');
    }

    private ensureDirectory(dirPath: string): void {
        try {
            fs.mkdirSync(dirPath, { recursive: true });
            fs.accessSync(dirPath, fs.constants.W_OK);
        } catch (err: unknown) {
            const { message } = getErrorMessageAndStack(err);
            throw new Error(`Logs directory "${dirPath}" is not writable: ${message}`);
        }
    }

    private createSharedLogger(loggerType: LoggerType, logFilePath?: string): SharedLoggerEntry {
        const level = this.configService.logLevel;
        if (level === 'silent') {
            return { logger: pino({ ...this.baseOptions, level: 'silent' }) };
        }

        const streams: StreamEntry[] = [];
        if (this.configService.logToConsole) {
            if (this.configService.isProduction) {
                streams.push({ level, stream: process.stdout });
            } else {
                streams.push({
                    level,
                    stream: pretty({
                        colorize: true,
                        levelFirst: true,
                        translateTime: 'SYS:standard',
                        ignore: 'pid,hostname',
                    }),
                });
            }
        }

        let fileStream: SharedLoggerEntry['fileStream'];
        if (logFilePath) {
            fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
            streams.push({ level, stream: fileStream });
        }

        if (streams.length === 0) {
            return { logger: pino({ ...this.baseOptions, name: `${loggerType}Fallback` }) };
        }
        return { logger: pino(this.baseOptions, pino.multistream(streams)), fileStream };
    }

    private resolveShared(type: LoggerType): Logger {
        let entry = this.loggers.get(type);
        if (!entry) {
            // Not initialized (tests, CLI use): console-only logger at the configured level.
            entry = this.createSharedLogger(type);
            this.loggers.set(type, entry);
        }
        return entry.logger;
    }

    public getLogger(type: LoggerType = 'app', context?: LoggerContext): Logger {
        const logger = this.resolveShared(type);
        return context ? logger.child(context) : logger;
    }

    /** Logger for one pipeline run; every entry carries the request id. */
    public getRequestLogger(requestId: string, context?: LoggerContext): Logger {
        return this.getLogger('analysis', { requestId, ...context });
    }

    public flushLogsAndClose(): void {
        if (this.isShuttingDown) {
            return;
        }
        this.isShuttingDown = true;
        for (const [type, entry] of this.loggers) {
            try {
                entry.logger.flush();
                entry.fileStream?.end();
            } catch (err: unknown) {
                const { message } = getErrorMessageAndStack(err);
                process.stderr.write(`[LoggingService] Failed to close ${type} log stream: ${message}\n`);
            }
        }
        this.loggers.clear();
    }
}
