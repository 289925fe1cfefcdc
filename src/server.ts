// src/server.ts
import 'reflect-metadata'; // Must load before any decorated class.
import { container } from './container';
import http from 'http';
import { Logger } from 'pino';
import { initLoaders } from './loaders';
import { LoggingService } from './services/logging.service';
import { ConfigService } from './config/config.service';
import { CostAccountantService } from './services/costAccountant.service';
import { getErrorMessageAndStack } from './utils/errorUtils';

const SHUTDOWN_TIMEOUT_MS = 15000;

let logger: Logger | undefined;
let loggingService: LoggingService | undefined;
let httpServer: http.Server | undefined;
let costAccountant: CostAccountantService | undefined;
let isShuttingDown = false;

const writeFallback = (message: string): void => {
    process.stderr.write(`${message}\n`);
};

async function startServer(): Promise<void> {
    try {
        // Config and logging come first; everything else logs through them.
        const configService = container.resolve(ConfigService);
        loggingService = container.resolve(LoggingService);
        loggingService.initialize();
        logger = loggingService.getLogger('app', { service: 'Server' });

        // Replays the cost ledger and builds the Express app around the resolved services.
        const loaderResult = await initLoaders();
        httpServer = loaderResult.httpServer;
        // Kept for shutdown, which flushes its pending ledger appends.
        costAccountant = container.resolve(CostAccountantService);

        // Start listening only once every loader has succeeded.
        const port = configService.port;
        httpServer.listen(port, () => {
            logger?.info(
                { event: 'server_listening', port, nodeEnv: configService.nodeEnv, model: configService.llm.model },
                `Log analysis server listening on http://localhost:${port}`,
            );
        });
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        if (logger) {
            logger.fatal({ event: 'server_start_failed', err: { message, stack } }, 'Fatal error during start-up.');
        } else {
            writeFallback(`[Server Start] Fatal error during start-up: ${message}`);
        }
        // Start-up failures go through the same shutdown path so log streams are flushed.
        await gracefulShutdown('Initialization Error', error);
    }
}

/**
 * Stops accepting requests, flushes the cost ledger and log streams, then exits.
 */
async function gracefulShutdown(signal: string, error?: unknown): Promise<void> {
    if (isShuttingDown) {
        logger?.warn({ event: 'shutdown_already_running', signal }, 'Shutdown already in progress; ignoring trigger.');
        return;
    }
    isShuttingDown = true;

    let exitCode = error ? 1 : 0;
    logger?.info({ event: 'shutdown_start', signal }, 'Starting graceful shutdown.');

    // Hard deadline: exit even if the server or the ledger never settles.
    const shutdownTimeout = setTimeout(() => {
        logger?.error({ event: 'shutdown_timeout', timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Graceful shutdown timed out; forcing exit.');
        loggingService?.flushLogsAndClose();
        process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
        // Stop accepting connections; in-flight requests run to completion.
        const server = httpServer;
        if (server?.listening) {
            await new Promise<void>(resolve => {
                server.close(closeError => {
                    if (closeError) {
                        logger?.error({ event: 'http_close_failed', err: closeError.message }, 'Error while closing the HTTP server.');
                        exitCode = 1;
                    }
                    resolve();
                });
            });
        }

        // Pending ledger appends must land before exit.
        await costAccountant?.flush();
    } catch (cleanupError: unknown) {
        const { message } = getErrorMessageAndStack(cleanupError);
        logger?.error({ event: 'shutdown_cleanup_failed', err: message }, 'Unexpected error during shutdown cleanup.');
        exitCode = 1;
    } finally {
        logger?.info({ event: 'shutdown_complete', exitCode }, 'Shutdown complete.');
        loggingService?.flushLogsAndClose();
        clearTimeout(shutdownTimeout);
        process.exit(exitCode);
    }
}

// --- Process Signal Handlers ---
const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach(signal => {
    process.on(signal, () => {
        void gracefulShutdown(signal);
    });
});

// A second fatal error during shutdown exits immediately instead of re-entering it.
process.on('uncaughtException', (err: Error, origin: string) => {
    if (logger) {
        logger.fatal({ event: 'uncaught_exception', err: { message: err.message, stack: err.stack }, origin }, 'Uncaught exception; shutting down.');
    } else {
        writeFallback(`[Process] Uncaught exception: ${err.message}`);
    }
    if (isShuttingDown) {
        process.exit(1);
    }
    void gracefulShutdown('uncaughtException', err);
});

process.on('unhandledRejection', (reason: unknown) => {
    const { message, stack } = getErrorMessageAndStack(reason);
    if (logger) {
        logger.fatal({ event: 'unhandled_rejection', err: { message, stack } }, 'Unhandled promise rejection; shutting down.');
    } else {
        writeFallback(`[Process] Unhandled rejection: ${message}`);
    }
    if (isShuttingDown) {
        process.exit(1);
    }
    void gracefulShutdown('unhandledRejection', reason);
});

void startServer();
