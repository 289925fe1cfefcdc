// src/utils/abortUtils.ts
import { AnalysisCancelledError } from '../errors/analysis.errors';

export const throwIfAborted = (signal?: AbortSignal): void => {
    if (signal?.aborted) {
        throw new AnalysisCancelledError();
    }
};

/**
 * `setTimeout` as a promise that rejects with `AnalysisCancelledError` as soon as `signal` aborts.
 */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AnalysisCancelledError());
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AnalysisCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

/**
 * Waits for `promise`, giving up with `AnalysisCancelledError` when `signal` aborts first.
 * The underlying work is not stopped.
 */
export const raceWithSignal = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
    if (!signal) {
        return promise;
    }
    return new Promise<T>((resolve, reject) => {
        if (signal.aborted) {
            reject(new AnalysisCancelledError());
            return;
        }
        const onAbort = (): void => reject(new AnalysisCancelledError());
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
};
