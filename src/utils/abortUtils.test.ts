// src/utils/abortUtils.test.ts
import { delay, raceWithSignal, throwIfAborted } from './abortUtils';
import { AnalysisCancelledError } from '../errors/analysis.errors';

describe('abortUtils', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    it('throwIfAborted only throws for an aborted signal', () => {
        const controller = new AbortController();
        expect(() => throwIfAborted(controller.signal)).not.toThrow();
        expect(() => throwIfAborted(undefined)).not.toThrow();

        controller.abort();
        expect(() => throwIfAborted(controller.signal)).toThrow(AnalysisCancelledError);
    });

    it('delay resolves after the given time', async () => {
        jest.useFakeTimers();
        let done = false;
        const waiting = delay(1000).then(() => {
            done = true;
        });

        jest.advanceTimersByTime(999);
        await Promise.resolve();
        expect(done).toBe(false);

        jest.advanceTimersByTime(1);
        await waiting;
        expect(done).toBe(true);
    });

    it('delay rejects as soon as the signal aborts', async () => {
        jest.useFakeTimers();
        const controller = new AbortController();
        const waiting = delay(60_000, controller.signal);

        controller.abort();

        await expect(waiting).rejects.toBeInstanceOf(AnalysisCancelledError);
    });

    it('raceWithSignal settles with the promise when the signal stays quiet', async () => {
        const controller = new AbortController();

        await expect(raceWithSignal(Promise.resolve('value'), controller.signal)).resolves.toBe('value');
        await expect(raceWithSignal(Promise.reject(new Error('inner')), controller.signal)).rejects.toThrow('inner');
    });

    it('raceWithSignal gives up when the signal aborts first', async () => {
        const controller = new AbortController();
        const never = new Promise<string>(() => undefined);
        const racing = raceWithSignal(never, controller.signal);

        controller.abort();

        await expect(racing).rejects.toBeInstanceOf(AnalysisCancelledError);
    });
});
