// src/errors/http.errors.ts

/**
 * Transport-level failure (bad upload, timeout, unknown route) raised by the HTTP layer.
 */
export class HttpError extends Error {
    constructor(
        public readonly status: number,
        message: string,
        public readonly isOperational: boolean = true,
    ) {
        super(message);
        this.name = 'HttpError';
    }
}
