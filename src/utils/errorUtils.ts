// src/utils/errorUtils.ts

/**
 * Normalises any thrown value into a message/stack pair suitable for structured logs.
 */
export const getErrorMessageAndStack = (error: unknown): { message: string; stack?: string } => {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return { message: error.message };
    }
    try {
        return { message: JSON.stringify(error) };
    } catch {
        return { message: String(error) };
    }
};
