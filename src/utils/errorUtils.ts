// src/utils/errorUtils.ts

/**
 * Normalizes anything caught in a `catch` block into a message and an optional stack.
 */
export const getErrorMessageAndStack = (error: unknown): { message: string; stack?: string } => {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return { message: error.message };
    }
    try {
        return { message: JSON.stringify(error) };
    } catch {
        return { message: String(error) };
    }
};
