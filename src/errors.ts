// src/errors.ts

export type LibraryErrorCode =
    | 'INVALID_ARGUMENT'
    | 'INVALID_COPIES'
    | 'NOT_AUTHORIZED';

/**
 * Raised for programming-level misuse of the store or session
 *
 * Expected business failures (limit reached, unknown id, ...) are returned
 * as outcome objects instead.
 */
export class LibraryError extends Error {
    constructor(
        message: string,
        public readonly code: LibraryErrorCode,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'LibraryError';
    }
}

export function isLibraryError(error: unknown): error is LibraryError {
    return error instanceof LibraryError;
}

/**
 * Extract error message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (error && typeof error === 'object' && 'message' in error) {
        return String(error.message);
    }
    return 'Unknown error';
}
