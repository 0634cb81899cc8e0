// src/domain/errors.ts

export type OEEErrorCode = 'INVALID_INPUT' | 'INVALID_FILTER' | 'STORAGE_ERROR';

export class OEEError extends Error {
    constructor(
        message: string,
        public readonly code: OEEErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'OEEError';
    }
}

/**
 * Precondition violation on a calculation request (malformed or out-of-domain parameters)
 */
export class InvalidInputError extends OEEError {
    constructor(message: string, public readonly field?: string) {
        super(message, 'INVALID_INPUT');
        this.name = 'InvalidInputError';
    }
}

export class InvalidFilterError extends OEEError {
    constructor(message: string) {
        super(message, 'INVALID_FILTER');
        this.name = 'InvalidFilterError';
    }
}

/**
 * Wraps whatever the storage driver raised; the original error stays in `cause`
 */
export class StorageError extends OEEError {
    constructor(message: string, cause?: unknown) {
        super(message, 'STORAGE_ERROR', { cause });
        this.name = 'StorageError';
    }
}

export function isOEEError(error: unknown): error is OEEError {
    return error instanceof OEEError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
