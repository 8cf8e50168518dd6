/**
 * Error taxonomy
 *
 * Every failure the engine reports derives from CapsuleError and carries a
 * stable code, so listeners can tell failures apart without parsing messages.
 */

export type ErrorCode =
    | 'audio-capture'
    | 'transcription'
    | 'generation'
    | 'storage'
    | 'embedding'
    | 'index'
    | 'search'
    | 'no-results'
    | 'busy'
    | 'invalid-state'
    | 'not-found'
    | 'invalid-request'
    | 'config';

export class CapsuleError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CapsuleError';
        this.code = code;
    }
}

export class AudioCaptureError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('audio-capture', message, options);
        this.name = 'AudioCaptureError';
    }
}

export class TranscriptionError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transcription', message, options);
        this.name = 'TranscriptionError';
    }
}

export interface GenerationAttempt {
    backend: string;
    attempt: number;
    error: string;
}

export class GenerationError extends CapsuleError {
    readonly exhausted: boolean;
    readonly attempts: GenerationAttempt[];

    constructor(message: string, options: { exhausted: boolean; attempts?: GenerationAttempt[]; cause?: unknown }) {
        super('generation', message, { cause: options.cause });
        this.name = 'GenerationError';
        this.exhausted = options.exhausted;
        this.attempts = options.attempts ?? [];
    }
}

export class StorageError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('storage', message, options);
        this.name = 'StorageError';
    }
}

export class EmbeddingError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('embedding', message, options);
        this.name = 'EmbeddingError';
    }
}

export class IndexError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('index', message, options);
        this.name = 'IndexError';
    }
}

export class SearchError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('search', message, options);
        this.name = 'SearchError';
    }
}

export class NoResultsError extends CapsuleError {
    constructor(message = 'No insights have been indexed yet') {
        super('no-results', message);
        this.name = 'NoResultsError';
    }
}

export class BusyError extends CapsuleError {
    constructor(message = 'A capture or processing run is already active') {
        super('busy', message);
        this.name = 'BusyError';
    }
}

export class InvalidStateError extends CapsuleError {
    constructor(message: string) {
        super('invalid-state', message);
        this.name = 'InvalidStateError';
    }
}

export class NotFoundError extends CapsuleError {
    constructor(message: string) {
        super('not-found', message);
        this.name = 'NotFoundError';
    }
}

export class InvalidRequestError extends CapsuleError {
    constructor(message: string) {
        super('invalid-request', message);
        this.name = 'InvalidRequestError';
    }
}

export class ConfigError extends CapsuleError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('config', message, options);
        this.name = 'ConfigError';
    }
}

export const isCapsuleError = (error: unknown): error is CapsuleError => error instanceof CapsuleError;

/**
 * Stable reason for a failed run. Errors from outside the taxonomy are
 * attributed to the stage that raised them.
 */
export const toFailureReason = (error: unknown, fallback: ErrorCode): ErrorCode =>
    isCapsuleError(error) ? error.code : fallback;

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

export const isNotFoundOnDisk = (error: unknown): boolean =>
    !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT';
