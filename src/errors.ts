/**
 * Error taxonomy shared by every stage of the pipeline.
 *
 * Each error carries a stable `code` so that callers (and the NDJSON progress
 * stream) can branch on the kind of failure without parsing messages. The
 * underlying failure, when there is one, is kept on `cause`.
 */

export type ErrorCode =
    | 'INVALID_ARGUMENT'
    | 'NOT_FOUND'
    | 'SEGMENTATION_FAILED'
    | 'PROBE_FAILED'
    | 'CLIP_FAILED'
    | 'DOWNLOAD_FAILED'
    | 'TRANSCRIPTION_FAILED'
    | 'SUMMARIZATION_FAILED'
    | 'SYNTHESIS_FAILED'
    | 'STORAGE_FAILED'
    | 'CONFIGURATION'
    | 'CANCELLED'
    | 'UNKNOWN';

export class PrecisError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PrecisError';
        this.code = code;
    }
}

export class InvalidArgumentError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('INVALID_ARGUMENT', message, options);
        this.name = 'InvalidArgumentError';
    }
}

export class NotFoundError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('NOT_FOUND', message, options);
        this.name = 'NotFoundError';
    }
}

export class SegmentationFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SEGMENTATION_FAILED', message, options);
        this.name = 'SegmentationFailedError';
    }
}

export class ProbeFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('PROBE_FAILED', message, options);
        this.name = 'ProbeFailedError';
    }
}

export class ClipFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CLIP_FAILED', message, options);
        this.name = 'ClipFailedError';
    }
}

export class DownloadFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DOWNLOAD_FAILED', message, options);
        this.name = 'DownloadFailedError';
    }
}

export class TranscriptionFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TRANSCRIPTION_FAILED', message, options);
        this.name = 'TranscriptionFailedError';
    }
}

export class SummarizationFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SUMMARIZATION_FAILED', message, options);
        this.name = 'SummarizationFailedError';
    }
}

export class SynthesisFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SYNTHESIS_FAILED', message, options);
        this.name = 'SynthesisFailedError';
    }
}

export class StorageFailedError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORAGE_FAILED', message, options);
        this.name = 'StorageFailedError';
    }
}

export class ConfigurationError extends PrecisError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONFIGURATION', message, options);
        this.name = 'ConfigurationError';
    }
}

export class CancelledError extends PrecisError {
    constructor(message = 'Operation was cancelled', options?: { cause?: unknown }) {
        super('CANCELLED', message, options);
        this.name = 'CancelledError';
    }
}

export const errorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};

/**
 * Normalize anything thrown into a PrecisError. Errors that already belong to
 * the taxonomy pass through untouched; abort errors become CancelledError.
 */
export const toPrecisError = (error: unknown): PrecisError => {
    if (error instanceof PrecisError) return error;
    if (error instanceof Error && error.name === 'AbortError') {
        return new CancelledError(error.message, { cause: error });
    }
    return new PrecisError('UNKNOWN', errorMessage(error), { cause: error });
};

/**
 * Throw CancelledError when the signal has fired.
 */
export const throwIfCancelled = (signal?: AbortSignal): void => {
    if (signal?.aborted) {
        throw new CancelledError('Operation was cancelled', { cause: signal.reason });
    }
};
