import { describe, expect, it } from 'vitest';
import {
    CancelledError,
    DownloadFailedError,
    PrecisError,
    errorMessage,
    throwIfCancelled,
    toPrecisError,
} from '../src/errors';

describe('Errors', () => {
    it('carries a stable code and the cause', () => {
        const cause = new Error('ECONNRESET');
        const error = new DownloadFailedError('Failed to download', { cause });

        expect(error).toBeInstanceOf(PrecisError);
        expect(error.code).toBe('DOWNLOAD_FAILED');
        expect(error.name).toBe('DownloadFailedError');
        expect(error.cause).toBe(cause);
    });

    it('passes taxonomy errors through unchanged', () => {
        const error = new CancelledError();
        expect(toPrecisError(error)).toBe(error);
    });

    it('maps abort errors to cancellation', () => {
        const abort = new DOMException('The operation was aborted', 'AbortError');
        const mapped = toPrecisError(abort);

        expect(mapped).toBeInstanceOf(CancelledError);
        expect(mapped.message).toBe('The operation was aborted');
    });

    it('wraps anything else as unknown', () => {
        const mapped = toPrecisError('plain string');

        expect(mapped.code).toBe('UNKNOWN');
        expect(mapped.message).toBe('plain string');
        expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('throws only once the signal has fired', () => {
        const controller = new AbortController();
        expect(() => throwIfCancelled(controller.signal)).not.toThrow();
        expect(() => throwIfCancelled(undefined)).not.toThrow();

        controller.abort();
        expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
    });
});
