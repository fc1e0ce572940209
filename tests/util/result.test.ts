import { describe, expect, it } from 'vitest';
import { attempt, fail, ok, unwrap } from '../../src/util/result';
import { CancelledError, NotFoundError, PrecisError, TranscriptionFailedError } from '../../src/errors';

describe('StageResult', () => {
    it('captures a value', async () => {
        const result = await attempt(async () => 'done');
        expect(result).toEqual({ ok: true, value: 'done' });
        expect(unwrap(result)).toBe('done');
    });

    it('passes taxonomy errors through untouched', async () => {
        const error = new NotFoundError('missing');
        const result = await attempt(async () => {
            throw error;
        }, () => new TranscriptionFailedError('wrapped'));
        expect(result).toEqual({ ok: false, error });
    });

    it('wraps foreign errors with the supplied wrapper', async () => {
        const result = await attempt(async () => {
            throw new Error('socket hang up');
        }, (error) => new TranscriptionFailedError(`Transcription failed: ${error instanceof Error ? error.message : ''}`));
        expect(result.ok).toBe(false);
        expect(() => unwrap(result)).toThrow('Transcription failed: socket hang up');
    });

    it('normalizes foreign errors without a wrapper', async () => {
        const abort = new Error('aborted');
        abort.name = 'AbortError';
        const aborted = await attempt(async () => {
            throw abort;
        });
        const unknown = await attempt(async () => {
            throw 'plain string';
        });

        expect(aborted.ok ? null : aborted.error).toBeInstanceOf(CancelledError);
        expect(unknown.ok ? null : unknown.error.code).toBe('UNKNOWN');
    });

    it('builds results directly', () => {
        expect(ok(1)).toEqual({ ok: true, value: 1 });
        const error = new PrecisError('UNKNOWN', 'x');
        expect(fail(error)).toEqual({ ok: false, error });
    });
});
