/**
 * Bounded Transcription Executor
 *
 * Transcribes a whole file in one call when it is small enough, otherwise
 * splits it and fans the segments out to the backend with at most
 * `maxConcurrency` calls in flight. Segment texts are written into a
 * pre-sized array by index, so the joined transcript follows the audio no
 * matter which call finishes first.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Semaphore from '../util/semaphore';
import * as Segmenter from './segmenter';
import { withScope } from '../util/scope';
import { StageResult, attempt, unwrap } from '../util/result';
import {
    PrecisError,
    TranscriptionFailedError,
    errorMessage,
    throwIfCancelled,
} from '../errors';
import {
    AudioSegment,
    ExecutorConfig,
    ExecutorDependencies,
    TranscribeOptions,
    TranscriptionResult,
} from './types';

export interface ExecutorInstance {
    transcribe(filePath: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
    tryTranscribe(filePath: string, options?: TranscribeOptions): Promise<StageResult<TranscriptionResult>>;
}

export const SCRATCH_PREFIX = 'chunks_';

const wrapFailure = (error: unknown): PrecisError => {
    return new TranscriptionFailedError(`Transcription failed: ${errorMessage(error)}`, { cause: error });
};

// Aborts `child` when `parent` fires, without touching `parent`
const linkSignal = (parent: AbortSignal | undefined, child: AbortController): (() => void) => {
    if (!parent) return () => undefined;
    if (parent.aborted) {
        child.abort(parent.reason);
        return () => undefined;
    }
    const onAbort = () => child.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    return () => parent.removeEventListener('abort', onAbort);
};

export const create = (dependencies: ExecutorDependencies, config: ExecutorConfig): ExecutorInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const segmenter = Segmenter.create(dependencies.media, config);

    const transcribeSegments = async (segments: AudioSegment[], signal?: AbortSignal): Promise<string[]> => {
        const semaphore = Semaphore.create(config.maxConcurrency);
        const transcripts = new Array<string>(segments.length);

        // `controller` gates scheduling only: the first failure (or the caller's
        // signal) stops segments that have not started, while calls already
        // dispatched see just the caller's signal
        const controller = new AbortController();
        const unlink = linkSignal(signal, controller);
        let firstFailure: unknown = undefined;

        const tasks = segments.map(segment => semaphore.run(async () => {
            logger.info('Transcribing chunk %d/%d...', segment.index + 1, segments.length);
            transcripts[segment.index] = await dependencies.transcription.transcribe(segment.path, { signal });
        }, controller.signal).catch((error: unknown) => {
            if (firstFailure === undefined) {
                firstFailure = error;
                controller.abort(error);
            }
            throw error;
        }));

        try {
            await Promise.allSettled(tasks);
        } finally {
            unlink();
        }

        if (firstFailure !== undefined) {
            throw firstFailure;
        }
        return transcripts;
    };

    const transcribeInChunks = async (filePath: string, signal?: AbortSignal): Promise<{ text: string; segmentCount: number }> => {
        return withScope(logger, async (scope) => {
            const scratchDir = await storage.createTempDirectory(config.tempDirectory, SCRATCH_PREFIX);
            scope.defer('remove chunk directory', async () => {
                await storage.deleteDirectory(scratchDir);
                logger.debug('Cleaned up temporary chunk directory %s', scratchDir);
            });

            const segments = await segmenter.segment(filePath, scratchDir, signal);
            logger.info('Created %d audio chunks', segments.length);

            const transcripts = await transcribeSegments(segments, signal);
            const text = transcripts.join(' ');
            logger.info('All chunks transcribed. Combined transcript length: %d characters', text.length);
            return { text, segmentCount: segments.length };
        });
    };

    const tryTranscribe = async (filePath: string, options: TranscribeOptions = {}): Promise<StageResult<TranscriptionResult>> => {
        const { signal } = options;
        return attempt<TranscriptionResult>(async () => {
            throwIfCancelled(signal);
            const startTime = Date.now();

            const fileSize = await dependencies.media.getFileSize(filePath);
            logger.info('Audio file size: %d bytes (%s MB)', fileSize, (fileSize / (1024 * 1024)).toFixed(2));

            if (fileSize > config.maxAudioSize) {
                logger.info('File size (%d bytes) exceeds limit (%d bytes), processing %s in chunks',
                    fileSize, config.maxAudioSize, path.basename(filePath));
                const { text, segmentCount } = await transcribeInChunks(filePath, signal);
                return { text, segmentCount, duration: Date.now() - startTime };
            }

            const text = await dependencies.transcription.transcribe(filePath, { signal });
            logger.info('Transcription completed. Length: %d characters', text.length);
            return { text, segmentCount: 1, duration: Date.now() - startTime };
        }, wrapFailure);
    };

    const transcribe = async (filePath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> => {
        const result = await tryTranscribe(filePath, options);
        if (!result.ok) {
            logger.error('Error transcribing audio file %s: %s', filePath, result.error.message);
        }
        return unwrap(result);
    };

    return {
        transcribe,
        tryTranscribe,
    };
};
