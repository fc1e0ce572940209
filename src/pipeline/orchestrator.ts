/**
 * Pipeline Orchestrator
 *
 * Drives one source episode through download, transcription, summarization
 * and speech synthesis, persisting every artifact under the episode's cache
 * key and reporting each stage to the caller's progress sink.
 *
 * Stages run strictly in sequence. A run that finds a stored summary returns
 * it without calling any backend. Concurrent runs for the same key share a
 * single in-flight run, which is cancelled only once every caller attached to
 * it has cancelled. Progress is handed to each listener through its own
 * queue, so a slow listener never holds up a stage.
 */

import crypto from 'node:crypto';
import * as path from 'node:path';
import * as Logging from '../logging';
import * as Providers from '../providers';
import * as Storage from '../util/storage';
import * as Summarizer from '../summary/summarizer';
import * as Transcription from '../transcription';
import { CancelledError, NotFoundError, PrecisError, throwIfCancelled, toPrecisError } from '../errors';
import { ProgressSink, createQueuedSink } from '../progress/sink';
import { ProviderSettings } from '../providers/types';
import {
    blobNameOf,
    blobPath,
    episodeAudioName,
    summaryAudioName,
    summaryTextName,
    transcriptName,
} from '../storage/naming';
import { deriveKey, isUrl } from '../util/cache-key';
import { withScope } from '../util/scope';
import { countWords, formatCount } from '../util/text';
import { ProcessingStatus, createErrorStatus, createStatus } from './status';
import { PipelineConfig, PipelineDependencies, PipelineResult, RunOptions } from './types';

export interface OrchestratorInstance {
    run(sourceIdentifier: string, options?: RunOptions): Promise<PipelineResult>;
    /** Cache keys with a run in flight */
    active(): string[];
}

interface SharedCancellation {
    signal: AbortSignal;
    /** Ties the run to a caller; a caller without a signal keeps it alive */
    attach(signal?: AbortSignal): void;
}

interface Attachment {
    listeners: Map<ProgressSink, Emit>;
    cancellation: SharedCancellation;
}

interface InFlight extends Attachment {
    promise: Promise<PipelineResult>;
    settings: ProviderSettings;
}

type Emit = (status: ProcessingStatus) => void;

// Aborts once every attached caller has aborted
const createSharedCancellation = (): SharedCancellation => {
    const controller = new AbortController();
    let live = 0;

    const attach = (signal?: AbortSignal) => {
        live++;
        if (!signal) return;
        const release = () => {
            live--;
            if (live === 0) controller.abort(signal.reason);
        };
        if (signal.aborted) release();
        else signal.addEventListener('abort', release, { once: true });
    };

    return { signal: controller.signal, attach };
};

// Settles with `promise`, or rejects when `signal` fires while `shared` carries
// on for other callers. Once `shared` has fired too, `promise` reports the outcome.
const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal | undefined, shared: AbortSignal): Promise<T> => {
    if (!signal) return promise;
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
            if (shared.aborted) return;
            reject(new CancelledError('Operation was cancelled', { cause: signal.reason }));
        };
        if (signal.aborted) onAbort();
        else signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
};

export const create = (config: PipelineConfig, dependencies: PipelineDependencies): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const { artifacts, metadata, downloader, media } = dependencies;
    const resolveCapabilities = dependencies.resolveCapabilities ?? Providers.resolveCapabilities;
    const { containers } = config;
    const inFlight = new Map<string, InFlight>();

    // Unique per run, so separate processes working on one key never share a file
    const tempPath = (cacheKey: string, suffix: string): string =>
        path.join(config.tempDirectory, `audio_${cacheKey}_${crypto.randomUUID().slice(0, 8)}${suffix}`);

    // Each listener gets its own queue; one that throws is disconnected
    const broadcast = (listeners: Map<ProgressSink, Emit>): Emit => (status) => {
        for (const deliver of listeners.values()) {
            deliver(status);
        }
    };

    const fetchEpisode = async (sourceIdentifier: string, cacheKey: string, episodePath: string, cached: boolean, signal?: AbortSignal): Promise<void> => {
        if (cached) {
            logger.info('Episode found in cache: %s', cacheKey);
            await artifacts.downloadToFile(containers.episodes, episodeAudioName(cacheKey), episodePath, { signal });
            return;
        }
        if (!isUrl(sourceIdentifier)) {
            throw new NotFoundError(`Episode not found in cache: ${cacheKey}`);
        }

        logger.info('Episode not in cache, downloading from URL...');
        const fileSize = await downloader.download(sourceIdentifier, episodePath, { signal });
        throwIfCancelled(signal);

        await artifacts.uploadFile(containers.episodes, episodeAudioName(cacheKey), episodePath, { signal });
        await metadata.saveEpisode({
            cacheKey,
            originalUrl: sourceIdentifier,
            blobPath: blobPath(containers.episodes, episodeAudioName(cacheKey)),
            fileSize,
            downloadDate: new Date().toISOString(),
        }, { signal });
        logger.info('Successfully downloaded and cached episode: %s', cacheKey);
    };

    const execute = async (sourceIdentifier: string, cacheKey: string, options: RunOptions, emit: Emit): Promise<PipelineResult> => {
        const { signal } = options;
        const startTime = Date.now();
        const capabilities = resolveCapabilities(config.settings, options.settings);
        const { speechFormat } = Providers.mergeSettings(config.settings, options.settings);
        logger.info('Starting processing pipeline for episode %s (provider: %s)', cacheKey, capabilities.provider);
        if (Providers.hasOverrides(options.settings)) {
            logger.info('Per-request settings in effect for episode %s: %s', cacheKey, Object.keys(options.settings ?? {}).join(', '));
        }

        return withScope(logger, async (scope) => {
            throwIfCancelled(signal);

            const stored = await metadata.getSummary(cacheKey, { signal });
            if (stored) {
                logger.info('Summary found in cache: %s', cacheKey);
                const storedName = blobNameOf(stored.summaryAudioBlobPath);
                const summaryAudioPath = tempPath(cacheKey, `_summary${path.extname(storedName)}`);
                await artifacts.downloadToFile(containers.summaries, storedName, summaryAudioPath, { signal });

                const result: PipelineResult = {
                    cacheKey,
                    summaryAudioPath,
                    wasCached: true,
                    summaryWasCached: true,
                    transcriptWordCount: stored.transcriptWordCount,
                    summaryWordCount: stored.summaryWordCount,
                    processingDuration: Date.now() - startTime,
                };
                emit(createStatus('complete', 'Summary retrieved from cache', {
                    cacheKey,
                    wasCached: true,
                    transcriptWordCount: result.transcriptWordCount,
                    summaryWordCount: result.summaryWordCount,
                    summaryAudioPath,
                    processingDuration: result.processingDuration,
                }));
                return result;
            }

            // Download
            throwIfCancelled(signal);
            const wasCached = await metadata.episodeExists(cacheKey, { signal });
            emit(createStatus('downloading', wasCached ? 'Retrieving episode from cache...' : 'Downloading episode...', {
                cacheKey,
                wasCached,
            }));

            const episodePath = tempPath(cacheKey, '.mp3');
            scope.defer('remove episode audio', () => storage.deleteFile(episodePath));
            await fetchEpisode(sourceIdentifier, cacheKey, episodePath, wasCached, signal);
            emit(createStatus('downloaded', wasCached ? 'Episode retrieved from cache' : 'Episode downloaded', {
                cacheKey,
                wasCached,
            }));

            // Transcribe
            throwIfCancelled(signal);
            logger.info('Step 1/3: Transcribing audio to text...');
            emit(createStatus('transcribing', 'Transcribing audio to text...', { cacheKey, wasCached }));

            const transcription = Transcription.create({
                transcription: capabilities.transcription,
                media,
                maxAudioSize: config.maxAudioSize,
                maxConcurrency: config.maxConcurrency,
                tempDirectory: config.tempDirectory,
            });
            const { text: transcript } = await transcription.transcribe(episodePath, { signal });
            throwIfCancelled(signal);

            await artifacts.uploadText(containers.transcripts, transcriptName(cacheKey), transcript, { signal });
            const transcriptWordCount = countWords(transcript);
            emit(createStatus('transcribed', `Transcription complete (${formatCount(transcriptWordCount)} words)`, {
                cacheKey,
                wasCached,
                transcriptWordCount,
            }));

            // Summarize
            throwIfCancelled(signal);
            logger.info('Step 2/3: Summarizing transcript...');
            emit(createStatus('summarizing', 'Summarizing transcript...', { cacheKey, wasCached, transcriptWordCount }));

            const summarizer = Summarizer.create(capabilities.summarization, {
                targetWords: config.summaryTargetWords,
                maxWords: config.summaryMaxWords,
            });
            const { text: summaryText, wordCount: summaryWordCount } = await summarizer.summarize(transcript, { signal });
            throwIfCancelled(signal);

            await artifacts.uploadText(containers.transcripts, summaryTextName(cacheKey), summaryText, { signal });
            emit(createStatus('summarized', `Summary complete (${formatCount(summaryWordCount)} words)`, {
                cacheKey,
                wasCached,
                transcriptWordCount,
                summaryWordCount,
                summaryText,
            }));

            // Synthesize
            throwIfCancelled(signal);
            logger.info('Step 3/3: Generating speech from summary...');
            emit(createStatus('generating-speech', 'Generating speech from summary...', {
                cacheKey,
                wasCached,
                transcriptWordCount,
                summaryWordCount,
                summaryText,
            }));

            const summaryAudioPath = tempPath(cacheKey, `_summary.${speechFormat}`);
            await capabilities.speech.synthesize(summaryText, summaryAudioPath, { signal });
            throwIfCancelled(signal);

            const summaryBlobName = summaryAudioName(cacheKey, speechFormat);
            await artifacts.uploadFile(containers.summaries, summaryBlobName, summaryAudioPath, { signal });
            await metadata.saveSummary({
                cacheKey,
                transcriptBlobPath: blobPath(containers.transcripts, transcriptName(cacheKey)),
                summaryTextBlobPath: blobPath(containers.transcripts, summaryTextName(cacheKey)),
                summaryAudioBlobPath: blobPath(containers.summaries, summaryBlobName),
                transcriptWordCount,
                summaryWordCount,
                processedDate: new Date().toISOString(),
            }, { signal });

            const processingDuration = Date.now() - startTime;
            logger.info('Processing pipeline completed. Summary audio at: %s', summaryAudioPath);
            emit(createStatus('complete', 'Processing complete!', {
                cacheKey,
                wasCached,
                transcriptWordCount,
                summaryWordCount,
                summaryText,
                summaryAudioPath,
                processingDuration,
            }));

            return {
                cacheKey,
                summaryAudioPath,
                wasCached,
                summaryWasCached: false,
                transcriptWordCount,
                summaryWordCount,
                summaryText,
                processingDuration,
            };
        });
    };

    const fail = (emit: Emit, error: unknown, cacheKey?: string): PrecisError => {
        const failure = toPrecisError(error);
        logger.error('Error in processing pipeline for episode %s: %s', cacheKey ?? '(none)', failure.message);
        emit(createErrorStatus('Processing failed', failure.message, { cacheKey, errorCode: failure.code }));
        return failure;
    };

    const attach = (attachment: Attachment, options: RunOptions): void => {
        const { onProgress, signal } = options;
        if (onProgress && !attachment.listeners.has(onProgress)) {
            attachment.listeners.set(onProgress, createQueuedSink(onProgress).sink);
        }
        attachment.cancellation.attach(signal);
    };

    const follow = async (entry: InFlight, options: RunOptions): Promise<PipelineResult> => {
        const { onProgress, signal } = options;
        // A caller that leaves a run others still share stops receiving its events at once
        const detach = () => {
            if (onProgress && !entry.cancellation.signal.aborted) entry.listeners.delete(onProgress);
        };
        signal?.addEventListener('abort', detach, { once: true });
        try {
            return await untilAborted(entry.promise, signal, entry.cancellation.signal);
        } finally {
            signal?.removeEventListener('abort', detach);
            if (onProgress) entry.listeners.delete(onProgress);
        }
    };

    const start = (sourceIdentifier: string, cacheKey: string, options: RunOptions): InFlight => {
        const attachment: Attachment = {
            listeners: new Map<ProgressSink, Emit>(),
            cancellation: createSharedCancellation(),
        };
        attach(attachment, options);

        const emit = broadcast(attachment.listeners);
        const runOptions: RunOptions = { settings: options.settings, signal: attachment.cancellation.signal };
        let promise: Promise<PipelineResult> | undefined;
        promise = (async () => {
            try {
                return await execute(sourceIdentifier, cacheKey, runOptions, emit);
            } catch (error) {
                throw fail(emit, error, cacheKey);
            } finally {
                if (inFlight.get(cacheKey)?.promise === promise) {
                    inFlight.delete(cacheKey);
                }
            }
        })();

        const entry: InFlight = {
            ...attachment,
            promise,
            settings: Providers.mergeSettings(config.settings, options.settings),
        };
        inFlight.set(cacheKey, entry);
        return entry;
    };

    const run = async (sourceIdentifier: string, options: RunOptions = {}): Promise<PipelineResult> => {
        let cacheKey: string;
        try {
            cacheKey = deriveKey(sourceIdentifier);
        } catch (error) {
            const listeners = new Map<ProgressSink, Emit>();
            if (options.onProgress) listeners.set(options.onProgress, createQueuedSink(options.onProgress).sink);
            throw fail(broadcast(listeners), error);
        }

        const existing = inFlight.get(cacheKey);
        if (existing && !existing.cancellation.signal.aborted) {
            logger.info('Joining in-flight run for episode %s', cacheKey);
            if (!Providers.sameSettings(existing.settings, Providers.mergeSettings(config.settings, options.settings))) {
                logger.warn('Episode %s is already being processed with other settings; those settings apply to this request', cacheKey);
            }
            attach(existing, options);
            return follow(existing, options);
        }

        return follow(start(sourceIdentifier, cacheKey, options), options);
    };

    return {
        run,
        active: () => [...inFlight.keys()],
    };
};
