/**
 * Read-side access to processed episodes: stored records, the summary text
 * and streams of the stored audio.
 */

import { Readable } from 'node:stream';
import * as Logging from '../logging';
import { NotFoundError } from '../errors';
import { blobNameOf, episodeAudioName, summaryTextName } from '../storage/naming';
import { ArtifactStore, Containers, MetadataStore, StoreOptions } from '../storage/types';
import { deriveKey } from '../util/cache-key';
import { trimNonAlphanumeric } from '../util/text';
import { EpisodeResult } from './types';

export interface QueryDependencies {
    artifacts: ArtifactStore;
    metadata: MetadataStore;
    containers: Containers;
}

export interface QueryInstance {
    getResult(sourceIdentifier: string, options?: StoreOptions): Promise<EpisodeResult>;
    getEpisodeStream(sourceIdentifier: string, options?: StoreOptions): Promise<Readable>;
    getSummaryStream(sourceIdentifier: string, options?: StoreOptions): Promise<Readable>;
    isEpisodeCached(sourceIdentifier: string, options?: StoreOptions): Promise<boolean>;
    isSummaryCached(sourceIdentifier: string, options?: StoreOptions): Promise<boolean>;
}

export const create = ({ artifacts, metadata, containers }: QueryDependencies): QueryInstance => {
    const logger = Logging.getLogger();

    const getResult = async (sourceIdentifier: string, options: StoreOptions = {}): Promise<EpisodeResult> => {
        const cacheKey = deriveKey(sourceIdentifier);
        const episode = await metadata.getEpisode(cacheKey, options);
        if (!episode) {
            throw new NotFoundError(`Episode not found: ${cacheKey}`);
        }

        const result: EpisodeResult = {
            cacheKey,
            originalUrl: episode.originalUrl,
            blobPath: episode.blobPath,
            fileSize: episode.fileSize,
            downloadDate: episode.downloadDate,
        };

        const summary = await metadata.getSummary(cacheKey, options);
        if (!summary) {
            logger.debug('No summary stored for episode %s', cacheKey);
            return result;
        }

        const text = await artifacts.readText(containers.transcripts, summaryTextName(cacheKey), options);
        return {
            ...result,
            summary: {
                text: trimNonAlphanumeric(text),
                transcriptWordCount: summary.transcriptWordCount,
                summaryWordCount: summary.summaryWordCount,
                audioBlobPath: summary.summaryAudioBlobPath,
                processedDate: summary.processedDate,
            },
        };
    };

    const getEpisodeStream = async (sourceIdentifier: string, options: StoreOptions = {}): Promise<Readable> => {
        const cacheKey = deriveKey(sourceIdentifier);
        if (!await metadata.episodeExists(cacheKey, options)) {
            throw new NotFoundError(`Episode not found: ${cacheKey}`);
        }
        return artifacts.readStream(containers.episodes, episodeAudioName(cacheKey), options);
    };

    const getSummaryStream = async (sourceIdentifier: string, options: StoreOptions = {}): Promise<Readable> => {
        const cacheKey = deriveKey(sourceIdentifier);
        const summary = await metadata.getSummary(cacheKey, options);
        if (!summary) {
            throw new NotFoundError(`Summary not found: ${cacheKey}`);
        }
        return artifacts.readStream(containers.summaries, blobNameOf(summary.summaryAudioBlobPath), options);
    };

    return {
        getResult,
        getEpisodeStream,
        getSummaryStream,
        isEpisodeCached: async (sourceIdentifier, options = {}) => metadata.episodeExists(deriveKey(sourceIdentifier), options),
        isSummaryCached: async (sourceIdentifier, options = {}) => metadata.summaryExists(deriveKey(sourceIdentifier), options),
    };
};
