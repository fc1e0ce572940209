/**
 * Storage Types
 *
 * Records for cached episodes and summaries, and the two collaborator
 * interfaces the pipeline persists through. Records are written once per
 * cache key and never updated.
 */

import { Readable } from 'node:stream';
import { z } from 'zod';

export const EpisodeRecordSchema = z.object({
    cacheKey: z.string().min(1),
    originalUrl: z.string(),
    blobPath: z.string(),
    fileSize: z.number().int().nonnegative(),
    downloadDate: z.string().datetime(),
});

export const SummaryRecordSchema = z.object({
    cacheKey: z.string().min(1),
    transcriptBlobPath: z.string(),
    summaryTextBlobPath: z.string(),
    summaryAudioBlobPath: z.string(),
    transcriptWordCount: z.number().int().nonnegative(),
    summaryWordCount: z.number().int().nonnegative(),
    processedDate: z.string().datetime(),
});

export type EpisodeRecord = z.infer<typeof EpisodeRecordSchema>;
export type SummaryRecord = z.infer<typeof SummaryRecordSchema>;

export type ContainerKind = 'episodes' | 'transcripts' | 'summaries';
export type Containers = Record<ContainerKind, string>;

export interface StoreOptions {
    signal?: AbortSignal;
}

export interface ArtifactStore {
    /** Returns the location of the stored artifact */
    uploadFile(container: string, blobName: string, localPath: string, options?: StoreOptions): Promise<string>;
    uploadText(container: string, blobName: string, text: string, options?: StoreOptions): Promise<string>;
    downloadToFile(container: string, blobName: string, localPath: string, options?: StoreOptions): Promise<void>;
    readText(container: string, blobName: string, options?: StoreOptions): Promise<string>;
    readStream(container: string, blobName: string, options?: StoreOptions): Promise<Readable>;
    exists(container: string, blobName: string, options?: StoreOptions): Promise<boolean>;
    delete(container: string, blobName: string, options?: StoreOptions): Promise<void>;
    getSize(container: string, blobName: string, options?: StoreOptions): Promise<number>;
}

export interface MetadataStore {
    getEpisode(cacheKey: string, options?: StoreOptions): Promise<EpisodeRecord | null>;
    saveEpisode(record: EpisodeRecord, options?: StoreOptions): Promise<void>;
    episodeExists(cacheKey: string, options?: StoreOptions): Promise<boolean>;
    deleteEpisode(cacheKey: string, options?: StoreOptions): Promise<void>;
    getSummary(cacheKey: string, options?: StoreOptions): Promise<SummaryRecord | null>;
    saveSummary(record: SummaryRecord, options?: StoreOptions): Promise<void>;
    summaryExists(cacheKey: string, options?: StoreOptions): Promise<boolean>;
    deleteSummary(cacheKey: string, options?: StoreOptions): Promise<void>;
}
