/**
 * Pipeline Types
 *
 * Configuration, collaborators and results of the episode-to-summary
 * pipeline.
 */

import { Downloader } from '../network/downloader';
import { ProgressSink } from '../progress/sink';
import { Capabilities, ProviderOverrides, ProviderSettings } from '../providers/types';
import { ArtifactStore, Containers, MetadataStore } from '../storage/types';
import { Media } from '../util/media';

export interface PipelineConfig {
    settings: ProviderSettings;
    containers: Containers;
    tempDirectory: string;
    maxAudioSize: number;
    maxConcurrency: number;
    summaryTargetWords: number;
    summaryMaxWords: number;
}

export type CapabilityResolver = (settings: ProviderSettings, overrides?: ProviderOverrides) => Capabilities;

export interface PipelineDependencies {
    artifacts: ArtifactStore;
    metadata: MetadataStore;
    downloader: Downloader;
    media: Media;
    /** Defaults to the provider registry */
    resolveCapabilities?: CapabilityResolver;
}

export interface RunOptions {
    onProgress?: ProgressSink;
    signal?: AbortSignal;
    /** Per-request capability overrides, merged over the configured settings */
    settings?: ProviderOverrides;
}

export interface PipelineResult {
    cacheKey: string;
    /** Local path of the narrated summary */
    summaryAudioPath: string;
    wasCached: boolean;
    summaryWasCached: boolean;
    transcriptWordCount?: number;
    summaryWordCount?: number;
    summaryText?: string;
    /** Elapsed milliseconds */
    processingDuration: number;
}

export interface EpisodeSummaryDetails {
    text: string;
    transcriptWordCount: number;
    summaryWordCount: number;
    audioBlobPath: string;
    processedDate: string;
}

export interface EpisodeResult {
    cacheKey: string;
    originalUrl: string;
    blobPath: string;
    fileSize: number;
    downloadDate: string;
    summary?: EpisodeSummaryDetails;
}
