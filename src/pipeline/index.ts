/**
 * Pipeline
 *
 * Wires the local stores, the downloader and the ffmpeg toolchain into an
 * orchestrator and a query service sharing one storage directory.
 */

import * as Logging from '../logging';
import * as Downloader from '../network/downloader';
import * as Orchestrator from './orchestrator';
import * as Query from './query';
import { createLocalArtifactStore, createLocalMetadataStore } from '../storage';
import * as Media from '../util/media';
import { PipelineConfig, PipelineDependencies } from './types';

export interface PipelineInstance extends Orchestrator.OrchestratorInstance, Query.QueryInstance {}

export interface CreateConfig extends PipelineConfig {
    storageDirectory: string;
}

export const create = (config: CreateConfig, overrides: Partial<PipelineDependencies> = {}): PipelineInstance => {
    const artifacts = overrides.artifacts ?? createLocalArtifactStore({ basePath: config.storageDirectory });
    const metadata = overrides.metadata ?? createLocalMetadataStore({ basePath: config.storageDirectory });

    const orchestrator = Orchestrator.create(config, {
        artifacts,
        metadata,
        downloader: overrides.downloader ?? Downloader.create(),
        media: overrides.media ?? Media.create(Logging.getLogger()),
        resolveCapabilities: overrides.resolveCapabilities,
    });
    const query = Query.create({ artifacts, metadata, containers: config.containers });

    return { ...orchestrator, ...query };
};

export * from './types';
export * from './status';
