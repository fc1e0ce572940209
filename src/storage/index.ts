export * from './types';
export * from './naming';
export { create as createLocalArtifactStore } from './local-artifacts';
export type { LocalArtifactConfig } from './local-artifacts';
export { create as createLocalMetadataStore } from './local-metadata';
export type { LocalMetadataConfig } from './local-metadata';
