/**
 * Blob names for every artifact of a cache key. The `{key}` and
 * `{key}_summary` conventions are shared by all storage backends. Summary
 * audio takes the extension of the speech format it was synthesized in.
 */

export const episodeAudioName = (cacheKey: string): string => `${cacheKey}.mp3`;
export const transcriptName = (cacheKey: string): string => `${cacheKey}_transcript.txt`;
export const summaryTextName = (cacheKey: string): string => `${cacheKey}_summary.txt`;
export const summaryAudioName = (cacheKey: string, format = 'mp3'): string => `${cacheKey}_summary.${format}`;

export const blobPath = (container: string, blobName: string): string => `${container}/${blobName}`;

// Blob name within its container, from a `container/blob` path
export const blobNameOf = (fullPath: string): string => fullPath.slice(fullPath.indexOf('/') + 1);
