/**
 * Audio Segmenter
 *
 * Splits audio that is too large for a single transcription call into
 * time-bounded chunks. Every chunk after the first starts a little early so a
 * word spoken across a cut lands in both neighbours instead of neither; the
 * duplicated words at the seams are left in the joined transcript.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import { Media } from '../util/media';
import {
    CHUNK_OVERLAP_SECONDS,
    CHUNK_SAFETY_FACTOR,
    MAX_CHUNK_DURATION_SECONDS,
    MIN_CHUNK_DURATION_SECONDS,
} from '../constants';
import { InvalidArgumentError, PrecisError, SegmentationFailedError, errorMessage, throwIfCancelled } from '../errors';
import { AudioSegment, SegmentPlan, SegmentPlanEntry, SegmenterConfig } from './types';

export interface SegmenterInstance {
    segment(filePath: string, scratchDir: string, signal?: AbortSignal): Promise<AudioSegment[]>;
}

/**
 * Seconds of audio per chunk: the share of the file that fits under the size
 * limit, scaled down to absorb encoding variance, truncated to whole seconds
 * and clamped so we make neither a flood of tiny calls nor one call close to
 * the limit.
 */
export const computeChunkDuration = (
    maxAudioSize: number,
    fileSize: number,
    totalDuration: number,
    config: Omit<SegmenterConfig, 'maxAudioSize'> = {},
): number => {
    const safetyFactor = config.safetyFactor ?? CHUNK_SAFETY_FACTOR;
    const min = config.minChunkSeconds ?? MIN_CHUNK_DURATION_SECONDS;
    const max = config.maxChunkSeconds ?? MAX_CHUNK_DURATION_SECONDS;

    const raw = Math.trunc((maxAudioSize / fileSize) * totalDuration * safetyFactor);
    return Math.max(min, Math.min(raw, max));
};

export const planSegments = (
    totalDuration: number,
    fileSize: number,
    config: SegmenterConfig,
): SegmentPlan => {
    if (!(totalDuration > 0)) {
        throw new InvalidArgumentError(`Audio duration must be positive, got ${totalDuration}`);
    }
    if (!(fileSize > 0) || !(config.maxAudioSize > 0)) {
        throw new InvalidArgumentError(`File size and size limit must be positive, got ${fileSize} and ${config.maxAudioSize}`);
    }

    const overlap = config.overlapSeconds ?? CHUNK_OVERLAP_SECONDS;
    const chunkDuration = computeChunkDuration(config.maxAudioSize, fileSize, totalDuration, config);
    const count = Math.ceil(totalDuration / chunkDuration);

    const entries: SegmentPlanEntry[] = [];
    for (let index = 0; index < count; index++) {
        const lead = index > 0 ? overlap : 0;
        entries.push({
            index,
            start: Math.max(0, index * chunkDuration - lead),
            duration: chunkDuration + lead,
        });
    }

    return { totalDuration, chunkDuration, entries };
};

export const segmentFileName = (index: number, extension = '.mp3'): string => {
    return `chunk_${index.toString().padStart(3, '0')}${extension}`;
};

export const create = (media: Media, config: SegmenterConfig): SegmenterInstance => {
    const logger = Logging.getLogger();

    const segment = async (filePath: string, scratchDir: string, signal?: AbortSignal): Promise<AudioSegment[]> => {
        try {
            throwIfCancelled(signal);

            const totalDuration = await media.getDuration(filePath);
            const fileSize = await media.getFileSize(filePath);
            const plan = planSegments(totalDuration, fileSize, config);
            logger.info('Splitting %s (%d bytes, %ds) into %d chunks of %ds',
                path.basename(filePath), fileSize, Math.round(totalDuration), plan.entries.length, plan.chunkDuration);

            const extension = path.extname(filePath) || '.mp3';
            const segments: AudioSegment[] = [];
            for (const entry of plan.entries) {
                throwIfCancelled(signal);
                const outputPath = path.join(scratchDir, segmentFileName(entry.index, extension));
                await media.clip(filePath, entry.start, entry.duration, outputPath, signal);
                segments.push({ ...entry, path: outputPath });
            }

            return segments;
        } catch (error) {
            if (error instanceof PrecisError && (error.code === 'CANCELLED' || error.code === 'SEGMENTATION_FAILED')) {
                throw error;
            }
            logger.error('Error splitting audio file %s: %s', filePath, errorMessage(error));
            throw new SegmentationFailedError(`Failed to split audio file ${filePath}: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { segment };
};
