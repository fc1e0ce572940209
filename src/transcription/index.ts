/**
 * Transcription System
 *
 * Factory for the bounded transcription executor plus the pure segment
 * planning helpers it is built on.
 */

import * as Logging from '../logging';
import * as Media from '../util/media';
import * as Executor from './executor';
import { TranscriptionCapability } from '../providers/types';
import { ExecutorConfig } from './types';

export type TranscriptionInstance = Executor.ExecutorInstance;

export interface CreateOptions extends ExecutorConfig {
    transcription: TranscriptionCapability;
    /** Defaults to the ffmpeg-backed toolchain */
    media?: Media.Media;
}

export const create = (options: CreateOptions): TranscriptionInstance => {
    const { transcription, media, ...config } = options;
    return Executor.create({
        transcription,
        media: media ?? Media.create(Logging.getLogger()),
    }, config);
};

export { computeChunkDuration, planSegments, segmentFileName } from './segmenter';
export * from './types';
