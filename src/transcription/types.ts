/**
 * Transcription System Types
 */

import { Media } from '../util/media';
import { TranscriptionCapability } from '../providers/types';

export interface AudioSegment {
    /** 0-based; defines reassembly order */
    index: number;
    /** Seconds from the start of the source file */
    start: number;
    /** Seconds of audio in this segment, overlap included */
    duration: number;
    path: string;
}

export interface SegmentPlanEntry {
    index: number;
    start: number;
    duration: number;
}

export interface SegmentPlan {
    totalDuration: number;
    chunkDuration: number;
    entries: SegmentPlanEntry[];
}

export interface SegmenterConfig {
    /** Bytes a single backend call accepts (with headroom already applied) */
    maxAudioSize: number;
    overlapSeconds?: number;
    minChunkSeconds?: number;
    maxChunkSeconds?: number;
    safetyFactor?: number;
}

export interface ExecutorConfig extends SegmenterConfig {
    /** Simultaneous in-flight transcription calls */
    maxConcurrency: number;
    tempDirectory: string;
}

export interface ExecutorDependencies {
    transcription: TranscriptionCapability;
    media: Media;
}

export interface TranscribeOptions {
    signal?: AbortSignal;
}

export interface TranscriptionResult {
    text: string;
    /** Number of backend calls made; 1 when the file was not split */
    segmentCount: number;
    /** Wall-clock milliseconds */
    duration: number;
}
