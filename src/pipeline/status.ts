/**
 * Progress events emitted by the pipeline. Each event is a self-contained
 * snapshot: stage tag, percentage and a message for display, plus whatever
 * results are known at that point.
 */

import { z } from 'zod';
import { ErrorCode } from '../errors';

export const PROCESSING_STAGES = [
    'downloading',
    'downloaded',
    'transcribing',
    'transcribed',
    'summarizing',
    'summarized',
    'generating-speech',
    'complete',
    'error',
] as const;

export const ProcessingStageSchema = z.enum(PROCESSING_STAGES);

export type ProcessingStage = z.infer<typeof ProcessingStageSchema>;

export const STAGE_PROGRESS: Record<ProcessingStage, number> = {
    'downloading': 10,
    'downloaded': 20,
    'transcribing': 25,
    'transcribed': 40,
    'summarizing': 50,
    'summarized': 70,
    'generating-speech': 80,
    'complete': 100,
    'error': 0,
};

export interface ProcessingStatus {
    cacheKey?: string;
    stage: ProcessingStage;
    progress: number;
    message: string;
    isComplete: boolean;
    isError: boolean;
    errorMessage?: string;
    errorCode?: ErrorCode;
    wasCached?: boolean;
    transcriptWordCount?: number;
    summaryWordCount?: number;
    summaryText?: string;
    summaryAudioPath?: string;
    /** Elapsed milliseconds, set on the final event of a run */
    processingDuration?: number;
}

export type StatusDetails = Omit<ProcessingStatus, 'stage' | 'progress' | 'message' | 'isComplete' | 'isError'>;

/**
 * Unknown tags map to 'error', matching how a consumer should treat a stage
 * it cannot place.
 */
export const parseStage = (value: string): ProcessingStage => {
    const parsed = ProcessingStageSchema.safeParse(value.trim().toLowerCase());
    return parsed.success ? parsed.data : 'error';
};

export const isTerminal = (stage: ProcessingStage): boolean => stage === 'complete' || stage === 'error';

export const createStatus = (stage: ProcessingStage, message: string, details: StatusDetails = {}): ProcessingStatus => ({
    ...details,
    stage,
    progress: STAGE_PROGRESS[stage],
    message,
    isComplete: stage === 'complete',
    isError: stage === 'error',
});

export const createErrorStatus = (message: string, errorMessage: string, details: StatusDetails = {}): ProcessingStatus =>
    createStatus('error', message, { ...details, errorMessage });
