/**
 * Two-Pass Summarizer
 *
 * One summarization call aimed at the target length, then at most one
 * compression call when the result overshoots the tolerance. The second
 * result is accepted whatever its length.
 */

import * as Logging from '../logging';
import { DEFAULT_SUMMARY_MAX_WORDS, DEFAULT_SUMMARY_TARGET_WORDS } from '../constants';
import { PrecisError, SummarizationFailedError, errorMessage, throwIfCancelled } from '../errors';
import { SummarizationCapability } from '../providers/types';
import { StageResult, attempt, unwrap } from '../util/result';
import { countWords } from '../util/text';
import { buildCompressionMessages, buildSummaryMessages } from './prompts';

export interface SummarizerConfig {
    targetWords?: number;
    maxWords?: number;
}

export interface SummarizeOptions {
    signal?: AbortSignal;
}

export interface SummaryResult {
    text: string;
    wordCount: number;
    passes: 1 | 2;
}

export interface SummarizerInstance {
    summarize(transcript: string, options?: SummarizeOptions): Promise<SummaryResult>;
    trySummarize(transcript: string, options?: SummarizeOptions): Promise<StageResult<SummaryResult>>;
}

const wrapFailure = (error: unknown): PrecisError => {
    return new SummarizationFailedError(`Summarization failed: ${errorMessage(error)}`, { cause: error });
};

export const create = (capability: SummarizationCapability, config: SummarizerConfig = {}): SummarizerInstance => {
    const logger = Logging.getLogger();
    const targetWords = config.targetWords ?? DEFAULT_SUMMARY_TARGET_WORDS;
    const maxWords = config.maxWords ?? DEFAULT_SUMMARY_MAX_WORDS;

    const trySummarize = async (transcript: string, options: SummarizeOptions = {}): Promise<StageResult<SummaryResult>> => {
        const { signal } = options;
        return attempt<SummaryResult>(async () => {
            throwIfCancelled(signal);
            logger.info('Starting summarization. Transcript length: %d characters', transcript.length);

            const summary = await capability.complete(buildSummaryMessages(transcript, targetWords), { signal, temperature: 1.0 });
            const wordCount = countWords(summary);
            logger.info('Summarization completed: ~%d words', wordCount);

            if (wordCount <= maxWords) {
                return { text: summary, wordCount, passes: 1 };
            }

            logger.warn('Summary exceeded target length (%d words). Performing second pass compression.', wordCount);
            throwIfCancelled(signal);
            const compressed = await capability.complete(buildCompressionMessages(summary, targetWords), { signal });
            const compressedWordCount = countWords(compressed);
            logger.info('Compression completed: ~%d words', compressedWordCount);

            return { text: compressed, wordCount: compressedWordCount, passes: 2 };
        }, wrapFailure);
    };

    const summarize = async (transcript: string, options: SummarizeOptions = {}): Promise<SummaryResult> => {
        const result = await trySummarize(transcript, options);
        if (!result.ok) {
            logger.error('Error summarizing transcript: %s', result.error.message);
        }
        return unwrap(result);
    };

    return { summarize, trySummarize };
};
