/**
 * Mock capabilities for development: canned text, a tiny silent MP3, and an
 * optional artificial delay. No network access.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import * as path from 'node:path';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { throwIfCancelled } from '../errors';
import { Capabilities, ProviderSettings } from './types';

// ID3v2 header, one MPEG-1 Layer III frame header, then silence
export const SILENT_MP3 = Buffer.from([
    0x49, 0x44, 0x33, 0x03, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    0xff, 0xfb, 0x90, 0x00,
    ...new Array<number>(20).fill(0x00),
]);

const MOCK_SUMMARY_WORDS = 120;

export const create = (settings: ProviderSettings): Capabilities => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const delayMs = settings.mockDelayMs ?? 0;

    const pause = async (signal?: AbortSignal): Promise<void> => {
        throwIfCancelled(signal);
        if (delayMs > 0) {
            await sleep(delayMs, undefined, { signal });
        }
    };

    return {
        provider: 'mock',
        transcription: {
            transcribe: async (audioFile, options = {}) => {
                logger.info('[MOCK] Transcribing %s', audioFile);
                await pause(options.signal);
                return `This is a mock transcript of ${path.basename(audioFile)}.`;
            },
        },
        summarization: {
            complete: async (messages, options = {}) => {
                await pause(options.signal);
                const prompt = messages[messages.length - 1]?.content ?? '';
                const words = prompt.split(/\s+/).filter(word => word.length > 0);
                logger.info('[MOCK] Summarizing %d words of prompt', words.length);
                return words.slice(0, MOCK_SUMMARY_WORDS).join(' ');
            },
        },
        speech: {
            synthesize: async (text, outputPath, options = {}) => {
                logger.info('[MOCK] Generating speech for %d characters', text.length);
                await pause(options.signal);
                await storage.writeFile(outputPath, SILENT_MP3);
                return outputPath;
            },
        },
    };
};
