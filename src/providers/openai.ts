/**
 * OpenAI-backed capabilities: whisper transcription, chat completion for
 * summaries and text-to-speech for the narrated result.
 */

import OpenAI from 'openai';
import * as path from 'node:path';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import {
    CancelledError,
    ConfigurationError,
    SummarizationFailedError,
    SynthesisFailedError,
    TranscriptionFailedError,
    errorMessage,
    throwIfCancelled,
} from '../errors';
import {
    Capabilities,
    ProviderSettings,
    SpeechCapability,
    SummarizationCapability,
    TranscriptionCapability,
} from './types';

export const SPEECH_VOICES = [
    'alloy', 'ash', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer',
] as const satisfies ReadonlyArray<OpenAI.Audio.SpeechCreateParams['voice']>;

export type SpeechVoice = typeof SPEECH_VOICES[number];

export const isSpeechVoice = (voice: string): voice is SpeechVoice => {
    return SPEECH_VOICES.some(known => known === voice);
};

// The SDK rejects with its own abort error; report it the way the rest of the pipeline does
const rethrow = (error: unknown, signal: AbortSignal | undefined, wrap: (message: string, cause: unknown) => Error): never => {
    if (signal?.aborted) {
        throw new CancelledError('Request was cancelled', { cause: error });
    }
    throw wrap(errorMessage(error), error);
};

export const create = (settings: ProviderSettings, openaiClient?: OpenAI): Capabilities => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    // Lazy-initialize the client so that a missing key only fails the call that needs it
    let client: OpenAI | null = openaiClient ?? null;
    const getClient = (): OpenAI => {
        if (!client) {
            if (!settings.apiKey) {
                throw new ConfigurationError('OpenAI API key is required. Provide it via --openai-api-key, the config file, or the OPENAI_API_KEY environment variable.');
            }
            client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL });
        }
        return client;
    };

    const transcription: TranscriptionCapability = {
        transcribe: async (audioFile, options = {}) => {
            throwIfCancelled(options.signal);
            const fileName = path.basename(audioFile);
            logger.info('Transcribing audio with %s: %s', settings.transcriptionModel, fileName);

            const startTime = Date.now();
            try {
                const audioStream = await storage.readStream(audioFile);
                const response = await getClient().audio.transcriptions.create({
                    model: settings.transcriptionModel,
                    file: audioStream,
                    response_format: 'json',
                    temperature: 0,
                }, { signal: options.signal });

                const duration = ((Date.now() - startTime) / 1000).toFixed(1);
                logger.debug('Transcribed %s in %ss (%d characters)', fileName, duration, response.text.length);
                return response.text;
            } catch (error) {
                if (error instanceof ConfigurationError) throw error;
                logger.error('Error transcribing audio file %s: %s', fileName, errorMessage(error));
                return rethrow(error, options.signal, (message, cause) =>
                    new TranscriptionFailedError(`Failed to transcribe ${fileName}: ${message}`, { cause }));
            }
        },
    };

    const summarization: SummarizationCapability = {
        complete: async (messages, options = {}) => {
            throwIfCancelled(options.signal);
            logger.info('Sending request to %s... this may take a minute', settings.model);

            const startTime = Date.now();
            try {
                const completion = await getClient().chat.completions.create({
                    model: settings.model,
                    messages,
                    ...(options.temperature !== undefined && { temperature: options.temperature }),
                }, { signal: options.signal });

                const duration = ((Date.now() - startTime) / 1000).toFixed(1);
                logger.info('%s responded in %ss', settings.model, duration);

                const content = completion.choices[0]?.message?.content;
                if (!content) {
                    throw new SummarizationFailedError('No response received from the completion model');
                }
                return content;
            } catch (error) {
                if (error instanceof ConfigurationError || error instanceof SummarizationFailedError) throw error;
                logger.error('Error calling completion model: %s', errorMessage(error));
                return rethrow(error, options.signal, (message, cause) =>
                    new SummarizationFailedError(`Failed to create completion: ${message}`, { cause }));
            }
        },
    };

    const speech: SpeechCapability = {
        synthesize: async (text, outputPath, options = {}) => {
            throwIfCancelled(options.signal);
            if (!isSpeechVoice(settings.voice)) {
                throw new ConfigurationError(`Unsupported voice: ${settings.voice}. Expected one of ${SPEECH_VOICES.join(', ')}`);
            }
            logger.info('Generating speech with %s (voice: %s, speed: %s, format: %s)',
                settings.speechModel, settings.voice, settings.speechSpeed, settings.speechFormat);

            try {
                const response = await getClient().audio.speech.create({
                    model: settings.speechModel,
                    voice: settings.voice,
                    input: text,
                    response_format: settings.speechFormat,
                    speed: settings.speechSpeed,
                }, { signal: options.signal });

                const audio = Buffer.from(await response.arrayBuffer());
                await storage.writeFile(outputPath, audio);
                logger.debug('Wrote %d bytes of speech to %s', audio.length, outputPath);
                return outputPath;
            } catch (error) {
                if (error instanceof ConfigurationError) throw error;
                logger.error('Error generating speech: %s', errorMessage(error));
                return rethrow(error, options.signal, (message, cause) =>
                    new SynthesisFailedError(`Failed to generate speech: ${message}`, { cause }));
            }
        },
    };

    return {
        provider: 'openai',
        transcription,
        summarization,
        speech,
    };
};
