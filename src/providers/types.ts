/**
 * Capability Types
 *
 * The narrow interfaces the pipeline calls for speech-to-text, text
 * completion and text-to-speech. Concrete backends are chosen once per
 * request by `resolveCapabilities`; nothing below the orchestrator looks up
 * settings on its own.
 */

import { ALLOWED_PROVIDERS, ALLOWED_SPEECH_FORMATS } from '../constants';

export type ProviderName = typeof ALLOWED_PROVIDERS[number];
export type SpeechFormat = typeof ALLOWED_SPEECH_FORMATS[number];

export interface CallOptions {
    signal?: AbortSignal;
}

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

export interface TranscriptionCapability {
    transcribe(audioFile: string, options?: CallOptions): Promise<string>;
}

export interface SummarizationCapability {
    complete(messages: ChatMessage[], options?: CallOptions & { temperature?: number }): Promise<string>;
}

export interface SpeechCapability {
    synthesize(text: string, outputPath: string, options?: CallOptions): Promise<string>;
}

export interface Capabilities {
    provider: ProviderName;
    transcription: TranscriptionCapability;
    summarization: SummarizationCapability;
    speech: SpeechCapability;
}

/**
 * Backend settings. Every field can be overridden per request.
 */
export interface ProviderSettings {
    provider: ProviderName;
    apiKey?: string;
    baseURL?: string;
    model: string;
    transcriptionModel: string;
    speechModel: string;
    voice: string;
    speechSpeed: number;
    speechFormat: SpeechFormat;
    mockDelayMs?: number;
}

export type ProviderOverrides = Partial<ProviderSettings>;
