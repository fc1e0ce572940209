import 'dotenv/config';
import { CommanderError } from 'commander';
import { z } from 'zod';
import * as Arguments from '@/arguments';
import { ALLOWED_PROVIDERS, ALLOWED_SPEECH_FORMATS, PROGRAM_NAME, VERSION } from '@/constants';
import { errorMessage, toPrecisError } from '@/errors';
import { getLogger, setLogLevel } from '@/logging';
import * as Pipeline from '@/pipeline';
import { ProcessingStatus } from '@/pipeline/status';
import { ProgressSink, createNdjsonSink, createQueuedSink } from '@/progress/sink';
import { ProviderName, ProviderSettings, SpeechFormat } from '@/providers/types';
import { formatCount } from '@/util/text';

export interface Args {
    verbose?: boolean;
    debug?: boolean;
    json?: boolean;
    configDirectory?: string;
    provider?: ProviderName;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    model?: string;
    transcriptionModel?: string;
    speechModel?: string;
    voice?: string;
    speechSpeed?: number;
    speechFormat?: SpeechFormat;
    maxAudioSize?: number;
    maxConcurrency?: number;
    summaryTargetWords?: number;
    summaryMaxWords?: number;
    storageDirectory?: string;
    tempDirectory?: string;
}

const ContainersSchema = z.object({
    episodes: z.string().min(1),
    transcripts: z.string().min(1),
    summaries: z.string().min(1),
});

export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    json: z.boolean(),
    configDirectory: z.string().min(1),
    provider: z.enum(ALLOWED_PROVIDERS),
    model: z.string().min(1),
    transcriptionModel: z.string().min(1),
    speechModel: z.string().min(1),
    voice: z.string().min(1),
    speechSpeed: z.number().min(0.25).max(4),
    speechFormat: z.enum(ALLOWED_SPEECH_FORMATS),
    maxAudioSize: z.number().int().positive(),
    maxConcurrency: z.number().int().positive(),
    summaryTargetWords: z.number().int().positive(),
    summaryMaxWords: z.number().int().positive(),
    storageDirectory: z.string().min(1),
    tempDirectory: z.string().min(1),
    mockDelayMs: z.number().int().nonnegative(),
    containers: ContainersSchema,
});

export const SecureConfigSchema = z.object({
    openaiApiKey: z.string().min(1).optional(),
    openaiBaseUrl: z.string().url().optional(),
});

// Everything except the config directory may come from config.yaml
export const FileConfigSchema = ConfigSchema
    .omit({ configDirectory: true, containers: true })
    .partial()
    .merge(SecureConfigSchema)
    .extend({ containers: ContainersSchema.partial().optional() })
    .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;

export const toProviderSettings = (config: Config, secureConfig: SecureConfig): ProviderSettings => ({
    provider: config.provider,
    apiKey: secureConfig.openaiApiKey,
    baseURL: secureConfig.openaiBaseUrl,
    model: config.model,
    transcriptionModel: config.transcriptionModel,
    speechModel: config.speechModel,
    voice: config.voice,
    speechSpeed: config.speechSpeed,
    speechFormat: config.speechFormat,
    mockDelayMs: config.mockDelayMs,
});

// Human-readable progress lines on stdout
const createConsoleSink = (stream: NodeJS.WritableStream): ProgressSink => (status: ProcessingStatus) => {
    const line = status.isError
        ? `[error] ${status.message}: ${status.errorMessage ?? 'unknown error'}`
        : `[${String(status.progress).padStart(3)}%] ${status.message}`;
    stream.write(`${line}\n`);
};

const printResult = (result: Pipeline.EpisodeResult, json: boolean) => {
    if (json) {
        process.stdout.write(`${JSON.stringify(result)}\n`);
        return;
    }
    const lines = [
        `Episode:    ${result.cacheKey}`,
        `Source:     ${result.originalUrl}`,
        `Audio:      ${result.blobPath} (${formatCount(result.fileSize)} bytes)`,
        `Downloaded: ${result.downloadDate}`,
    ];
    if (result.summary) {
        lines.push(
            `Summary:    ${result.summary.audioBlobPath}`,
            `Words:      ${formatCount(result.summary.transcriptWordCount)} -> ${formatCount(result.summary.summaryWordCount)}`,
            '',
            result.summary.text,
        );
    } else {
        lines.push('Summary:    (not processed yet)');
    }
    process.stdout.write(`${lines.join('\n')}\n`);
};

export async function main(argv: string[] = process.argv) {
    let parsed: Arguments.ParsedCommand;
    try {
        parsed = Arguments.parseCommandLine(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            process.exitCode = error.exitCode;
            return;
        }
        process.stderr.write(`Error: ${errorMessage(error)}\n`);
        process.exitCode = 1;
        return;
    }

    if (parsed.args.verbose === true) {
        setLogLevel('verbose');
    }
    if (parsed.args.debug === true) {
        setLogLevel('debug');
    }
    const logger = getLogger();
    logger.verbose('Starting %s: %s', PROGRAM_NAME, VERSION);

    const controller = new AbortController();
    const onInterrupt = () => {
        logger.warn('Interrupted, cancelling...');
        controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
        const [config, secureConfig] = await Arguments.configure(parsed.args);
        const pipeline = Pipeline.create({
            settings: toProviderSettings(config, secureConfig),
            containers: config.containers,
            storageDirectory: config.storageDirectory,
            tempDirectory: config.tempDirectory,
            maxAudioSize: config.maxAudioSize,
            maxConcurrency: config.maxConcurrency,
            summaryTargetWords: config.summaryTargetWords,
            summaryMaxWords: config.summaryMaxWords,
        });

        if (parsed.command === 'show') {
            printResult(await pipeline.getResult(parsed.source, { signal: controller.signal }), config.json);
            return;
        }

        const target = config.json ? createNdjsonSink(process.stdout) : createConsoleSink(process.stdout);
        const progress = createQueuedSink(target, { controller });
        let result: Pipeline.PipelineResult;
        try {
            result = await pipeline.run(parsed.source, { onProgress: progress.sink, signal: controller.signal });
        } finally {
            await progress.flush();
        }
        if (!config.json) {
            process.stdout.write(`${result.summaryAudioPath}\n`);
        }
    } catch (error) {
        const failure = toPrecisError(error);
        logger.error('Exiting due to Error: %s', failure.message);
        process.exitCode = failure.code === 'CANCELLED' ? 130 : 1;
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}
