import { Command, Option } from 'commander';
import yaml from 'js-yaml';
import * as path from 'node:path';
import { z } from 'zod';
import {
    ALLOWED_PROVIDERS,
    ALLOWED_SPEECH_FORMATS,
    DEFAULT_CONFIG_DIR,
    DEFAULT_CONFIG_FILE_NAME,
    PRECIS_DEFAULTS,
    PROGRAM_NAME,
    VERSION,
} from '@/constants';
import { ConfigurationError, errorMessage } from '@/errors';
import { getLogger } from '@/logging';
import * as Storage from '@/util/storage';
import { Args, Config, ConfigSchema, FileConfig, FileConfigSchema, SecureConfig, SecureConfigSchema } from '@/precis';

export type CommandName = 'run' | 'show';

export interface ParsedCommand {
    command: CommandName;
    source: string;
    args: Args;
}

const parseInteger = (name: string) => (value: string): number => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed)) {
        throw new ConfigurationError(`Invalid ${name}: '${value}'. Must be an integer.`);
    }
    return parsed;
};

const parseDecimal = (name: string) => (value: string): number => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new ConfigurationError(`Invalid ${name}: '${value}'. Must be a number.`);
    }
    return parsed;
};

const addOptions = (command: Command): Command => {
    return command
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .option('--json', 'write progress as newline-delimited JSON to stdout')
        .option('--config-directory <configDirectory>', 'directory holding config.yaml')
        .addOption(new Option('--provider <provider>', 'capability provider').choices(ALLOWED_PROVIDERS))
        .option('--openai-api-key <openaiApiKey>', 'OpenAI API key')
        .option('--openai-base-url <openaiBaseUrl>', 'OpenAI-compatible endpoint')
        .option('--model <model>', 'completion model used for summaries')
        .option('--transcription-model <transcriptionModel>', 'speech-to-text model')
        .option('--speech-model <speechModel>', 'text-to-speech model')
        .option('--voice <voice>', 'text-to-speech voice')
        .option('--speech-speed <speechSpeed>', 'text-to-speech speed (0.25 - 4.0)', parseDecimal('speechSpeed'))
        .addOption(new Option('--speech-format <speechFormat>', 'summary audio format').choices(ALLOWED_SPEECH_FORMATS))
        .option('--max-audio-size <maxAudioSize>', 'split audio larger than this many bytes', parseInteger('maxAudioSize'))
        .option('--max-concurrency <maxConcurrency>', 'segments transcribed at once', parseInteger('maxConcurrency'))
        .option('--summary-target-words <summaryTargetWords>', 'target summary length in words', parseInteger('summaryTargetWords'))
        .option('--summary-max-words <summaryMaxWords>', 'summary length that triggers a compression pass', parseInteger('summaryMaxWords'))
        .option('--storage-directory <storageDirectory>', 'directory holding cached artifacts and metadata')
        .option('--temp-directory <tempDirectory>', 'temporary directory for processing files');
};

/**
 * Parse the command line. `precis <source>` runs the pipeline,
 * `precis show <source>` prints what is stored for an episode.
 */
export const parseCommandLine = (argv: string[], from: 'node' | 'user' = 'node'): ParsedCommand => {
    const result: { parsed?: ParsedCommand } = {};

    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Turn podcast episodes into short narrated summaries')
        .description('Downloads an episode, transcribes it, summarizes the transcript and narrates the summary. Every artifact is cached by episode.')
        .version(VERSION)
        .enablePositionalOptions()
        .exitOverride();

    addOptions(program)
        .argument('<source>', 'episode URL or cache key')
        .action((source: string, options: Args) => {
            result.parsed = { command: 'run', source, args: options };
        });

    addOptions(program.command('show'))
        .description('print the stored result for an episode')
        .argument('<source>', 'episode URL or cache key')
        .action((source: string, options: Args) => {
            result.parsed = { command: 'show', source, args: options };
        });

    program.parse(argv, { from });

    if (!result.parsed) {
        throw new ConfigurationError('No source given');
    }
    return result.parsed;
};

const formatIssues = (error: z.ZodError): string =>
    error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Read `config.yaml` from the config directory. A missing file yields no
 * values; an unreadable or invalid one is a configuration error.
 */
export const readConfigFile = async (configDirectory: string): Promise<FileConfig> => {
    const logger = getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const configFile = path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

    if (!await storage.isFile(configFile)) {
        logger.debug('No configuration file at %s', configFile);
        return {};
    }

    let raw: unknown;
    try {
        raw = yaml.load(await storage.readFile(configFile, 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Failed to read ${configFile}: ${errorMessage(error)}`, { cause: error });
    }
    if (raw === undefined || raw === null) {
        return {};
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration in ${configFile}: ${formatIssues(parsed.error)}`);
    }
    logger.debug('Loaded configuration from %s', configFile);
    return parsed.data;
};

// Only the options the user actually passed
const cliValues = (args: Args): Partial<Config> => {
    const values: Partial<Config> = {};
    if (args.verbose !== undefined) values.verbose = args.verbose;
    if (args.debug !== undefined) values.debug = args.debug;
    if (args.json !== undefined) values.json = args.json;
    if (args.configDirectory !== undefined) values.configDirectory = args.configDirectory;
    if (args.provider !== undefined) values.provider = args.provider;
    if (args.model !== undefined) values.model = args.model;
    if (args.transcriptionModel !== undefined) values.transcriptionModel = args.transcriptionModel;
    if (args.speechModel !== undefined) values.speechModel = args.speechModel;
    if (args.voice !== undefined) values.voice = args.voice;
    if (args.speechSpeed !== undefined) values.speechSpeed = args.speechSpeed;
    if (args.speechFormat !== undefined) values.speechFormat = args.speechFormat;
    if (args.maxAudioSize !== undefined) values.maxAudioSize = args.maxAudioSize;
    if (args.maxConcurrency !== undefined) values.maxConcurrency = args.maxConcurrency;
    if (args.summaryTargetWords !== undefined) values.summaryTargetWords = args.summaryTargetWords;
    if (args.summaryMaxWords !== undefined) values.summaryMaxWords = args.summaryMaxWords;
    if (args.storageDirectory !== undefined) values.storageDirectory = args.storageDirectory;
    if (args.tempDirectory !== undefined) values.tempDirectory = args.tempDirectory;
    return values;
};

/**
 * Merge defaults, file values, environment and command line (in increasing
 * precedence) and validate the result.
 */
export const resolveConfig = (args: Args, fileValues: FileConfig, env: NodeJS.ProcessEnv): [Config, SecureConfig] => {
    const { openaiApiKey: fileApiKey, openaiBaseUrl: fileBaseUrl, containers: fileContainers, ...fileSettings } = fileValues;

    const merged = {
        ...PRECIS_DEFAULTS,
        ...fileSettings,
        ...cliValues(args),
        containers: { ...PRECIS_DEFAULTS.containers, ...fileContainers },
    };

    const config = ConfigSchema.safeParse(merged);
    if (!config.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(config.error)}`);
    }

    const secure = SecureConfigSchema.safeParse({
        openaiApiKey: args.openaiApiKey ?? env.OPENAI_API_KEY ?? fileApiKey,
        openaiBaseUrl: args.openaiBaseUrl ?? env.OPENAI_BASE_URL ?? fileBaseUrl,
    });
    if (!secure.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(secure.error)}`);
    }

    return [config.data, secure.data];
};

export const configure = async (args: Args, env: NodeJS.ProcessEnv = process.env): Promise<[Config, SecureConfig]> => {
    const logger = getLogger();
    logger.debug('Command Line Options: %s', JSON.stringify({ ...args, openaiApiKey: args.openaiApiKey && '***' }));

    const configDirectory = args.configDirectory ?? DEFAULT_CONFIG_DIR;
    const fileValues = await readConfigFile(configDirectory);
    const [config, secureConfig] = resolveConfig(args, fileValues, env);

    await validateTempDirectory(config.tempDirectory);
    if (config.provider === 'openai' && !secureConfig.openaiApiKey) {
        throw new ConfigurationError('OpenAI API key is required. Provide it via --openai-api-key, the config file, or the OPENAI_API_KEY environment variable.');
    }

    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return [config, secureConfig];
};

async function validateTempDirectory(tempDirectory: string) {
    const logger = getLogger();
    logger.debug('Validating temp directory: %s', tempDirectory);
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    await storage.createDirectory(tempDirectory);
    if (!await storage.isDirectoryWritable(tempDirectory)) {
        throw new ConfigurationError(`Temp directory is not writable: ${tempDirectory}`);
    }
}
