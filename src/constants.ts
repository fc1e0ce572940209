import os from 'node:os';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'precis';
export const DATE_FORMAT_YEAR_MONTH_DAY_HOURS_MINUTES_SECONDS_MILLISECONDS = 'YYYY-M-D-HHmmss.SSS';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_JSON = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';
export const DEFAULT_STORAGE_DIRECTORY = './storage';
export const DEFAULT_TEMP_DIRECTORY = os.tmpdir();

export const DEFAULT_CONTAINERS = {
    episodes: 'episodes',
    transcripts: 'transcripts',
    summaries: 'summaries',
} as const;

export const METADATA_DIRECTORY = 'metadata';

// Audio over this size is split before transcription. The backend accepts
// 25 MB; smaller chunks come back faster when transcribed in parallel.
export const DEFAULT_MAX_AUDIO_SIZE = 5 * 1024 * 1024;
export const DEFAULT_MAX_CONCURRENCY = 10;

export const CHUNK_OVERLAP_SECONDS = 1;
export const CHUNK_SAFETY_FACTOR = 0.9;
export const MIN_CHUNK_DURATION_SECONDS = 60;
export const MAX_CHUNK_DURATION_SECONDS = 600;

// ~5 minutes of narration at 150 words per minute
export const DEFAULT_SUMMARY_TARGET_WORDS = 750;
export const DEFAULT_SUMMARY_MAX_WORDS = 800;
export const NARRATION_WORDS_PER_MINUTE = 150;

export const DEFAULT_PROVIDER = 'openai';
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';
export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_SPEECH_MODEL = 'gpt-4o-mini-tts';
export const DEFAULT_VOICE = 'alloy';
export const DEFAULT_SPEECH_SPEED = 1.0;
export const DEFAULT_SPEECH_FORMAT = 'mp3';

export const ALLOWED_PROVIDERS = ['openai', 'mock'] as const;
export const ALLOWED_SPEECH_FORMATS = ['mp3', 'opus', 'aac', 'flac', 'wav', 'pcm'] as const;

export const DEFAULT_MOCK_DELAY_MS = 0;
export const DEFAULT_PROGRESS_QUEUE_SIZE = 64;

export const PRECIS_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    json: DEFAULT_JSON,
    configDirectory: DEFAULT_CONFIG_DIR,
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    transcriptionModel: DEFAULT_TRANSCRIPTION_MODEL,
    speechModel: DEFAULT_SPEECH_MODEL,
    voice: DEFAULT_VOICE,
    speechSpeed: DEFAULT_SPEECH_SPEED,
    speechFormat: DEFAULT_SPEECH_FORMAT,
    maxAudioSize: DEFAULT_MAX_AUDIO_SIZE,
    maxConcurrency: DEFAULT_MAX_CONCURRENCY,
    summaryTargetWords: DEFAULT_SUMMARY_TARGET_WORDS,
    summaryMaxWords: DEFAULT_SUMMARY_MAX_WORDS,
    storageDirectory: DEFAULT_STORAGE_DIRECTORY,
    tempDirectory: DEFAULT_TEMP_DIRECTORY,
    mockDelayMs: DEFAULT_MOCK_DELAY_MS,
    containers: DEFAULT_CONTAINERS,
};
