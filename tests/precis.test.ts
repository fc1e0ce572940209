import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigSchema, main, toProviderSettings } from '../src/precis';
import { PRECIS_DEFAULTS } from '../src/constants';
import * as Storage from '../src/storage';

vi.mock('../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), verbose: vi.fn() }),
    setLogLevel: vi.fn(),
}));

describe('toProviderSettings', () => {
    it('combines the configuration with the secrets', () => {
        expect(toProviderSettings(ConfigSchema.parse(PRECIS_DEFAULTS), { openaiApiKey: 'test-secret' })).toEqual({
            provider: 'openai',
            apiKey: 'test-secret',
            baseURL: undefined,
            model: PRECIS_DEFAULTS.model,
            transcriptionModel: PRECIS_DEFAULTS.transcriptionModel,
            speechModel: PRECIS_DEFAULTS.speechModel,
            voice: 'alloy',
            speechSpeed: 1,
            speechFormat: 'mp3',
            mockDelayMs: 0,
        });
    });
});

describe('main', () => {
    let workDirectory: string;
    let output: string[];

    beforeEach(async () => {
        workDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'precis-main-'));
        output = [];
        vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
            output.push(String(chunk));
            return true;
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        await fs.rm(workDirectory, { recursive: true, force: true });
    });

    const show = (source: string, ...extra: string[]) => main([
        'node', 'precis', 'show', source,
        '--provider', 'mock',
        '--config-directory', workDirectory,
        '--storage-directory', workDirectory,
        '--temp-directory', workDirectory,
        ...extra,
    ]);

    it('prints what is stored for an episode', async () => {
        await Storage.createLocalMetadataStore({ basePath: workDirectory }).saveEpisode({
            cacheKey: 'abc123',
            originalUrl: 'https://example.com/ep.mp3',
            blobPath: 'episodes/abc123.mp3',
            fileSize: 2048,
            downloadDate: '2026-05-01T08:00:00.000Z',
        });

        await show('abc123');

        expect(process.exitCode).toBeUndefined();
        expect(output.join('')).toBe([
            'Episode:    abc123',
            'Source:     https://example.com/ep.mp3',
            'Audio:      episodes/abc123.mp3 (2,048 bytes)',
            'Downloaded: 2026-05-01T08:00:00.000Z',
            'Summary:    (not processed yet)',
            '',
        ].join('\n'));
    });

    it('prints JSON when asked', async () => {
        await Storage.createLocalMetadataStore({ basePath: workDirectory }).saveEpisode({
            cacheKey: 'abc123',
            originalUrl: 'https://example.com/ep.mp3',
            blobPath: 'episodes/abc123.mp3',
            fileSize: 2048,
            downloadDate: '2026-05-01T08:00:00.000Z',
        });

        await show('abc123', '--json');

        expect(JSON.parse(output.join(''))).toEqual({
            cacheKey: 'abc123',
            originalUrl: 'https://example.com/ep.mp3',
            blobPath: 'episodes/abc123.mp3',
            fileSize: 2048,
            downloadDate: '2026-05-01T08:00:00.000Z',
        });
    });

    it('exits with a failure code for an unknown episode', async () => {
        await show('missing');

        expect(process.exitCode).toBe(1);
        expect(output).toEqual([]);
    });

    it('reports a cached run without touching any backend', async () => {
        const metadata = Storage.createLocalMetadataStore({ basePath: workDirectory });
        const artifacts = Storage.createLocalArtifactStore({ basePath: workDirectory });
        const audio = path.join(workDirectory, 'narration.mp3');
        await fs.writeFile(audio, 'narration');
        await artifacts.uploadFile('summaries', 'abc123_summary.mp3', audio);
        await metadata.saveSummary({
            cacheKey: 'abc123',
            transcriptBlobPath: 'transcripts/abc123_transcript.txt',
            summaryTextBlobPath: 'transcripts/abc123_summary.txt',
            summaryAudioBlobPath: 'summaries/abc123_summary.mp3',
            transcriptWordCount: 5000,
            summaryWordCount: 700,
            processedDate: '2026-05-01T08:10:00.000Z',
        });

        await main([
            'node', 'precis', 'abc123',
            '--provider', 'mock',
            '--config-directory', workDirectory,
            '--storage-directory', workDirectory,
            '--temp-directory', workDirectory,
        ]);

        expect(process.exitCode).toBeUndefined();
        expect(output).toHaveLength(2);
        expect(output[0]).toBe('[100%] Summary retrieved from cache\n');
        const summaryPath = (output[1] ?? '').trimEnd();
        expect(path.dirname(summaryPath)).toBe(workDirectory);
        expect(path.basename(summaryPath)).toMatch(/^audio_abc123_[0-9a-f]{8}_summary\.mp3$/);
    });
});
