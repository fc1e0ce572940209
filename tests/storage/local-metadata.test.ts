import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLocalMetadataStore } from '../../src/storage';
import { EpisodeRecord, MetadataStore, SummaryRecord } from '../../src/storage/types';
import { StorageFailedError } from '../../src/errors';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const episode: EpisodeRecord = {
    cacheKey: 'abc',
    originalUrl: 'https://example.com/ep1.mp3',
    blobPath: 'episodes/abc.mp3',
    fileSize: 2048,
    downloadDate: '2026-01-02T03:04:05.000Z',
};

const summary: SummaryRecord = {
    cacheKey: 'abc',
    transcriptBlobPath: 'transcripts/abc_transcript.txt',
    summaryTextBlobPath: 'transcripts/abc_summary.txt',
    summaryAudioBlobPath: 'summaries/abc_summary.mp3',
    transcriptWordCount: 5000,
    summaryWordCount: 740,
    processedDate: '2026-01-02T03:14:05.000Z',
};

describe('Local metadata store', () => {
    let root: string;
    let store: MetadataStore;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'precis-metadata-'));
        store = createLocalMetadataStore({ basePath: root });
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('saves episode records as JSON under metadata/episodes', async () => {
        await store.saveEpisode(episode);

        const raw = JSON.parse(await fs.readFile(path.join(root, 'metadata', 'episodes', 'abc.json'), 'utf8'));
        expect(raw).toEqual(episode);
        expect(await store.getEpisode('abc')).toEqual(episode);
        expect(await store.episodeExists('abc')).toBe(true);
    });

    it('keeps summaries apart from episodes', async () => {
        await store.saveSummary(summary);

        expect(await store.getSummary('abc')).toEqual(summary);
        expect(await store.summaryExists('abc')).toBe(true);
        expect(await store.episodeExists('abc')).toBe(false);
        expect(await store.getEpisode('abc')).toBeNull();
    });

    it('deletes records', async () => {
        await store.saveEpisode(episode);
        await store.saveSummary(summary);

        await store.deleteEpisode('abc');
        await store.deleteSummary('abc');

        expect(await store.episodeExists('abc')).toBe(false);
        expect(await store.summaryExists('abc')).toBe(false);
    });

    it('rejects a corrupt record on read', async () => {
        await fs.mkdir(path.join(root, 'metadata', 'summaries'), { recursive: true });
        await fs.writeFile(path.join(root, 'metadata', 'summaries', 'abc.json'), JSON.stringify({ cacheKey: 'abc' }));

        await expect(store.getSummary('abc')).rejects.toThrow(StorageFailedError);
    });

    it('rejects an invalid record on write', async () => {
        await expect(store.saveEpisode({ ...episode, fileSize: -1 })).rejects.toThrow(StorageFailedError);
        expect(await store.episodeExists('abc')).toBe(false);
    });
});
