import { text } from 'node:stream/consumers';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import * as Query from '../../src/pipeline/query';
import { DEFAULT_CONTAINERS } from '../../src/constants';
import { NotFoundError } from '../../src/errors';
import { deriveKey } from '../../src/util/cache-key';
import { createMemoryArtifactStore, createMemoryMetadataStore } from '../support/fakes';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const EPISODE_URL = 'https://example.com/ep2.mp3';
const KEY = deriveKey(EPISODE_URL);

describe('Pipeline query', () => {
    let artifacts: ReturnType<typeof createMemoryArtifactStore>;
    let metadata: ReturnType<typeof createMemoryMetadataStore>;
    let query: Query.QueryInstance;

    beforeEach(async () => {
        artifacts = createMemoryArtifactStore();
        metadata = createMemoryMetadataStore();
        query = Query.create({ artifacts: artifacts.store, metadata: metadata.store, containers: { ...DEFAULT_CONTAINERS } });

        await metadata.store.saveEpisode({
            cacheKey: KEY,
            originalUrl: EPISODE_URL,
            blobPath: `episodes/${KEY}.mp3`,
            fileSize: 4,
            downloadDate: '2026-03-01T10:00:00.000Z',
        });
        await artifacts.store.uploadText('episodes', `${KEY}.mp3`, 'RIFF');
    });

    const storeSummary = async () => {
        await artifacts.store.uploadText('transcripts', `${KEY}_summary.txt`, '"Three short points."\n');
        await artifacts.store.uploadText('summaries', `${KEY}_summary.mp3`, 'narration');
        await metadata.store.saveSummary({
            cacheKey: KEY,
            transcriptBlobPath: `transcripts/${KEY}_transcript.txt`,
            summaryTextBlobPath: `transcripts/${KEY}_summary.txt`,
            summaryAudioBlobPath: `summaries/${KEY}_summary.mp3`,
            transcriptWordCount: 1200,
            summaryWordCount: 3,
            processedDate: '2026-03-01T10:05:00.000Z',
        });
    };

    it('returns the episode record alone before a summary exists', async () => {
        expect(await query.getResult(EPISODE_URL)).toEqual({
            cacheKey: KEY,
            originalUrl: EPISODE_URL,
            blobPath: `episodes/${KEY}.mp3`,
            fileSize: 4,
            downloadDate: '2026-03-01T10:00:00.000Z',
        });
    });

    it('includes the trimmed summary text once processed', async () => {
        await storeSummary();

        const result = await query.getResult(KEY);

        expect(result.summary).toEqual({
            text: 'Three short points',
            transcriptWordCount: 1200,
            summaryWordCount: 3,
            audioBlobPath: `summaries/${KEY}_summary.mp3`,
            processedDate: '2026-03-01T10:05:00.000Z',
        });
    });

    it('fails for an unknown episode', async () => {
        await expect(query.getResult('missing-key')).rejects.toThrow(new NotFoundError('Episode not found: missing-key'));
    });

    it('streams stored audio', async () => {
        await storeSummary();

        expect(await text(await query.getEpisodeStream(EPISODE_URL))).toBe('RIFF');
        expect(await text(await query.getSummaryStream(EPISODE_URL))).toBe('narration');
    });

    it('refuses to stream a summary that was never produced', async () => {
        await expect(query.getSummaryStream(EPISODE_URL)).rejects.toThrow(new NotFoundError(`Summary not found: ${KEY}`));
    });

    it('reports what is cached', async () => {
        expect(await query.isEpisodeCached(EPISODE_URL)).toBe(true);
        expect(await query.isSummaryCached(EPISODE_URL)).toBe(false);

        await storeSummary();

        expect(await query.isSummaryCached(KEY)).toBe(true);
        expect(await query.isEpisodeCached('https://example.com/other.mp3')).toBe(false);
    });
});
