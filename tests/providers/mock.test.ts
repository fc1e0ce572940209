import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as MockProvider from '../../src/providers/mock';
import { CancelledError } from '../../src/errors';
import { TEST_SETTINGS } from '../support/fakes';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

describe('Mock provider', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'precis-mock-'));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('returns a canned transcript naming the file', async () => {
        const capabilities = MockProvider.create(TEST_SETTINGS);
        expect(await capabilities.transcription.transcribe('/audio/ep1.mp3')).toBe('This is a mock transcript of ep1.mp3.');
    });

    it('echoes the first 120 words of the last message', async () => {
        const capabilities = MockProvider.create(TEST_SETTINGS);
        const long = Array.from({ length: 200 }, (_, i) => `w${i}`).join(' ');

        const summary = await capabilities.summarization.complete([
            { role: 'system', content: 'ignored' },
            { role: 'user', content: long },
        ]);

        expect(summary.split(' ')).toHaveLength(120);
        expect(summary.startsWith('w0 w1 w2')).toBe(true);
    });

    it('writes a silent MP3 for speech', async () => {
        const capabilities = MockProvider.create(TEST_SETTINGS);
        const output = path.join(root, 'out', 'summary.mp3');

        expect(await capabilities.speech.synthesize('hello', output)).toBe(output);
        expect(await fs.readFile(output)).toEqual(MockProvider.SILENT_MP3);
    });

    it('honors cancellation during its delay', async () => {
        const capabilities = MockProvider.create({ ...TEST_SETTINGS, mockDelayMs: 1000 });
        const controller = new AbortController();

        const pending = capabilities.transcription.transcribe('/audio/ep1.mp3', { signal: controller.signal });
        controller.abort();

        await expect(pending).rejects.toThrow();
        await expect(capabilities.transcription.transcribe('/audio/ep1.mp3', { signal: controller.signal })).rejects.toThrow(CancelledError);
    });
});
