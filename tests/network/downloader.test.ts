import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as Downloader from '../../src/network/downloader';
import { CancelledError, DownloadFailedError } from '../../src/errors';

const logger = vi.hoisted(() => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() }));

vi.mock('../../src/logging', () => ({
    getLogger: () => logger,
}));

describe('Downloader', () => {
    let root: string;
    let target: string;

    beforeEach(async () => {
        vi.clearAllMocks();
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'precis-download-'));
        target = path.join(root, 'nested', 'audio_abc.mp3');
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('streams the body to the target and returns the byte count', async () => {
        const fetchImpl = vi.fn(async () => new Response('0123456789', { headers: { 'content-type': 'audio/mpeg' } }));
        const downloader = Downloader.create(fetchImpl);

        const bytes = await downloader.download('https://example.com/ep1.mp3', target);

        expect(bytes).toBe(10);
        expect(await fs.readFile(target, 'utf8')).toBe('0123456789');
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('warns about a non-audio content type but keeps the file', async () => {
        const fetchImpl = vi.fn(async () => new Response('<html>', { headers: { 'content-type': 'text/html' } }));

        await Downloader.create(fetchImpl).download('https://example.com/page', target);

        expect(logger.warn).toHaveBeenCalledWith('Unexpected content type for %s: %s', 'https://example.com/page', 'text/html');
        expect(await fs.readFile(target, 'utf8')).toBe('<html>');
    });

    it('fails on an HTTP error status without leaving a file', async () => {
        const fetchImpl = vi.fn(async () => new Response('gone', { status: 404, statusText: 'Not Found' }));

        await expect(Downloader.create(fetchImpl).download('https://example.com/ep1.mp3', target))
            .rejects.toThrow(new DownloadFailedError('Download of https://example.com/ep1.mp3 failed with HTTP 404 Not Found'));
        await expect(fs.stat(target)).rejects.toThrow();
    });

    it('wraps network errors', async () => {
        const fetchImpl = vi.fn(async (): Promise<Response> => {
            throw new TypeError('fetch failed');
        });

        await expect(Downloader.create(fetchImpl).download('https://example.com/ep1.mp3', target))
            .rejects.toThrow(new DownloadFailedError('Failed to download https://example.com/ep1.mp3: fetch failed'));
    });

    it('removes the partial file when the body fails midway', async () => {
        const body = new ReadableStream<Uint8Array>({
            start(controller) {
                controller.enqueue(new TextEncoder().encode('partial'));
                controller.error(new Error('connection reset'));
            },
        });
        const fetchImpl = vi.fn(async () => new Response(body, { headers: { 'content-type': 'audio/mpeg' } }));

        await expect(Downloader.create(fetchImpl).download('https://example.com/ep1.mp3', target)).rejects.toThrow(DownloadFailedError);
        await expect(fs.stat(target)).rejects.toThrow();
    });

    it('reports cancellation', async () => {
        const controller = new AbortController();
        const fetchImpl = vi.fn(async (): Promise<Response> => {
            controller.abort();
            throw new DOMException('This operation was aborted', 'AbortError');
        });

        await expect(Downloader.create(fetchImpl).download('https://example.com/ep1.mp3', target, { signal: controller.signal }))
            .rejects.toThrow(CancelledError);
    });
});
