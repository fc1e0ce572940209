/**
 * HTTP downloader for source episodes. The response body is streamed to disk;
 * a failed or cancelled download leaves no partial file behind.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { CancelledError, DownloadFailedError, PrecisError, errorMessage, throwIfCancelled } from '../errors';

export interface DownloadOptions {
    signal?: AbortSignal;
}

export interface Downloader {
    /** Returns the number of bytes written */
    download(url: string, targetPath: string, options?: DownloadOptions): Promise<number>;
}

export type FetchFunction = typeof fetch;

export const create = (fetchImpl: FetchFunction = fetch): Downloader => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const download = async (url: string, targetPath: string, options: DownloadOptions = {}): Promise<number> => {
        const { signal } = options;
        throwIfCancelled(signal);
        logger.info('Downloading %s', url);

        try {
            const response = await fetchImpl(url, { signal });
            if (!response.ok) {
                throw new DownloadFailedError(`Download of ${url} failed with HTTP ${response.status} ${response.statusText}`);
            }
            if (!response.body) {
                throw new DownloadFailedError(`Download of ${url} returned an empty body`);
            }

            const contentType = response.headers.get('content-type') ?? '';
            if (!contentType.startsWith('audio/')) {
                logger.warn('Unexpected content type for %s: %s', url, contentType || '(none)');
            }

            await storage.createDirectory(path.dirname(targetPath));
            await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(targetPath), { signal });

            const bytes = await storage.getFileSize(targetPath);
            logger.info('Downloaded %d bytes to %s', bytes, targetPath);
            return bytes;
        } catch (error) {
            await storage.deleteFile(targetPath);
            if (signal?.aborted) {
                throw new CancelledError('Download was cancelled', { cause: error });
            }
            if (error instanceof PrecisError) throw error;
            logger.error('Error downloading %s: %s', url, errorMessage(error));
            throw new DownloadFailedError(`Failed to download ${url}: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { download };
};
