/**
 * Artifact store on the local filesystem: one directory per container below
 * a base path, one file per blob.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pathToFileURL } from 'node:url';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { NotFoundError, StorageFailedError, errorMessage, throwIfCancelled } from '../errors';
import { ArtifactStore, StoreOptions } from './types';

export interface LocalArtifactConfig {
    basePath: string;
}

export const create = (config: LocalArtifactConfig): ArtifactStore => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const filePath = (container: string, blobName: string): string => {
        const resolved = path.resolve(config.basePath, container, blobName);
        const root = path.resolve(config.basePath, container);
        if (path.dirname(resolved) !== root) {
            throw new StorageFailedError(`Invalid blob name: ${blobName}`);
        }
        return resolved;
    };

    // Runs an operation, translating filesystem errors into the taxonomy
    const guarded = async <T>(description: string, options: StoreOptions, operation: () => Promise<T>): Promise<T> => {
        throwIfCancelled(options.signal);
        try {
            return await operation();
        } catch (error) {
            if (error instanceof NotFoundError || error instanceof StorageFailedError) throw error;
            logger.error('IO error %s: %s', description, errorMessage(error));
            throw new StorageFailedError(`Failed ${description}: ${errorMessage(error)}`, { cause: error });
        }
    };

    const requireFile = async (container: string, blobName: string): Promise<string> => {
        const source = filePath(container, blobName);
        if (!await storage.isFile(source)) {
            throw new NotFoundError(`File not found: ${container}/${blobName}`);
        }
        return source;
    };

    const uploadFile = (container: string, blobName: string, localPath: string, options: StoreOptions = {}): Promise<string> =>
        guarded(`uploading ${localPath} -> ${container}/${blobName}`, options, async () => {
            const target = filePath(container, blobName);
            await storage.copyFile(localPath, target);
            logger.info('Uploaded file: %s/%s', container, blobName);
            return pathToFileURL(target).href;
        });

    const uploadText = (container: string, blobName: string, text: string, options: StoreOptions = {}): Promise<string> =>
        guarded(`uploading ${container}/${blobName}`, options, async () => {
            const target = filePath(container, blobName);
            await storage.writeFile(target, text, 'utf8');
            logger.info('Uploaded file: %s/%s', container, blobName);
            return pathToFileURL(target).href;
        });

    const downloadToFile = (container: string, blobName: string, localPath: string, options: StoreOptions = {}): Promise<void> =>
        guarded(`downloading ${container}/${blobName} -> ${localPath}`, options, async () => {
            const source = await requireFile(container, blobName);
            await storage.copyFile(source, localPath);
            logger.info('Downloaded file: %s/%s -> %s', container, blobName, localPath);
        });

    const readText = (container: string, blobName: string, options: StoreOptions = {}): Promise<string> =>
        guarded(`reading ${container}/${blobName}`, options, async () => {
            const source = await requireFile(container, blobName);
            return storage.readFile(source, 'utf8');
        });

    const readStream = (container: string, blobName: string, options: StoreOptions = {}): Promise<Readable> =>
        guarded(`streaming ${container}/${blobName}`, options, async () => {
            const source = await requireFile(container, blobName);
            return fs.createReadStream(source);
        });

    const exists = (container: string, blobName: string, options: StoreOptions = {}): Promise<boolean> =>
        guarded(`checking ${container}/${blobName}`, options, async () => storage.isFile(filePath(container, blobName)));

    const remove = (container: string, blobName: string, options: StoreOptions = {}): Promise<void> =>
        guarded(`deleting ${container}/${blobName}`, options, async () => {
            const target = filePath(container, blobName);
            if (await storage.exists(target)) {
                await storage.deleteFile(target);
                logger.info('Deleted file: %s/%s', container, blobName);
            }
        });

    const getSize = (container: string, blobName: string, options: StoreOptions = {}): Promise<number> =>
        guarded(`sizing ${container}/${blobName}`, options, async () => {
            const source = await requireFile(container, blobName);
            return storage.getFileSize(source);
        });

    return {
        uploadFile,
        uploadText,
        downloadToFile,
        readText,
        readStream,
        exists,
        delete: remove,
        getSize,
    };
};

