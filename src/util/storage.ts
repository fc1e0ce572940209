import * as fs from 'node:fs';
import * as path from 'node:path';

export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    isDirectoryWritable: (path: string) => Promise<boolean>;
    createDirectory: (path: string) => Promise<void>;
    createTempDirectory: (parent: string, prefix: string) => Promise<string>;
    deleteDirectory: (path: string) => Promise<void>;
    deleteFile: (path: string) => Promise<void>;
    getFileSize: (path: string) => Promise<number>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    writeFile: (path: string, data: string | Buffer, encoding?: BufferEncoding) => Promise<void>;
    copyFile: (source: string, destination: string) => Promise<void>;
    readStream: (path: string) => Promise<fs.ReadStream>;
    writeStream: (path: string) => Promise<fs.WriteStream>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => undefined);

    const exists = async (target: string): Promise<boolean> => {
        try {
            await fs.promises.stat(target);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (target: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(target);
            return stats.isDirectory();
        } catch {
            return false;
        }
    };

    const isFile = async (target: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(target);
            return stats.isFile();
        } catch {
            return false;
        }
    };

    const isDirectoryWritable = async (target: string): Promise<boolean> => {
        if (!await isDirectory(target)) {
            log('%s is not a directory', target);
            return false;
        }
        try {
            await fs.promises.access(target, fs.constants.W_OK);
            return true;
        } catch {
            log('%s is not writable', target);
            return false;
        }
    };

    const createDirectory = async (target: string): Promise<void> => {
        await fs.promises.mkdir(target, { recursive: true });
    };

    // mkdtemp appends a random suffix, so concurrent runs never share a directory
    const createTempDirectory = async (parent: string, prefix: string): Promise<string> => {
        await createDirectory(parent);
        const created = await fs.promises.mkdtemp(path.join(parent, prefix));
        log('Created temporary directory %s', created);
        return created;
    };

    const deleteDirectory = async (target: string): Promise<void> => {
        await fs.promises.rm(target, { recursive: true, force: true });
        log('Deleted directory %s', target);
    };

    const deleteFile = async (target: string): Promise<void> => {
        await fs.promises.rm(target, { force: true });
    };

    const getFileSize = async (target: string): Promise<number> => {
        const stats = await fs.promises.stat(target);
        return stats.size;
    };

    const readFile = async (target: string, encoding: BufferEncoding): Promise<string> => {
        return await fs.promises.readFile(target, { encoding });
    };

    const writeFile = async (target: string, data: string | Buffer, encoding?: BufferEncoding): Promise<void> => {
        await createDirectory(path.dirname(target));
        await fs.promises.writeFile(target, data, { encoding });
    };

    const copyFile = async (source: string, destination: string): Promise<void> => {
        await createDirectory(path.dirname(destination));
        await fs.promises.copyFile(source, destination);
    };

    const readStream = async (target: string): Promise<fs.ReadStream> => {
        return fs.createReadStream(target);
    };

    const writeStream = async (target: string): Promise<fs.WriteStream> => {
        await createDirectory(path.dirname(target));
        return fs.createWriteStream(target);
    };

    return {
        exists,
        isDirectory,
        isFile,
        isDirectoryWritable,
        createDirectory,
        createTempDirectory,
        deleteDirectory,
        deleteFile,
        getFileSize,
        readFile,
        writeFile,
        copyFile,
        readStream,
        writeStream,
    };
};
