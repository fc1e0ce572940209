import ffmpeg from 'fluent-ffmpeg';
import { Logger } from 'winston';
import * as Storage from './storage';
import { ClipFailedError, ProbeFailedError, errorMessage, throwIfCancelled } from '../errors';

export interface Media {
    getDuration: (filePath: string) => Promise<number>;
    getFileSize: (filePath: string) => Promise<number>;
    clip: (filePath: string, start: number, length: number, outputPath: string, signal?: AbortSignal) => Promise<string>;
}

const ffprobeAsync = (filePath: string): Promise<ffmpeg.FfprobeData> => {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err: Error | null, metadata: ffmpeg.FfprobeData) => {
            if (err) return reject(err);
            resolve(metadata);
        });
    });
};

export const create = (logger: Logger): Media => {
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    // Total duration in seconds, from the container's format section
    const getDuration = async (filePath: string): Promise<number> => {
        let metadata: ffmpeg.FfprobeData;
        try {
            metadata = await ffprobeAsync(filePath);
        } catch (error) {
            logger.error('Error probing audio file %s: %s', filePath, errorMessage(error));
            throw new ProbeFailedError(`Failed to probe duration of ${filePath}: ${errorMessage(error)}`, { cause: error });
        }

        const duration = Number(metadata.format.duration);
        if (!Number.isFinite(duration) || duration <= 0) {
            throw new ProbeFailedError(`Failed to parse audio duration of ${filePath}: ${metadata.format.duration}`);
        }

        logger.debug('Audio duration of %s: %d seconds', filePath, duration);
        return duration;
    };

    const getFileSize = async (filePath: string): Promise<number> => {
        try {
            return await storage.getFileSize(filePath);
        } catch (error) {
            logger.error('Error getting file size: %s', errorMessage(error));
            throw new Error(`Failed to get file size for ${filePath}: ${errorMessage(error)}`, { cause: error });
        }
    };

    // Lossless cut: the audio stream is copied, never re-encoded
    const clip = async (filePath: string, start: number, length: number, outputPath: string, signal?: AbortSignal): Promise<string> => {
        throwIfCancelled(signal);

        return new Promise<string>((resolve, reject) => {
            const command = ffmpeg(filePath)
                .setStartTime(start)
                .setDuration(length)
                .audioCodec('copy')
                .outputOptions('-y')
                .output(outputPath);

            const onAbort = () => {
                command.kill('SIGKILL');
            };
            signal?.addEventListener('abort', onAbort, { once: true });

            command
                .on('end', () => {
                    signal?.removeEventListener('abort', onAbort);
                    logger.debug('Created clip %s (start: %ds, length: %ds)', outputPath, start, length);
                    resolve(outputPath);
                })
                .on('error', (err: Error) => {
                    signal?.removeEventListener('abort', onAbort);
                    logger.error('Error creating clip %s: %s', outputPath, err.message);
                    reject(new ClipFailedError(`Failed to clip ${filePath} at ${start}s: ${err.message}`, { cause: err }));
                })
                .run();
        });
    };

    return {
        getDuration,
        getFileSize,
        clip,
    };
};
