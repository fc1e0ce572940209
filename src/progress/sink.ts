/**
 * Progress sinks
 *
 * The pipeline reports through a plain callback. The helpers here adapt a
 * consumer to that callback: `createQueuedSink` decouples a slow or failing
 * consumer from the run, and `createNdjsonSink` writes one JSON object per
 * line to a stream.
 */

import { Writable } from 'node:stream';
import * as Logging from '../logging';
import { DEFAULT_PROGRESS_QUEUE_SIZE } from '../constants';
import { errorMessage } from '../errors';
import { ProcessingStatus, isTerminal } from '../pipeline/status';

export type ProgressSink = (status: ProcessingStatus) => void | Promise<void>;

export interface QueuedSinkOptions {
    maxPending?: number;
    /** Aborted when the target fails, so that a gone consumer cancels the run */
    controller?: AbortController;
}

export interface QueuedSink {
    /** Never blocks: the event is delivered now if the target is idle, queued otherwise */
    sink: (status: ProcessingStatus) => void;
    /** Resolves once every accepted event has been delivered or dropped */
    flush(): Promise<void>;
    dropped(): number;
    isDisconnected(): boolean;
}

export const createQueuedSink = (target: ProgressSink, options: QueuedSinkOptions = {}): QueuedSink => {
    const logger = Logging.getLogger();
    const maxPending = options.maxPending ?? DEFAULT_PROGRESS_QUEUE_SIZE;
    if (!Number.isInteger(maxPending) || maxPending < 1) {
        throw new RangeError(`maxPending must be a positive integer, got ${maxPending}`);
    }

    const pending: ProcessingStatus[] = [];
    let busy = false;
    let idle: Promise<void> = Promise.resolve();
    let droppedCount = 0;
    let disconnected = false;

    const disconnect = (error: unknown) => {
        disconnected = true;
        pending.length = 0;
        logger.warn('Progress consumer disconnected: %s', errorMessage(error));
        options.controller?.abort(error);
    };

    // A synchronous target is called inline; only a pending promise makes later events wait
    const drain = async (): Promise<void> => {
        busy = true;
        try {
            while (pending.length > 0 && !disconnected) {
                const next = pending.shift();
                if (!next) break;
                try {
                    const delivered = target(next);
                    if (delivered instanceof Promise) {
                        await delivered;
                    }
                } catch (error) {
                    disconnect(error);
                }
            }
        } finally {
            busy = false;
        }
    };

    const enqueue = (status: ProcessingStatus): void => {
        if (disconnected) return;
        pending.push(status);

        while (pending.length > maxPending) {
            const index = pending.findIndex(event => !isTerminal(event.stage));
            if (index < 0) break;
            pending.splice(index, 1);
            droppedCount++;
        }

        if (!busy) {
            idle = drain();
        }
    };

    const flush = async (): Promise<void> => {
        while (busy) {
            await idle;
        }
    };

    return {
        sink: enqueue,
        flush,
        dropped: () => droppedCount,
        isDisconnected: () => disconnected,
    };
};

export const createNdjsonSink = (stream: Writable): ProgressSink => {
    return (status) => new Promise<void>((resolve, reject) => {
        stream.write(`${JSON.stringify(status)}\n`, (error) => {
            if (error) reject(error);
            else resolve();
        });
    });
};
