import { CancelledError, throwIfCancelled } from '../errors';

export type Release = () => void;

interface Waiter {
    resolve: (release: Release) => void;
    reject: (error: unknown) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

export interface SemaphoreInstance {
    acquire(signal?: AbortSignal): Promise<Release>;
    run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T>;
    capacity(): number;
    inUse(): number;
    waiting(): number;
}

/**
 * Counting semaphore. Permits are handed out in FIFO order; a waiter whose
 * signal fires is removed from the queue and rejected with CancelledError.
 */
export const create = (permits: number): SemaphoreInstance => {
    if (!Number.isInteger(permits) || permits < 1) {
        throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }

    let held = 0;
    const queue: Waiter[] = [];

    const makeRelease = (): Release => {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = queue.shift();
            if (next) {
                // hand the permit straight over; `held` stays the same
                if (next.signal && next.onAbort) {
                    next.signal.removeEventListener('abort', next.onAbort);
                }
                next.resolve(makeRelease());
            } else {
                held--;
            }
        };
    };

    const acquire = (signal?: AbortSignal): Promise<Release> => {
        throwIfCancelled(signal);

        if (held < permits) {
            held++;
            return Promise.resolve(makeRelease());
        }

        return new Promise<Release>((resolve, reject) => {
            const waiter: Waiter = { resolve, reject, signal };
            if (signal) {
                waiter.onAbort = () => {
                    const index = queue.indexOf(waiter);
                    if (index >= 0) queue.splice(index, 1);
                    reject(new CancelledError('Cancelled while waiting for a permit', { cause: signal.reason }));
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            queue.push(waiter);
        });
    };

    const run = async <T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
        const release = await acquire(signal);
        try {
            throwIfCancelled(signal);
            return await task();
        } finally {
            release();
        }
    };

    return {
        acquire,
        run,
        capacity: () => permits,
        inUse: () => held,
        waiting: () => queue.length,
    };
};
