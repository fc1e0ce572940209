import { Logger } from 'winston';
import { errorMessage } from '../errors';

export type Cleanup = () => Promise<void> | void;

export interface Scope {
    /** Register a cleanup; cleanups run in reverse registration order. */
    defer(label: string, cleanup: Cleanup): void;
}

/**
 * Run `body` with a scope whose deferred cleanups are guaranteed to run when
 * the body settles: on success, failure and cancellation alike. A cleanup that
 * fails is logged and does not replace the body's own outcome.
 */
export const withScope = async <T>(logger: Logger, body: (scope: Scope) => Promise<T>): Promise<T> => {
    const cleanups: Array<{ label: string; cleanup: Cleanup }> = [];
    const scope: Scope = {
        defer: (label, cleanup) => {
            cleanups.push({ label, cleanup });
        },
    };

    try {
        return await body(scope);
    } finally {
        for (const { label, cleanup } of cleanups.reverse()) {
            try {
                await cleanup();
            } catch (error) {
                logger.warn('Cleanup "%s" failed: %s', label, errorMessage(error));
            }
        }
    }
};
