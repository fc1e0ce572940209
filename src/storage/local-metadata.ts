/**
 * Metadata store that keeps one JSON document per record under
 * `{basePath}/metadata/{episodes|summaries}/{key}.json`. Records are validated
 * with zod when they are written and when they are read back.
 */

import * as path from 'node:path';
import { z } from 'zod';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { METADATA_DIRECTORY } from '../constants';
import { PrecisError, StorageFailedError, errorMessage, throwIfCancelled } from '../errors';
import {
    EpisodeRecord,
    EpisodeRecordSchema,
    MetadataStore,
    StoreOptions,
    SummaryRecord,
    SummaryRecordSchema,
} from './types';

export interface LocalMetadataConfig {
    basePath: string;
}

type RecordKind = 'episodes' | 'summaries';

const formatIssues = (error: z.ZodError): string =>
    error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const create = (config: LocalMetadataConfig): MetadataStore => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const recordPath = (kind: RecordKind, cacheKey: string): string => {
        const root = path.resolve(config.basePath, METADATA_DIRECTORY, kind);
        const resolved = path.resolve(root, `${cacheKey}.json`);
        if (path.dirname(resolved) !== root) {
            throw new StorageFailedError(`Invalid cache key: ${cacheKey}`);
        }
        return resolved;
    };

    const guarded = async <T>(description: string, options: StoreOptions, operation: () => Promise<T>): Promise<T> => {
        throwIfCancelled(options.signal);
        try {
            return await operation();
        } catch (error) {
            if (error instanceof PrecisError) throw error;
            logger.error('Metadata error %s: %s', description, errorMessage(error));
            throw new StorageFailedError(`Failed ${description}: ${errorMessage(error)}`, { cause: error });
        }
    };

    const read = <T>(kind: RecordKind, schema: z.ZodType<T>, cacheKey: string, options: StoreOptions): Promise<T | null> =>
        guarded(`reading ${kind} record ${cacheKey}`, options, async () => {
            const file = recordPath(kind, cacheKey);
            if (!await storage.isFile(file)) {
                return null;
            }
            const raw: unknown = JSON.parse(await storage.readFile(file, 'utf8'));
            const parsed = schema.safeParse(raw);
            if (!parsed.success) {
                throw new StorageFailedError(`Corrupt ${kind} record ${cacheKey}: ${formatIssues(parsed.error)}`);
            }
            return parsed.data;
        });

    const write = <T>(kind: RecordKind, schema: z.ZodType<T>, cacheKey: string, record: T, options: StoreOptions): Promise<void> =>
        guarded(`saving ${kind} record ${cacheKey}`, options, async () => {
            const parsed = schema.safeParse(record);
            if (!parsed.success) {
                throw new StorageFailedError(`Invalid ${kind} record ${cacheKey}: ${formatIssues(parsed.error)}`);
            }
            await storage.writeFile(recordPath(kind, cacheKey), JSON.stringify(parsed.data, null, 2), 'utf8');
            logger.debug('Saved %s record for %s', kind, cacheKey);
        });

    const has = (kind: RecordKind, cacheKey: string, options: StoreOptions): Promise<boolean> =>
        guarded(`checking ${kind} record ${cacheKey}`, options, async () => storage.isFile(recordPath(kind, cacheKey)));

    const remove = (kind: RecordKind, cacheKey: string, options: StoreOptions): Promise<void> =>
        guarded(`deleting ${kind} record ${cacheKey}`, options, async () => {
            await storage.deleteFile(recordPath(kind, cacheKey));
        });

    return {
        getEpisode: (cacheKey, options = {}) => read<EpisodeRecord>('episodes', EpisodeRecordSchema, cacheKey, options),
        saveEpisode: (record, options = {}) => write<EpisodeRecord>('episodes', EpisodeRecordSchema, record.cacheKey, record, options),
        episodeExists: (cacheKey, options = {}) => has('episodes', cacheKey, options),
        deleteEpisode: (cacheKey, options = {}) => remove('episodes', cacheKey, options),
        getSummary: (cacheKey, options = {}) => read<SummaryRecord>('summaries', SummaryRecordSchema, cacheKey, options),
        saveSummary: (record, options = {}) => write<SummaryRecord>('summaries', SummaryRecordSchema, record.cacheKey, record, options),
        summaryExists: (cacheKey, options = {}) => has('summaries', cacheKey, options),
        deleteSummary: (cacheKey, options = {}) => remove('summaries', cacheKey, options),
    };
};
