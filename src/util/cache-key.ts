import crypto from 'node:crypto';
import { InvalidArgumentError } from '../errors';

export const CACHE_KEY_LENGTH = 32;

export const isUrl = (identifier: string): boolean => {
    const lower = identifier.toLowerCase();
    return lower.startsWith('http://') || lower.startsWith('https://');
};

/**
 * Map a source identifier onto the key every cached artifact is stored under.
 *
 * URLs are hashed exactly as given (scheme, case, query string and trailing
 * slash all count), so callers must pass the original URL to hit the cache.
 * Anything that is not a URL is taken to be a key already and is returned
 * unchanged.
 */
export const deriveKey = (identifier: string): string => {
    if (identifier.trim() === '') {
        throw new InvalidArgumentError('Source identifier cannot be empty');
    }

    if (!isUrl(identifier)) {
        return identifier;
    }

    return crypto
        .createHash('sha256')
        .update(identifier, 'utf8')
        .digest('hex')
        .slice(0, CACHE_KEY_LENGTH);
};
