import crypto from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { CACHE_KEY_LENGTH, deriveKey, isUrl } from '../../src/util/cache-key';
import { InvalidArgumentError } from '../../src/errors';

const sha256 = (value: string) => crypto.createHash('sha256').update(value, 'utf8').digest('hex');

describe('deriveKey', () => {
    it('hashes a URL to the first 32 hex characters of its SHA-256', () => {
        const url = 'https://example.com/ep1.mp3';
        const key = deriveKey(url);
        expect(key).toBe(sha256(url).slice(0, 32));
        expect(key).toMatch(/^[0-9a-f]{32}$/);
        expect(key).toHaveLength(CACHE_KEY_LENGTH);
    });

    it('returns the same key for the same URL', () => {
        expect(deriveKey('http://example.com/a?b=1')).toBe(deriveKey('http://example.com/a?b=1'));
    });

    it('does not normalize URLs', () => {
        expect(deriveKey('https://example.com/ep1/')).not.toBe(deriveKey('https://example.com/ep1'));
        expect(deriveKey('https://Example.com/ep1')).not.toBe(deriveKey('https://example.com/ep1'));
    });

    it('recognizes the scheme case-insensitively but hashes the literal string', () => {
        expect(deriveKey('HTTP://X')).toBe(sha256('HTTP://X').slice(0, 32));
        expect(deriveKey('HTTP://X')).not.toBe(deriveKey('http://x'));
    });

    it('passes anything that is not a URL through unchanged', () => {
        expect(deriveKey('abc123')).toBe('abc123');
        expect(deriveKey('ftp://example.com/file.mp3')).toBe('ftp://example.com/file.mp3');
    });

    it('rejects empty and whitespace-only identifiers', () => {
        expect(() => deriveKey('')).toThrow(InvalidArgumentError);
        expect(() => deriveKey('   ')).toThrow('Source identifier cannot be empty');
    });
});

describe('isUrl', () => {
    it('accepts http and https only', () => {
        expect(isUrl('https://example.com')).toBe(true);
        expect(isUrl('Http://example.com')).toBe(true);
        expect(isUrl('example.com')).toBe(false);
        expect(isUrl('file:///tmp/a.mp3')).toBe(false);
    });
});
