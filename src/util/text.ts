/**
 * Count words by splitting on whitespace and discarding empty tokens.
 */
export const countWords = (text: string): number => {
    return text.split(/\s+/).filter(token => token.length > 0).length;
};

/**
 * Trim leading and trailing characters that are neither letters nor digits.
 * Model output often arrives wrapped in quotes or markdown emphasis.
 */
export const trimNonAlphanumeric = (text: string): string => {
    return text.replace(/^[^\p{L}\p{N}]+/u, '').replace(/[^\p{L}\p{N}]+$/u, '');
};

export const formatCount = (count: number): string => count.toLocaleString('en-US');
