/**
 * Capability Providers
 *
 * `resolveCapabilities` is the single place where configured settings and
 * per-request overrides turn into concrete backends.
 */

import OpenAI from 'openai';
import * as OpenAIProvider from './openai';
import * as MockProvider from './mock';
import { Capabilities, ProviderOverrides, ProviderSettings } from './types';

export interface ResolveOptions {
    /** Injected client, mostly for tests. */
    openaiClient?: OpenAI;
}

const SETTING_KEYS = [
    'provider', 'apiKey', 'baseURL', 'model', 'transcriptionModel', 'speechModel',
    'voice', 'speechSpeed', 'speechFormat', 'mockDelayMs',
] as const satisfies ReadonlyArray<keyof ProviderSettings>;

// Drops unset and empty-string overrides so they never mask configured values
const definedOnly = (overrides: ProviderOverrides): ProviderOverrides => {
    const result: ProviderOverrides = {};
    const copy = <K extends keyof ProviderOverrides>(key: K) => {
        const value = overrides[key];
        if (value !== undefined && value !== '') {
            result[key] = value;
        }
    };
    SETTING_KEYS.forEach(copy);
    return result;
};

export const mergeSettings = (settings: ProviderSettings, overrides: ProviderOverrides = {}): ProviderSettings => {
    return { ...settings, ...definedOnly(overrides) };
};

export const hasOverrides = (overrides?: ProviderOverrides): boolean => {
    return overrides !== undefined && Object.keys(definedOnly(overrides)).length > 0;
};

export const sameSettings = (a: ProviderSettings, b: ProviderSettings): boolean => {
    return SETTING_KEYS.every(key => a[key] === b[key]);
};

export const resolveCapabilities = (
    settings: ProviderSettings,
    overrides?: ProviderOverrides,
    options: ResolveOptions = {},
): Capabilities => {
    const merged = mergeSettings(settings, overrides);
    switch (merged.provider) {
        case 'mock':
            return MockProvider.create(merged);
        case 'openai':
            return OpenAIProvider.create(merged, options.openaiClient);
    }
};

export * from './types';
