import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { create } from '../../src/providers/openai';
import { CancelledError, ConfigurationError, SummarizationFailedError, TranscriptionFailedError } from '../../src/errors';
import { TEST_SETTINGS } from '../support/fakes';

const mocks = vi.hoisted(() => ({
    transcriptionsCreate: vi.fn(),
    chatCreate: vi.fn(),
    speechCreate: vi.fn(),
    constructed: vi.fn(),
}));

vi.mock('openai', () => ({
    default: class MockOpenAI {
        audio = {
            transcriptions: { create: mocks.transcriptionsCreate },
            speech: { create: mocks.speechCreate },
        };
        chat = { completions: { create: mocks.chatCreate } };
        constructor(options: unknown) {
            mocks.constructed(options);
        }
    },
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const settings = { ...TEST_SETTINGS, provider: 'openai' as const, baseURL: 'http://localhost:9999/v1' };

describe('OpenAI provider', () => {
    let root: string;

    beforeEach(async () => {
        vi.clearAllMocks();
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'precis-openai-'));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('creates the client once, with the configured key and endpoint', async () => {
        mocks.chatCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
        const capabilities = create(settings);

        await capabilities.summarization.complete([{ role: 'user', content: 'a' }]);
        await capabilities.summarization.complete([{ role: 'user', content: 'b' }]);

        expect(mocks.constructed).toHaveBeenCalledTimes(1);
        expect(mocks.constructed).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: 'http://localhost:9999/v1' });
    });

    it('transcribes with the configured model', async () => {
        const audio = path.join(root, 'chunk_000.mp3');
        await fs.writeFile(audio, 'audio');
        mocks.transcriptionsCreate.mockResolvedValue({ text: 'hello there' });

        const text = await create(settings).transcription.transcribe(audio);

        expect(text).toBe('hello there');
        const [params, options] = mocks.transcriptionsCreate.mock.calls[0] ?? [];
        expect(params).toMatchObject({ model: 'test-transcriber', response_format: 'json', temperature: 0 });
        expect(options).toEqual({ signal: undefined });
    });

    it('wraps transcription failures', async () => {
        const audio = path.join(root, 'chunk_000.mp3');
        await fs.writeFile(audio, 'audio');
        mocks.transcriptionsCreate.mockRejectedValue(new Error('413 Payload Too Large'));

        await expect(create(settings).transcription.transcribe(audio))
            .rejects.toThrow(new TranscriptionFailedError('Failed to transcribe chunk_000.mp3: 413 Payload Too Large'));
    });

    it('passes messages and temperature to chat completions', async () => {
        mocks.chatCreate.mockResolvedValue({ choices: [{ message: { content: 'the summary' } }] });
        const messages = [{ role: 'system' as const, content: 'sys' }, { role: 'user' as const, content: 'usr' }];

        const result = await create(settings).summarization.complete(messages, { temperature: 1 });

        expect(result).toBe('the summary');
        expect(mocks.chatCreate).toHaveBeenCalledWith({ model: 'test-model', messages, temperature: 1 }, { signal: undefined });
    });

    it('rejects an empty completion', async () => {
        mocks.chatCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

        await expect(create(settings).summarization.complete([{ role: 'user', content: 'x' }]))
            .rejects.toThrow(new SummarizationFailedError('No response received from the completion model'));
    });

    it('reports a call aborted mid-flight as cancelled', async () => {
        const controller = new AbortController();
        mocks.chatCreate.mockImplementation(async () => {
            controller.abort();
            throw new Error('Request was aborted.');
        });

        await expect(create(settings).summarization.complete([{ role: 'user', content: 'x' }], { signal: controller.signal }))
            .rejects.toThrow(CancelledError);
    });

    it('writes synthesized speech to the output path', async () => {
        mocks.speechCreate.mockResolvedValue({ arrayBuffer: async () => new Uint8Array([1, 2, 3]).buffer });
        const output = path.join(root, 'summary.mp3');

        await create(settings).speech.synthesize('Hello', output);

        expect([...await fs.readFile(output)]).toEqual([1, 2, 3]);
        expect(mocks.speechCreate).toHaveBeenCalledWith({
            model: 'test-speaker',
            voice: 'alloy',
            input: 'Hello',
            response_format: 'mp3',
            speed: 1,
        }, { signal: undefined });
    });

    it('rejects a voice the backend does not offer', async () => {
        await expect(create({ ...settings, voice: 'robot' }).speech.synthesize('Hello', path.join(root, 'x.mp3')))
            .rejects.toThrow(ConfigurationError);
        expect(mocks.speechCreate).not.toHaveBeenCalled();
    });
});
