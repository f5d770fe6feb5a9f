import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockCreate, mockConstructor } = vi.hoisted(() => ({
    mockCreate: vi.fn(),
    mockConstructor: vi.fn(),
}));

vi.mock('openai', () => ({
    OpenAI: class {
        chat = { completions: { create: mockCreate } };

        constructor(options: unknown) {
            mockConstructor(options);
        }
    },
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), verbose: vi.fn() }),
}));

import { createCompletionFn } from '../../src/oracle/client';

describe('completion client', () => {
    const config = { apiKey: 'test-secret', model: 'gpt-4o-mini', baseUrl: 'http://localhost:1234/v1', timeout: 5000 };

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('sends one request without retries and trims the reply', async () => {
        mockCreate.mockResolvedValue({ choices: [{ message: { content: '  {"subject": "x"}\n' } }] });
        const complete = createCompletionFn(config);

        const reply = await complete([{ role: 'user', content: 'hello' }]);

        expect(reply).toBe('{"subject": "x"}');
        expect(mockConstructor).toHaveBeenCalledWith({
            apiKey: 'test-secret',
            baseURL: 'http://localhost:1234/v1',
            timeout: 5000,
            maxRetries: 0,
        });
        expect(mockCreate).toHaveBeenCalledWith({
            model: 'gpt-4o-mini',
            messages: [{ role: 'user', content: 'hello' }],
            temperature: 0.3,
            max_tokens: 1000,
        });
    });

    it('creates the client once', async () => {
        mockCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
        const complete = createCompletionFn(config);

        await complete([{ role: 'user', content: 'a' }]);
        await complete([{ role: 'user', content: 'b' }]);

        expect(mockConstructor).toHaveBeenCalledTimes(1);
    });

    it('treats an empty reply as an error', async () => {
        mockCreate.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });
        const complete = createCompletionFn(config);

        await expect(complete([{ role: 'user', content: 'a' }])).rejects.toThrow('No response received from model');
    });

    it('wraps transport errors', async () => {
        mockCreate.mockRejectedValue(new Error('Request timed out.'));
        const complete = createCompletionFn(config);

        await expect(complete([{ role: 'user', content: 'a' }])).rejects.toMatchObject({
            name: 'OracleError',
            message: 'Oracle request failed: Request timed out.',
        });
    });
});
