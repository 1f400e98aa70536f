/**
 * Unit tests for Ollama Client
 *
 * fetch is replaced with a Jest spy; no Ollama instance is contacted.
 */

import {
    AuthenticationError,
    InvalidModelRequestError,
    ModelNotFoundError,
    RateLimitError,
    TimeoutError,
    TransientNetworkError,
} from '../../errors';
import { OllamaClient } from '../ollamaClient';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

describe('OllamaClient', () => {
    let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;
    const client = new OllamaClient({
        baseUrl: 'http://ollama.test',
        chatModel: 'test-chat',
        embeddingModel: 'test-embed',
    });

    beforeEach(() => {
        fetchSpy = jest.spyOn(globalThis, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('complete', () => {
        it('should send the prompt as system message, then history, then input', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ message: { content: 'RAG is retrieval.' } }));

            const answer = await client.complete('You answer questions.', {
                history: [
                    { role: 'user', content: 'Hi' },
                    { role: 'assistant', content: 'Hello' },
                ],
                input: 'What is RAG?',
            });

            expect(answer).toBe('RAG is retrieval.');
            const [url, init] = fetchSpy.mock.calls[0] ?? [];
            expect(url).toBe('http://ollama.test/api/chat');
            expect(JSON.parse(String(init?.body))).toEqual({
                model: 'test-chat',
                messages: [
                    { role: 'system', content: 'You answer questions.' },
                    { role: 'user', content: 'Hi' },
                    { role: 'assistant', content: 'Hello' },
                    { role: 'user', content: 'What is RAG?' },
                ],
                stream: false,
                options: { temperature: 0 },
            });
        });

        it('should return an empty string when the reply has no content', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({}));

            await expect(client.complete('p', { history: [], input: 'q' })).resolves.toBe('');
        });

        it('should ask for JSON output when requested', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ message: { content: '{}' } }));

            await client.complete('p', { history: [], input: 'q' }, { format: 'json' });

            const [, init] = fetchSpy.mock.calls[0] ?? [];
            expect(JSON.parse(String(init?.body))).toMatchObject({ format: 'json', stream: false });
        });

        it('should abort the request when the caller\'s signal fires', async () => {
            let requestSignal: AbortSignal | null | undefined;
            fetchSpy.mockImplementation(
                (_url, init) =>
                    new Promise<Response>((_resolve, reject) => {
                        requestSignal = init?.signal;
                        init?.signal?.addEventListener('abort', () => {
                            const abort = new Error('This operation was aborted');
                            abort.name = 'AbortError';
                            reject(abort);
                        });
                    })
            );
            const caller = new AbortController();

            const pending = client.complete(
                'p',
                { history: [], input: 'q' },
                { signal: caller.signal }
            );
            caller.abort();

            await expect(pending).rejects.toThrow(new TimeoutError('Request cancelled by caller'));
            expect(requestSignal?.aborted).toBe(true);
        });
    });

    describe('embed', () => {
        it('should return the embedding vector', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));

            await expect(client.embed('RAG')).resolves.toEqual([0.1, 0.2, 0.3]);
            const [url, init] = fetchSpy.mock.calls[0] ?? [];
            expect(url).toBe('http://ollama.test/api/embeddings');
            expect(JSON.parse(String(init?.body))).toEqual({ model: 'test-embed', prompt: 'RAG' });
        });

        it('should reject a reply without an embedding', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'model not loaded yet' }));

            await expect(client.embed('RAG')).rejects.toThrow(
                'Ollama returned a response without an embedding'
            );
        });
    });

    describe('error mapping', () => {
        it('should map 429 to RateLimitError', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'too many requests' }, 429));

            await expect(client.embed('RAG')).rejects.toThrow(
                new RateLimitError('Ollama rate limit: too many requests')
            );
        });

        it.each([401, 403])('should map %i to AuthenticationError', async (status) => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'denied' }, status));

            await expect(client.embed('RAG')).rejects.toThrow(AuthenticationError);
        });

        it('should map 404 to ModelNotFoundError', async () => {
            fetchSpy.mockResolvedValue(
                jsonResponse({ error: 'model "test-chat" not found, try pulling it first' }, 404)
            );

            await expect(client.complete('p', { history: [], input: 'q' })).rejects.toThrow(
                new ModelNotFoundError(
                    'Ollama model not found: model "test-chat" not found, try pulling it first'
                )
            );
        });

        it('should map 400 to InvalidModelRequestError', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'invalid format' }, 400));

            await expect(client.embed('RAG')).rejects.toThrow(
                new InvalidModelRequestError('Ollama rejected the request: invalid format')
            );
        });

        it('should keep 408 transient', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'request timeout' }, 408));

            await expect(client.embed('RAG')).rejects.toThrow(TransientNetworkError);
        });

        it('should map other failures to TransientNetworkError', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'model is loading' }, 503));

            await expect(client.complete('p', { history: [], input: 'q' })).rejects.toThrow(
                new TransientNetworkError('Ollama API error: model is loading')
            );
        });

        it('should report a refused connection as TransientNetworkError', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            await expect(client.embed('RAG')).rejects.toThrow(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)'
            );
        });

        it('should report an aborted request as TimeoutError', async () => {
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            fetchSpy.mockRejectedValue(abort);

            await expect(client.embed('RAG')).rejects.toThrow(TimeoutError);
        });
    });

    describe('isAvailable', () => {
        it('should be true when the tags endpoint answers', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ models: [] }));

            await expect(client.isAvailable()).resolves.toBe(true);
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test/api/tags');
        });

        it('should be false when Ollama is unreachable', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            await expect(client.isAvailable()).resolves.toBe(false);
        });
    });
});
