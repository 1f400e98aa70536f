/**
 * Ollama Client
 *
 * LanguageModelCapability backed by a local Ollama instance.
 * Ollama provides local LLM inference without external API calls.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/chat - Chat completions (system prompt + history + input)
 * - POST /api/embeddings - Generate vector embeddings
 *
 * Every failure is translated into the pipeline's error taxonomy so that the
 * capability guard and the session can tell transient failures apart.
 */

import {
    CallOptions,
    CompletionInputs,
    HistoryMessage,
    LanguageModelCapability,
} from '../../shared/types';
import {
    AuthenticationError,
    InvalidModelRequestError,
    ModelNotFoundError,
    RagError,
    RateLimitError,
    TimeoutError,
    TransientNetworkError,
} from '../errors';
import { linkAbortSignal } from './capabilityGuard';

export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Model used for chat completions */
    chatModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
    /** Sampling temperature; 0 keeps rewrites and answers stable */
    temperature: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    chatModel: 'llama3',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 60000,
    temperature: 0,
};

interface OllamaChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

interface OllamaChatResponse {
    message?: { content?: string };
}

interface OllamaEmbeddingResponse {
    embedding?: number[];
}

export interface IOllamaClient extends LanguageModelCapability {
    isAvailable(): Promise<boolean>;
}

export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     * Uses /api/tags because it's lightweight.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Run a chat completion. The prompt becomes the system message, followed
     * by the history and the new input as the last user message.
     */
    async complete(
        prompt: string,
        inputs: CompletionInputs,
        options: CallOptions = {}
    ): Promise<string> {
        const messages: OllamaChatMessage[] = [
            { role: 'system', content: prompt },
            ...inputs.history.map((msg: HistoryMessage) => ({
                role: msg.role,
                content: msg.content,
            })),
            { role: 'user', content: inputs.input },
        ];

        const data = await this.postJson<OllamaChatResponse>(
            '/api/chat',
            {
                model: this.config.chatModel,
                messages,
                stream: false,
                ...(options.format ? { format: options.format } : {}),
                options: { temperature: this.config.temperature },
            },
            'Failed to generate completion',
            options.signal
        );

        return data.message?.content ?? '';
    }

    async embed(text: string, options: CallOptions = {}): Promise<number[]> {
        const data = await this.postJson<OllamaEmbeddingResponse>(
            '/api/embeddings',
            {
                model: this.config.embeddingModel,
                prompt: text,
            },
            'Failed to generate embedding',
            options.signal
        );

        if (!Array.isArray(data.embedding)) {
            throw new TransientNetworkError('Ollama returned a response without an embedding');
        }
        return data.embedding;
    }

    private async postJson<T>(
        path: string,
        body: unknown,
        context: string,
        signal?: AbortSignal
    ): Promise<T> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}${path}`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(body),
                },
                this.config.timeoutMs,
                signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            return (await response.json()) as T;
        } catch (error) {
            throw this.wrapError(error, context);
        }
    }

    /**
     * Node.js fetch has no built-in timeout, so requests are aborted through
     * an AbortController. A caller's signal aborts the same controller.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
        const unlink = linkAbortSignal(controller, signal);

        try {
            return await fetch(url, { ...options, signal: controller.signal });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                if (signal?.aborted) {
                    throw new TimeoutError('Request cancelled by caller');
                }
                throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
            unlink();
        }
    }

    /**
     * Map non-OK responses:
     * - 429: rate limited
     * - 401/403: authentication
     * - 404: the model is not installed (ollama pull)
     * - other 4xx except 408: the request itself is wrong
     * - anything else: transient (model loading, server errors)
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage =
                typeof errorBody === 'object' &&
                errorBody !== null &&
                'error' in errorBody &&
                typeof errorBody.error === 'string'
                    ? errorBody.error
                    : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 429) {
            throw new RateLimitError(`Ollama rate limit: ${errorMessage}`);
        }
        if (response.status === 401 || response.status === 403) {
            throw new AuthenticationError(`Ollama rejected credentials: ${errorMessage}`);
        }
        if (response.status === 404) {
            throw new ModelNotFoundError(`Ollama model not found: ${errorMessage}`);
        }
        if (response.status >= 400 && response.status < 500 && response.status !== 408) {
            throw new InvalidModelRequestError(`Ollama rejected the request: ${errorMessage}`);
        }

        throw new TransientNetworkError(`Ollama API error: ${errorMessage}`);
    }

    private wrapError(error: unknown, context: string): RagError {
        if (error instanceof RagError) {
            return error;
        }

        // fetch rejects with a TypeError when the connection fails
        if (error instanceof TypeError) {
            return new TransientNetworkError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new TransientNetworkError(
            `${context}: ${message}`,
            error instanceof Error ? error : undefined
        );
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
