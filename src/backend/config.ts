/**
 * Configuration
 *
 * Server-wide settings come from environment variables (a .env file in the
 * working directory is loaded first); per-upload pipeline options come from
 * the request and are validated by parsePipelineOptions.
 */

import dotenv from 'dotenv';
import { ChunkingStrategy } from '../shared/types';
import { DEFAULT_OLLAMA_CONFIG, OllamaClientConfig } from './clients/ollamaClient';
import { ConfigurationError } from './errors';
import { validateChunkingConfig } from './services/documentChunker';
import { DEFAULT_SESSION_CONFIG, SessionConfig } from './services/conversationSession';
import { DEFAULT_MAX_SESSIONS } from './services/sessionManager';

dotenv.config();

export interface AppConfig {
    port: number;
    corsOrigin: string;
    ollama: OllamaClientConfig;
    session: SessionConfig;
    maxSessions: number;
}

/**
 * Options a caller may set per document.
 */
export interface PipelineOptions {
    chunking: ChunkingStrategy;
    retrievalK?: number;
    llmTimeoutSeconds?: number;
}

/**
 * Raw option values as they arrive from a form or JSON body.
 */
export interface RawPipelineOptions {
    mode?: unknown;
    chunkSize?: unknown;
    chunkOverlap?: unknown;
    retrievalK?: unknown;
    llmTimeoutSeconds?: unknown;
}

function toNumber(value: unknown, name: string): number | undefined {
    if (value === undefined || value === null || value === '') {
        return undefined;
    }
    const parsed = typeof value === 'number' ? value : Number(String(value));
    if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`${name} must be a number, got "${String(value)}"`);
    }
    return parsed;
}

function toBoolean(value: string | undefined, name: string): boolean | undefined {
    const normalized = value?.trim().toLowerCase();
    if (normalized === undefined || normalized === '') {
        return undefined;
    }
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
    }
    throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
}

function positiveInteger(value: unknown, name: string): number | undefined {
    const parsed = toNumber(value, name);
    if (parsed !== undefined && (!Number.isInteger(parsed) || parsed <= 0)) {
        throw new ConfigurationError(`${name} must be a positive integer, got ${parsed}`);
    }
    return parsed;
}

/**
 * Validate the recognized options:
 * `{ mode: automatic|manual, chunkSize > 0, chunkOverlap >= 0 (manual only),
 * retrievalK > 0, llmTimeoutSeconds > 0 }`.
 */
export function parsePipelineOptions(raw: RawPipelineOptions): PipelineOptions {
    const mode = raw.mode === undefined || raw.mode === '' ? 'automatic' : raw.mode;
    if (mode !== 'automatic' && mode !== 'manual') {
        throw new ConfigurationError(
            `mode must be "automatic" or "manual", got "${String(mode)}"`
        );
    }

    let chunking: ChunkingStrategy;
    if (mode === 'manual') {
        const chunkSize = toNumber(raw.chunkSize, 'chunkSize');
        const chunkOverlap = toNumber(raw.chunkOverlap, 'chunkOverlap');
        if (chunkSize === undefined || chunkOverlap === undefined) {
            throw new ConfigurationError('Manual mode requires chunkSize and chunkOverlap');
        }
        validateChunkingConfig({ chunkSize, chunkOverlap });
        chunking = { mode: 'manual', chunkSize, chunkOverlap };
    } else {
        chunking = { mode: 'automatic' };
    }

    const llmTimeoutSeconds = toNumber(raw.llmTimeoutSeconds, 'llmTimeoutSeconds');
    if (llmTimeoutSeconds !== undefined && llmTimeoutSeconds <= 0) {
        throw new ConfigurationError(
            `llmTimeoutSeconds must be greater than 0, got ${llmTimeoutSeconds}`
        );
    }

    return {
        chunking,
        retrievalK: positiveInteger(raw.retrievalK, 'retrievalK'),
        llmTimeoutSeconds,
    };
}

/**
 * Session settings for one document: server defaults overridden by the
 * caller's pipeline options.
 */
export function sessionConfigFor(
    base: SessionConfig,
    options: PipelineOptions
): SessionConfig {
    return {
        ...base,
        retrievalK: options.retrievalK ?? base.retrievalK,
        llmTimeoutMs:
            options.llmTimeoutSeconds !== undefined
                ? Math.round(options.llmTimeoutSeconds * 1000)
                : base.llmTimeoutMs,
    };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const llmTimeoutSeconds = toNumber(env.LLM_TIMEOUT_SECONDS, 'LLM_TIMEOUT_SECONDS');
    if (llmTimeoutSeconds !== undefined && llmTimeoutSeconds <= 0) {
        throw new ConfigurationError('LLM_TIMEOUT_SECONDS must be greater than 0');
    }
    const maxAttempts = positiveInteger(env.RETRY_MAX_ATTEMPTS, 'RETRY_MAX_ATTEMPTS');

    return {
        port: positiveInteger(env.PORT, 'PORT') ?? 3001,
        corsOrigin: env.CORS_ORIGIN?.trim() || '*',
        ollama: {
            baseUrl: env.OLLAMA_BASE_URL?.trim() || DEFAULT_OLLAMA_CONFIG.baseUrl,
            chatModel: env.OLLAMA_CHAT_MODEL?.trim() || DEFAULT_OLLAMA_CONFIG.chatModel,
            embeddingModel:
                env.OLLAMA_EMBEDDING_MODEL?.trim() || DEFAULT_OLLAMA_CONFIG.embeddingModel,
            timeoutMs:
                positiveInteger(env.OLLAMA_TIMEOUT_MS, 'OLLAMA_TIMEOUT_MS') ??
                DEFAULT_OLLAMA_CONFIG.timeoutMs,
            temperature: DEFAULT_OLLAMA_CONFIG.temperature,
        },
        session: {
            ...DEFAULT_SESSION_CONFIG,
            retrievalK:
                positiveInteger(env.RETRIEVAL_K, 'RETRIEVAL_K') ??
                DEFAULT_SESSION_CONFIG.retrievalK,
            embeddingConcurrency:
                positiveInteger(env.EMBEDDING_CONCURRENCY, 'EMBEDDING_CONCURRENCY') ??
                DEFAULT_SESSION_CONFIG.embeddingConcurrency,
            llmTimeoutMs:
                llmTimeoutSeconds !== undefined ? Math.round(llmTimeoutSeconds * 1000) : undefined,
            retry: maxAttempts !== undefined ? { maxAttempts } : {},
            redactPii: toBoolean(env.REDACT_PII, 'REDACT_PII') ?? DEFAULT_SESSION_CONFIG.redactPii,
        },
        maxSessions: positiveInteger(env.MAX_SESSIONS, 'MAX_SESSIONS') ?? DEFAULT_MAX_SESSIONS,
    };
}
