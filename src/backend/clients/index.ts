/**
 * External service clients
 *
 * - OllamaClient: LanguageModelCapability backed by a local Ollama instance
 * - guardCapability: timeout and retry policy around any capability
 */

export {
    OllamaClient,
    createOllamaClient,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
} from './ollamaClient';

export {
    guardCapability,
    withTimeout,
    linkAbortSignal,
    DEFAULT_GUARD_CONFIG,
    type CapabilityGuardConfig,
} from './capabilityGuard';

export { retry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry';
