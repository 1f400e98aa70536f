/**
 * Backend module entry point
 *
 * - server/: Express app configuration and route handlers
 * - services/: The RAG pipeline and conversation sessions
 * - clients/: Language model capability (Ollama) and its timeout/retry guard
 *
 * When run directly, this file starts the server with settings from the
 * environment. When imported, it exports the library surface.
 */

import { createServer } from './server';
import { createOllamaClient } from './clients';
import { loadConfig } from './config';

export {
    createApp,
    createServer,
    startServer,
    statusForError,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';
export type { ServerConfig } from './server';

export * from './services';
export * from './errors';

export {
    OllamaClient,
    createOllamaClient,
    guardCapability,
    withTimeout,
    linkAbortSignal,
    retry,
    DEFAULT_OLLAMA_CONFIG,
    DEFAULT_GUARD_CONFIG,
    DEFAULT_RETRY_OPTIONS,
} from './clients';
export type {
    IOllamaClient,
    OllamaClientConfig,
    CapabilityGuardConfig,
    RetryOptions,
} from './clients';

export { loadConfig, parsePipelineOptions, sessionConfigFor } from './config';
export type { AppConfig, PipelineOptions, RawPipelineOptions } from './config';

export * from '../shared/types';

if (require.main === module) {
    const config = loadConfig();
    createServer(
        {
            port: config.port,
            corsOrigin: config.corsOrigin,
            session: config.session,
            maxSessions: config.maxSessions,
            ollamaClient: createOllamaClient(config.ollama),
        },
        true
    )
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: Error) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}
