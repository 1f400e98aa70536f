/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the document chat backend.
 * It exposes REST endpoints for:
 * - Health checks (Ollama connectivity)
 * - Session lifecycle (upload a document, clear, export, delete)
 * - Chat turns against a session
 * - Structured (invoice) extraction from a session's document
 *
 * ARCHITECTURE NOTES:
 * - Routes only translate HTTP to session calls; the pipeline lives in services/
 * - Sessions are owned by a SessionManager instance created per app
 * - Errors from the pipeline carry a RagErrorCode that the error
 *   middleware turns into a status code
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import {
    ChatResponse,
    ExtractionResponse,
    HealthResponse,
    UploadedDocument,
} from '../../shared/types';
import { createOllamaClient, IOllamaClient } from '../clients/ollamaClient';
import { parsePipelineOptions, sessionConfigFor } from '../config';
import { isRetryableError, RagError, RagErrorCode } from '../errors';
import {
    ConversationSession,
    createSessionManager,
    DEFAULT_MAX_SESSIONS,
    DEFAULT_SESSION_CONFIG,
    detectDocumentType,
    formatSourceReference,
    formatTurn,
    SessionConfig,
    SessionManager,
    validateQuery,
} from '../services';

export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Defaults for every session */
    session: SessionConfig;
    /** Ollama client instance (for dependency injection) */
    ollamaClient?: IOllamaClient;
    /** Session manager instance (for dependency injection) */
    sessionManager?: SessionManager;
    /** Live sessions kept by the default session manager */
    maxSessions: number;
    /** Maximum upload size in bytes */
    maxUploadBytes: number;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
    session: DEFAULT_SESSION_CONFIG,
    maxSessions: DEFAULT_MAX_SESSIONS,
    maxUploadBytes: 10 * 1024 * 1024,
};

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

const STATUS_BY_CODE: Record<RagErrorCode, number> = {
    [RagErrorCode.CONFIGURATION]: 400,
    [RagErrorCode.UNSUPPORTED_FORMAT]: 400,
    [RagErrorCode.CORRUPT_DOCUMENT]: 422,
    [RagErrorCode.INVALID_SESSION_STATE]: 409,
    [RagErrorCode.RATE_LIMITED]: 429,
    [RagErrorCode.AUTHENTICATION]: 502,
    [RagErrorCode.TRANSIENT_NETWORK]: 502,
    [RagErrorCode.TIMEOUT]: 504,
    [RagErrorCode.MODEL_NOT_FOUND]: 502,
    [RagErrorCode.INVALID_MODEL_REQUEST]: 502,
    [RagErrorCode.INVALID_MODEL_OUTPUT]: 502,
    [RagErrorCode.EMBEDDING_DIMENSION_MISMATCH]: 500,
    [RagErrorCode.INDEX_NOT_BUILT]: 500,
    [RagErrorCode.INDEX_ALREADY_BUILT]: 500,
};

export function statusForError(error: RagError): number {
    return STATUS_BY_CODE[error.code];
}

/**
 * Reads the uploaded file of a multipart request as a pipeline document.
 */
function readUpload(req: Request): UploadedDocument {
    const file = req.file;
    if (!file) {
        throw new ApiError(
            'No file uploaded. Please select a file to upload.',
            400,
            'MISSING_FILE'
        );
    }

    const type = detectDocumentType(file.originalname);
    if (!type) {
        throw new ApiError(
            'Unsupported document format. Supported formats: .pdf, .docx, .txt',
            400,
            RagErrorCode.UNSUPPORTED_FORMAT
        );
    }

    return { name: file.originalname, type, data: file.buffer };
}

/**
 * Creates and configures the Express application.
 * Creating the app is separate from listening so tests can mount it
 * on an ephemeral port.
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const ollamaClient = mergedConfig.ollamaClient ?? createOllamaClient();
    const sessionManager =
        mergedConfig.sessionManager ??
        createSessionManager(ollamaClient, {
            session: mergedConfig.session,
            maxSessions: mergedConfig.maxSessions,
        });

    const findSession = (req: Request): ConversationSession => {
        const id = req.params.id ?? '';
        const session = sessionManager.getSession(id);
        if (!session) {
            throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
        }
        return session;
    };

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'PUT', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Uploads are held in memory; the document is consumed once by the extractor
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: mergedConfig.maxUploadBytes },
    });

    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 200 when Ollama answers, 503 otherwise.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        const ollamaAvailable = await ollamaClient.isAvailable();

        const response: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
        };
        res.status(ollamaAvailable ? 200 : 503).json(response);
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    /**
     * POST /api/sessions
     *
     * multipart/form-data with `file` plus optional `mode`, `chunkSize`,
     * `chunkOverlap`, `retrievalK`, `llmTimeoutSeconds`. Indexes the
     * document and returns the new session.
     */
    app.post(
        '/api/sessions',
        upload.single('file'),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const document = readUpload(req);
                const options = parsePipelineOptions(req.body ?? {});

                const session = await sessionManager.createSession(
                    document,
                    options.chunking,
                    sessionConfigFor(mergedConfig.session, options)
                );

                res.status(201).json({ session: session.summary() });
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * GET /api/sessions
     */
    app.get('/api/sessions', (_req: Request, res: Response) => {
        res.json({ sessions: sessionManager.listSessions() });
    });

    /**
     * GET /api/sessions/:id
     *
     * Session summary plus the full conversation.
     */
    app.get('/api/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = findSession(req);
            res.json({
                session: session.summary(),
                turns: session.turns.map((turn) => formatTurn(turn)),
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * PUT /api/sessions/:id/document
     *
     * Replace the session's document (or re-chunk it with new settings).
     * The old index and history are discarded once the new index is ready.
     */
    app.put(
        '/api/sessions/:id/document',
        upload.single('file'),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const session = findSession(req);
                const document = readUpload(req);
                const options = parsePipelineOptions(req.body ?? {});

                await session.loadDocument(document, options.chunking);
                res.json({ session: session.summary() });
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * POST /api/sessions/:id/chat
     *
     * Runs one turn. A failed turn returns the error status and leaves the
     * conversation unchanged, so the client can offer a retry.
     */
    app.post(
        '/api/sessions/:id/chat',
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const session = findSession(req);
                const message: unknown = req.body?.message;

                const validation = validateQuery(message);
                if (!validation.valid || typeof message !== 'string') {
                    res.status(400).json({
                        error: validation.error,
                        code: 'INVALID_QUERY',
                    });
                    return;
                }

                const result = await session.submit(message);
                if (!result.ok) {
                    res.status(statusForError(result.error)).json({
                        error: result.error.message,
                        code: result.error.code,
                        retryable: isRetryableError(result.error),
                    });
                    return;
                }

                const response: ChatResponse = {
                    sessionId: session.id,
                    standaloneQuestion: result.standaloneQuestion,
                    response: formatTurn(result.turn),
                };
                res.json(response);
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * POST /api/sessions/:id/extract
     *
     * `{ request }` names the invoice fields to pull out of the document.
     * Responds with the validated invoice and the chunks it was read from.
     */
    app.post(
        '/api/sessions/:id/extract',
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const session = findSession(req);
                const request: unknown = req.body?.request;

                const validation = validateQuery(request);
                if (!validation.valid || typeof request !== 'string') {
                    res.status(400).json({
                        error: validation.error,
                        code: 'INVALID_QUERY',
                    });
                    return;
                }

                const { invoice, sources } = await session.extract(request);
                const response: ExtractionResponse = {
                    sessionId: session.id,
                    invoice,
                    sources: sources.map((chunk) => formatSourceReference(chunk)),
                };
                res.json(response);
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * POST /api/sessions/:id/clear
     *
     * Fresh conversation about the same document.
     */
    app.post(
        '/api/sessions/:id/clear',
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const session = findSession(req);
                await session.clear();
                res.json({ session: session.summary() });
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * GET /api/sessions/:id/history
     *
     * Plain-text export of the conversation, one "<role>: <content>" per turn.
     */
    app.get('/api/sessions/:id/history', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = findSession(req);
            const baseName = session.documentName ?? 'session';
            res.type('text/plain');
            res.attachment(`chat_history_${baseName}.txt`);
            res.send(session.exportHistory());
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/sessions/:id
     */
    app.delete('/api/sessions/:id', (req: Request, res: Response) => {
        const deleted = sessionManager.deleteSession(req.params.id ?? '');
        if (!deleted) {
            res.status(404).json({
                error: 'Session not found',
                code: 'SESSION_NOT_FOUND',
            });
            return;
        }
        res.json({ success: true });
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ApiError) {
            res.status(err.statusCode).json({ error: err.message, code: err.code });
            return;
        }

        if (err instanceof multer.MulterError) {
            const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
            res.status(status).json({ error: err.message, code: err.code });
            return;
        }

        if (err instanceof RagError) {
            const status = statusForError(err);
            if (status >= 500) {
                console.error('Pipeline error:', err);
            }
            res.status(status).json({ error: err.message, code: err.code });
            return;
        }

        console.error('Unhandled error:', err);
        res.status(500).json({
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Starts the Express server.
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<void> {
    return new Promise((resolve) => {
        app.listen(port, () => {
            console.log(`Document chat server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve();
        });
    });
}

/**
 * Factory function to create and optionally start the server.
 */
export async function createServer(
    config: Partial<ServerConfig> = {},
    autoStart: boolean = false
): Promise<Express> {
    const app = createApp(config);

    if (autoStart) {
        await startServer(app, config.port ?? DEFAULT_SERVER_CONFIG.port);
    }

    return app;
}
