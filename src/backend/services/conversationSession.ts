/**
 * Conversation Session
 *
 * Owns one document's vector index and the conversation about it, and runs
 * the per-turn pipeline:
 *
 *   redact (personal data in the message → placeholders)
 *   → rewrite (history + message → standalone question)
 *   → retrieve (standalone question → chunks)
 *   → synthesize (original message + history + chunks → answer)
 *   → append the user turn and the assistant turn
 *
 * State machine:
 *   uninitialized --loadDocument--> indexed
 *   indexed --submit--> querying --> indexed
 *   indexed --clear--> cleared --submit--> querying --> indexed
 *   any loaded state --loadDocument--> indexed (fresh index and history)
 *
 * Structured extraction runs against the same index without touching the
 * history.
 *
 * Operations on one session run one at a time, in call order. History
 * append order therefore always matches submission order, and a document
 * swap can never happen under a running turn.
 */

import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import {
    Chunk,
    ChunkingStrategy,
    LanguageModelCapability,
    ResolvedChunkingStrategy,
    SessionSummary,
    Turn,
    UploadedDocument,
} from '../../shared/types';
import { guardCapability } from '../clients/capabilityGuard';
import { RetryOptions } from '../clients/retry';
import {
    CapabilityError,
    ConfigurationError,
    InvalidSessionStateError,
    isCapabilityError,
} from '../errors';
import { createAnswerSynthesizer, IAnswerSynthesizer } from './answerSynthesizer';
import { ConversationHistory } from './conversationHistory';
import { createDocumentChunker, DocumentChunker } from './documentChunker';
import { extractText } from './documentParser';
import { createEmbeddingClient, EmbeddingClient } from './embeddingClient';
import {
    createExtractionService,
    ExtractionResult,
    IExtractionService,
} from './extractionService';
import { createRedactor, IRedactor } from './piiRedactor';
import { createQueryRewriter, IQueryRewriter } from './queryRewriter';
import { defaultRetriever, IRetriever } from './retriever';
import { validateQuery } from './queryProcessor';
import { createVectorIndex, DistanceMetric, IVectorIndex } from './vectorStore';

export type SessionStatus = 'uninitialized' | 'indexed' | 'querying' | 'cleared';

export interface SessionConfig {
    /** Number of chunks retrieved per turn */
    retrievalK: number;
    /** Embedding requests in flight while indexing */
    embeddingConcurrency: number;
    metric: DistanceMetric;
    /** Per-call timeout at the capability boundary; none when undefined */
    llmTimeoutMs?: number;
    retry: Partial<RetryOptions>;
    /** Replace emails, card and phone numbers in messages before use */
    redactPii: boolean;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
    retrievalK: 4,
    embeddingConcurrency: 4,
    metric: 'cosine',
    llmTimeoutMs: undefined,
    retry: {},
    redactPii: true,
};

/**
 * Collaborators of a session. Only the capability is required; the
 * pipeline steps can be replaced, which is how tests observe them.
 */
export interface SessionDependencies {
    capability: LanguageModelCapability;
    extract?: (data: Buffer, type: string) => Promise<string>;
    chunker?: DocumentChunker;
    rewriter?: IQueryRewriter;
    retriever?: IRetriever;
    synthesizer?: IAnswerSynthesizer;
    extractor?: IExtractionService;
    redactor?: IRedactor;
}

export type TurnResult =
    | { ok: true; turn: Turn; standaloneQuestion: string }
    | { ok: false; error: CapabilityError };

export interface IndexSummary {
    documentName: string;
    chunkCount: number;
    strategy: ResolvedChunkingStrategy;
}

interface LoadedDocument {
    name: string;
    chunks: readonly Chunk[];
    strategy: ResolvedChunkingStrategy;
    index: IVectorIndex;
    embedder: EmbeddingClient;
}

export class ConversationSession {
    readonly id: string;
    readonly createdAt: Date;

    private readonly config: SessionConfig;
    private readonly capability: LanguageModelCapability;
    private readonly extractText: (data: Buffer, type: string) => Promise<string>;
    private readonly chunker: DocumentChunker;
    private readonly rewriter: IQueryRewriter;
    private readonly retriever: IRetriever;
    private readonly synthesizer: IAnswerSynthesizer;
    private readonly extractor: IExtractionService;
    private readonly redactor: IRedactor;
    private readonly queue = pLimit(1);

    private state: SessionStatus = 'uninitialized';
    private document: LoadedDocument | undefined;
    private history = new ConversationHistory();

    constructor(dependencies: SessionDependencies, config: Partial<SessionConfig> = {}) {
        this.id = uuidv4();
        this.createdAt = new Date();
        this.config = { ...DEFAULT_SESSION_CONFIG, ...config };

        this.capability = guardCapability(dependencies.capability, {
            timeoutMs: this.config.llmTimeoutMs,
            retry: this.config.retry,
        });
        this.extractText = dependencies.extract ?? extractText;
        this.chunker = dependencies.chunker ?? createDocumentChunker();
        this.rewriter = dependencies.rewriter ?? createQueryRewriter(this.capability);
        this.retriever = dependencies.retriever ?? defaultRetriever;
        this.synthesizer = dependencies.synthesizer ?? createAnswerSynthesizer(this.capability);
        this.extractor =
            dependencies.extractor ?? createExtractionService(this.capability, this.retriever);
        this.redactor = dependencies.redactor ?? createRedactor(this.config.redactPii);
    }

    get status(): SessionStatus {
        return this.state;
    }

    get turns(): readonly Turn[] {
        return this.history.turns;
    }

    get chunks(): readonly Chunk[] {
        return this.document?.chunks ?? [];
    }

    get documentName(): string | undefined {
        return this.document?.name;
    }

    get chunkingStrategy(): ResolvedChunkingStrategy | undefined {
        return this.document?.strategy;
    }

    /**
     * Index a document and start a fresh conversation about it.
     *
     * The new index is built completely before it replaces the old one; if
     * extraction, chunking or embedding fails the session keeps its previous
     * document, history and state.
     */
    loadDocument(
        document: UploadedDocument,
        strategy: ChunkingStrategy = { mode: 'automatic' }
    ): Promise<IndexSummary> {
        return this.queue(async () => {
            console.log(`Indexing document: ${document.name}`);

            const text = await this.extractText(document.data, document.type);
            const { chunks, strategy: resolved } = this.chunker.chunk(text, strategy);

            const embedder = createEmbeddingClient(this.capability, {
                concurrency: this.config.embeddingConcurrency,
            });
            const index = createVectorIndex(this.config.metric);
            await index.build(chunks, embedder);

            this.document = { name: document.name, chunks, strategy: resolved, index, embedder };
            this.history = new ConversationHistory();
            this.state = 'indexed';

            console.log(
                `Document indexed: ${document.name} (${chunks.length} chunks, ` +
                    `size ${resolved.chunkSize}, overlap ${resolved.chunkOverlap})`
            );
            return { documentName: document.name, chunkCount: chunks.length, strategy: resolved };
        });
    }

    /**
     * Run one conversational turn.
     *
     * The message is redacted first; the redacted text is what gets
     * rewritten, answered and stored as the user turn.
     *
     * Capability failures (rate limit, authentication, network, timeout)
     * come back as `{ ok: false }` and leave the history untouched.
     * Invariant violations such as IndexNotBuiltError are rethrown.
     *
     * @throws ConfigurationError for an empty message
     * @throws InvalidSessionStateError when no document is loaded
     */
    submit(message: string): Promise<TurnResult> {
        const validation = validateQuery(message);
        if (!validation.valid) {
            return Promise.reject(new ConfigurationError(validation.error ?? 'Invalid query'));
        }

        return this.queue(async (): Promise<TurnResult> => {
            const document = this.requireDocument('submit a message');
            this.state = 'querying';

            try {
                const history = this.history.toMessages();
                const question = this.redactMessage(message);

                const standaloneQuestion = await this.rewriter.rewrite(history, question);
                const retrieved = await this.retriever.retrieve(
                    document.index,
                    standaloneQuestion,
                    document.embedder,
                    this.config.retrievalK
                );
                const { answer, usedSources } = await this.synthesizer.synthesize(
                    question,
                    history,
                    retrieved
                );

                const userTurn: Turn = {
                    id: uuidv4(),
                    role: 'user',
                    content: question,
                    timestamp: new Date(),
                    sources: [],
                };
                const assistantTurn: Turn = {
                    id: uuidv4(),
                    role: 'assistant',
                    content: answer,
                    timestamp: new Date(),
                    sources: usedSources,
                };
                this.history.append(userTurn, assistantTurn);

                return { ok: true, turn: assistantTurn, standaloneQuestion };
            } catch (error) {
                if (isCapabilityError(error)) {
                    console.warn(`Turn failed in session ${this.id}: ${error.message}`);
                    return { ok: false, error };
                }
                throw error;
            } finally {
                this.state = 'indexed';
            }
        });
    }

    /**
     * Pull invoice fields out of the document. The request is redacted like
     * a chat message; the conversation is left unchanged.
     *
     * @throws ConfigurationError for an empty request
     * @throws InvalidSessionStateError when no document is loaded
     * @throws ModelOutputError when the reply is not a valid invoice
     */
    extract(request: string): Promise<ExtractionResult> {
        const validation = validateQuery(request);
        if (!validation.valid) {
            return Promise.reject(new ConfigurationError(validation.error ?? 'Invalid request'));
        }

        return this.queue(async () => {
            const document = this.requireDocument('extract data');
            const previous = this.state;
            this.state = 'querying';

            try {
                return await this.extractor.extract(
                    document.index,
                    document.embedder,
                    this.redactMessage(request)
                );
            } finally {
                this.state = previous;
            }
        });
    }

    /**
     * Start a fresh conversation about the same document. The index is kept.
     */
    clear(): Promise<void> {
        return this.queue(async () => {
            this.requireDocument('clear the conversation');
            this.history = new ConversationHistory();
            this.state = 'cleared';
        });
    }

    exportHistory(): string {
        return this.history.toText();
    }

    summary(): SessionSummary {
        return {
            id: this.id,
            documentName: this.document?.name,
            status: this.state,
            chunkCount: this.document?.chunks.length ?? 0,
            turnCount: this.history.length,
            chunking: this.document?.strategy,
            createdAt: this.createdAt.toISOString(),
        };
    }

    private redactMessage(text: string): string {
        const redacted = this.redactor.redact(text);
        if (redacted !== text) {
            console.log(`Redacted personal data from a message in session ${this.id}`);
        }
        return redacted;
    }

    private requireDocument(action: string): LoadedDocument {
        if (!this.document) {
            throw new InvalidSessionStateError(
                `Cannot ${action}: no document has been loaded into session ${this.id}`
            );
        }
        return this.document;
    }
}

// ============================================================================
// Lifecycle functions
// ============================================================================

export async function createSession(
    document: UploadedDocument,
    strategy: ChunkingStrategy,
    dependencies: SessionDependencies,
    config?: Partial<SessionConfig>
): Promise<ConversationSession> {
    const session = new ConversationSession(dependencies, config);
    await session.loadDocument(document, strategy);
    return session;
}

export function submit(session: ConversationSession, message: string): Promise<TurnResult> {
    return session.submit(message);
}

export async function clear(session: ConversationSession): Promise<ConversationSession> {
    await session.clear();
    return session;
}

export function extract(
    session: ConversationSession,
    request: string
): Promise<ExtractionResult> {
    return session.extract(request);
}

export function exportHistory(session: ConversationSession): string {
    return session.exportHistory();
}
