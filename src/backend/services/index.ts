/**
 * Backend services
 *
 * The RAG pipeline, leaf first:
 * - documentParser: text extraction per file type
 * - documentChunker: overlapping fixed-size chunks
 * - embeddingClient / vectorStore: embeddings and nearest-neighbor search
 * - piiRedactor: personal data placeholders for incoming messages
 * - queryRewriter / retriever / answerSynthesizer: the per-turn steps
 * - extractionService: invoice fields as validated JSON
 * - conversationSession: per-document orchestration
 * - sessionManager: live sessions of a server instance
 */

export { validateQuery } from './queryProcessor';
export type { ValidationResult } from './queryProcessor';

export {
    PlainTextParser,
    PdfParser,
    DocxParser,
    getParser,
    extractText,
    detectDocumentType,
    isDocumentType,
} from './documentParser';
export type { DocumentParser } from './documentParser';

export {
    DocumentChunker,
    createDocumentChunker,
    splitIntoChunks,
    resolveChunkingStrategy,
    validateChunkingConfig,
    AUTOMATIC_CHUNKING_TIERS,
} from './documentChunker';
export type { ChunkingConfig } from './documentChunker';

export {
    EmbeddingClient,
    createEmbeddingClient,
    DEFAULT_EMBEDDING_CONFIG,
} from './embeddingClient';
export type { Embedder, EmbeddingClientConfig } from './embeddingClient';

export {
    InMemoryVectorIndex,
    createVectorIndex,
    cosineSimilarity,
    euclideanDistance,
} from './vectorStore';
export type { IVectorIndex, SearchResult, DistanceMetric } from './vectorStore';

export { QueryRewriter, createQueryRewriter, CONTEXTUALIZE_PROMPT } from './queryRewriter';
export type { IQueryRewriter } from './queryRewriter';

export { retrieve, defaultRetriever } from './retriever';
export type { IRetriever } from './retriever';

export {
    AnswerSynthesizer,
    createAnswerSynthesizer,
    buildAnswerPrompt,
    formatContext,
    ANSWER_INSTRUCTIONS,
    NO_CONTEXT_NOTICE,
} from './answerSynthesizer';
export type { IAnswerSynthesizer, SynthesisResult } from './answerSynthesizer';

export {
    ExtractionService,
    createExtractionService,
    buildExtractionPrompt,
    parseInvoiceReply,
    invoiceSchema,
    EXTRACTION_INSTRUCTIONS,
    EXTRACTION_K,
} from './extractionService';
export type { ExtractionResult, IExtractionService } from './extractionService';

export {
    PatternRedactor,
    createRedactor,
    passthroughRedactor,
    passesLuhn,
    DEFAULT_PII_PATTERNS,
} from './piiRedactor';
export type { IRedactor, PiiPattern } from './piiRedactor';

export { ConversationHistory } from './conversationHistory';

export {
    ConversationSession,
    createSession,
    submit,
    extract,
    clear,
    exportHistory,
    DEFAULT_SESSION_CONFIG,
} from './conversationSession';
export type {
    SessionConfig,
    SessionDependencies,
    SessionStatus,
    TurnResult,
    IndexSummary,
} from './conversationSession';

export { SessionManager, createSessionManager, DEFAULT_MAX_SESSIONS } from './sessionManager';
export type { SessionManagerConfig } from './sessionManager';

export {
    formatSourceReference,
    formatTurn,
    truncateExcerpt,
    DEFAULT_FORMATTER_CONFIG,
} from './responseFormatter';
export type { FormatterConfig } from './responseFormatter';
