/**
 * Shared type definitions for the document chat service
 *
 * These types define the contract between the pipeline and its callers.
 * They're organized by domain:
 * - Documents: Uploaded content and its chunks
 * - Conversation: Turns and history
 * - Capability: The narrow LLM / embedding interface
 * - API: Request/response shapes
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Supported document formats.
 * Each format requires a specific parser implementation.
 */
export type DocumentType = 'pdf' | 'docx' | 'txt';

/**
 * A raw uploaded document. Consumed once by the text extractor.
 */
export interface UploadedDocument {
    name: string;
    type: DocumentType;
    data: Buffer;
}

/**
 * Half-open character span of a chunk within the extracted text.
 */
export interface SourceOffset {
    start: number;
    end: number;
}

/**
 * A contiguous slice of document text, embedded and retrieved independently.
 * Ids are sequence numbers in document order, starting at 0.
 */
export interface Chunk {
    readonly id: number;
    readonly text: string;
    readonly sourceOffset?: SourceOffset;
}

/**
 * How a document is split. Automatic mode derives the sizes from the text length.
 */
export type ChunkingStrategy =
    | { mode: 'automatic' }
    | { mode: 'manual'; chunkSize: number; chunkOverlap: number };

/**
 * Chunking strategy after the sizes have been fixed for a document.
 */
export interface ResolvedChunkingStrategy {
    mode: ChunkingStrategy['mode'];
    chunkSize: number;
    chunkOverlap: number;
}

// ============================================================================
// Conversation Types
// ============================================================================

export type TurnRole = 'user' | 'assistant';

/**
 * A single completed turn. User turns carry no sources.
 */
export interface Turn {
    id: string;
    role: TurnRole;
    content: string;
    timestamp: Date;
    sources: readonly Chunk[];
}

/**
 * Role and content only, the shape handed to the language model.
 */
export interface HistoryMessage {
    role: TurnRole;
    content: string;
}

// ============================================================================
// Capability Types
// ============================================================================

/**
 * Structured inputs of a completion: prior messages and the new input.
 */
export interface CompletionInputs {
    history: readonly HistoryMessage[];
    input: string;
}

/**
 * Per-call options. An aborted signal means the caller has given up on the
 * call; implementations should stop work and reject.
 */
export interface CallOptions {
    signal?: AbortSignal;
    /** Ask for a reply that is a single JSON value */
    format?: 'json';
}

/**
 * The only surface of the language model the pipeline depends on.
 * Implementations may fail with RateLimitError, AuthenticationError,
 * TransientNetworkError, TimeoutError, ModelNotFoundError or
 * InvalidModelRequestError.
 */
export interface LanguageModelCapability {
    embed(text: string, options?: CallOptions): Promise<number[]>;
    complete(prompt: string, inputs: CompletionInputs, options?: CallOptions): Promise<string>;
}

// ============================================================================
// Extraction Types
// ============================================================================

/**
 * Invoice fields pulled out of a document. Fields the document does not
 * contain are left out.
 */
export interface Invoice {
    invoiceId?: string;
    vendorName?: string;
    invoiceDate?: string;
    totalAmount?: number;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Source chunk as returned to API clients.
 */
export interface SourceReference {
    chunkId: number;
    excerpt: string;
    start?: number;
    end?: number;
}

export interface TurnResponse {
    id: string;
    role: TurnRole;
    content: string;
    timestamp: string; // ISO date
    sources: SourceReference[];
}

/**
 * Request body for POST /api/sessions/:id/chat
 */
export interface ChatRequest {
    message: string;
}

/**
 * Response body for POST /api/sessions/:id/chat
 */
export interface ChatResponse {
    sessionId: string;
    standaloneQuestion: string;
    response: TurnResponse;
}

/**
 * Request body for POST /api/sessions/:id/extract
 */
export interface ExtractionRequest {
    request: string;
}

/**
 * Response body for POST /api/sessions/:id/extract
 */
export interface ExtractionResponse {
    sessionId: string;
    invoice: Invoice;
    sources: SourceReference[];
}

export interface SessionSummary {
    id: string;
    documentName?: string;
    status: string;
    chunkCount: number;
    turnCount: number;
    chunking?: ResolvedChunkingStrategy;
    createdAt: string; // ISO date
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
}
