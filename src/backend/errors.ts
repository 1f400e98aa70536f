/**
 * Error taxonomy for the RAG pipeline.
 *
 * Every error the pipeline raises is a RagError carrying a RagErrorCode,
 * so callers (and the HTTP layer) can switch on the code instead of
 * matching messages.
 */

export enum RagErrorCode {
    /** Invalid chunking or pipeline options */
    CONFIGURATION = 'CONFIGURATION',
    /** File type the extractor does not handle */
    UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
    /** File could not be read or holds no text */
    CORRUPT_DOCUMENT = 'CORRUPT_DOCUMENT',
    /** Embedding length differs from the index dimension */
    EMBEDDING_DIMENSION_MISMATCH = 'EMBEDDING_DIMENSION_MISMATCH',
    /** Index queried before build completed */
    INDEX_NOT_BUILT = 'INDEX_NOT_BUILT',
    /** Build called twice on the same index */
    INDEX_ALREADY_BUILT = 'INDEX_ALREADY_BUILT',
    /** Operation not allowed in the session's current state */
    INVALID_SESSION_STATE = 'INVALID_SESSION_STATE',
    RATE_LIMITED = 'RATE_LIMITED',
    AUTHENTICATION = 'AUTHENTICATION',
    TRANSIENT_NETWORK = 'TRANSIENT_NETWORK',
    TIMEOUT = 'TIMEOUT',
    /** The configured model is not installed */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** The model server refused the request as malformed */
    INVALID_MODEL_REQUEST = 'INVALID_MODEL_REQUEST',
    /** A reply that should be structured could not be read */
    INVALID_MODEL_OUTPUT = 'INVALID_MODEL_OUTPUT',
}

export class RagError extends Error {
    constructor(
        message: string,
        public readonly code: RagErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'RagError';
    }
}

export class ConfigurationError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.CONFIGURATION);
        this.name = 'ConfigurationError';
    }
}

export class UnsupportedFormatError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.UNSUPPORTED_FORMAT);
        this.name = 'UnsupportedFormatError';
    }
}

export class CorruptDocumentError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.CORRUPT_DOCUMENT, cause);
        this.name = 'CorruptDocumentError';
    }
}

export class EmbeddingDimensionMismatchError extends RagError {
    constructor(
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(
            `Embedding dimension mismatch: index has ${expected}, got ${actual}`,
            RagErrorCode.EMBEDDING_DIMENSION_MISMATCH
        );
        this.name = 'EmbeddingDimensionMismatchError';
    }
}

export class IndexNotBuiltError extends RagError {
    constructor() {
        super('Vector index queried before build completed', RagErrorCode.INDEX_NOT_BUILT);
        this.name = 'IndexNotBuiltError';
    }
}

export class IndexAlreadyBuiltError extends RagError {
    constructor() {
        super(
            'Vector index is already built; create a new index to rebuild',
            RagErrorCode.INDEX_ALREADY_BUILT
        );
        this.name = 'IndexAlreadyBuiltError';
    }
}

export class InvalidSessionStateError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.INVALID_SESSION_STATE);
        this.name = 'InvalidSessionStateError';
    }
}

export class RateLimitError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.RATE_LIMITED, cause);
        this.name = 'RateLimitError';
    }
}

export class AuthenticationError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.AUTHENTICATION, cause);
        this.name = 'AuthenticationError';
    }
}

export class TransientNetworkError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.TRANSIENT_NETWORK, cause);
        this.name = 'TransientNetworkError';
    }
}

export class TimeoutError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.TIMEOUT);
        this.name = 'TimeoutError';
    }
}

export class ModelNotFoundError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.MODEL_NOT_FOUND);
        this.name = 'ModelNotFoundError';
    }
}

export class InvalidModelRequestError extends RagError {
    constructor(message: string) {
        super(message, RagErrorCode.INVALID_MODEL_REQUEST);
        this.name = 'InvalidModelRequestError';
    }
}

export class ModelOutputError extends RagError {
    constructor(message: string, cause?: Error) {
        super(message, RagErrorCode.INVALID_MODEL_OUTPUT, cause);
        this.name = 'ModelOutputError';
    }
}

/**
 * Errors raised at the LLM / embedding boundary. A turn failing with one of
 * these is reported to the caller as a failed turn.
 */
export type CapabilityError =
    | RateLimitError
    | AuthenticationError
    | TransientNetworkError
    | TimeoutError
    | ModelNotFoundError
    | InvalidModelRequestError;

export function isCapabilityError(error: unknown): error is CapabilityError {
    return (
        error instanceof RateLimitError ||
        error instanceof AuthenticationError ||
        error instanceof TransientNetworkError ||
        error instanceof TimeoutError ||
        error instanceof ModelNotFoundError ||
        error instanceof InvalidModelRequestError
    );
}

/**
 * Only transient capability failures are retried.
 */
export function isRetryableError(error: unknown): boolean {
    return error instanceof RateLimitError || error instanceof TransientNetworkError;
}
