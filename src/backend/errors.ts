/**
 * Error taxonomy for the Research Assistant
 *
 * Every failure the services raise on purpose is an AssistantError with a
 * stable code, so the HTTP layer (and any other caller) can tell
 * "the corpus is unusable" apart from "a remote model is down".
 *
 * Transport failures from Ollama stay OllamaError inside the client and are
 * wrapped into EmbeddingServiceError / GenerationServiceError at the
 * capability boundary.
 */

/**
 * Error codes for the different failure scenarios.
 */
export enum AssistantErrorCode {
    /** Ingestion or chunking was handed an empty list */
    EMPTY_INPUT = 'EMPTY_INPUT',
    /** Every input resolved to empty or failed content */
    NO_VALID_CONTENT = 'NO_VALID_CONTENT',
    /** Search was called before any index was built */
    INDEX_NOT_BUILT = 'INDEX_NOT_BUILT',
    /** A chat operation needs ingested documents first */
    NOT_READY = 'NOT_READY',
    /** The embedding capability failed or returned malformed vectors */
    EMBEDDING_SERVICE = 'EMBEDDING_SERVICE',
    /** The language model failed to produce a response */
    GENERATION_SERVICE = 'GENERATION_SERVICE',
    /** A prompt template placeholder had no value */
    MISSING_PROMPT_VARIABLE = 'MISSING_PROMPT_VARIABLE',
    /** No chat session with the requested id */
    SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
    /** Invalid configuration value */
    CONFIGURATION = 'CONFIGURATION',
}

/**
 * Base class for all errors raised by the assistant's services.
 */
export class AssistantError extends Error {
    constructor(
        message: string,
        public readonly code: AssistantErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'AssistantError';
    }
}

export class EmptyInputError extends AssistantError {
    constructor(message: string = 'No documents were provided') {
        super(message, AssistantErrorCode.EMPTY_INPUT);
        this.name = 'EmptyInputError';
    }
}

export class NoValidContentError extends AssistantError {
    constructor(message: string = 'No valid documents to process') {
        super(message, AssistantErrorCode.NO_VALID_CONTENT);
        this.name = 'NoValidContentError';
    }
}

export class IndexNotBuiltError extends AssistantError {
    constructor(message: string = 'No documents ingested yet. Ingest documents before searching.') {
        super(message, AssistantErrorCode.INDEX_NOT_BUILT);
        this.name = 'IndexNotBuiltError';
    }
}

export class NotReadyError extends AssistantError {
    constructor(message: string = 'Chat engine is not ready. Ingest documents before asking questions.') {
        super(message, AssistantErrorCode.NOT_READY);
        this.name = 'NotReadyError';
    }
}

export class EmbeddingServiceError extends AssistantError {
    constructor(message: string, cause?: Error) {
        super(message, AssistantErrorCode.EMBEDDING_SERVICE, cause);
        this.name = 'EmbeddingServiceError';
    }
}

export class GenerationServiceError extends AssistantError {
    constructor(message: string, cause?: Error) {
        super(message, AssistantErrorCode.GENERATION_SERVICE, cause);
        this.name = 'GenerationServiceError';
    }
}

export class MissingPromptVariableError extends AssistantError {
    constructor(public readonly variable: string) {
        super(`Missing prompt variable: ${variable}`, AssistantErrorCode.MISSING_PROMPT_VARIABLE);
        this.name = 'MissingPromptVariableError';
    }
}

export class SessionNotFoundError extends AssistantError {
    constructor(public readonly sessionId: string) {
        super(`Session not found: ${sessionId}`, AssistantErrorCode.SESSION_NOT_FOUND);
        this.name = 'SessionNotFoundError';
    }
}

export class ConfigurationError extends AssistantError {
    constructor(message: string) {
        super(message, AssistantErrorCode.CONFIGURATION);
        this.name = 'ConfigurationError';
    }
}

/**
 * Normalize an unknown thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
