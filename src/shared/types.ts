/**
 * Shared type definitions for the Research Assistant
 *
 * These types define the contract between the services and the HTTP layer.
 * They're organized by domain:
 * - Documents: Ingested web content and its chunks
 * - Retrieval: Sources and citation-annotated context
 * - Conversation: Turns and chat results
 * - Sessions: Per-user chat sessions
 * - API: Request/response shapes
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * One item handed over by the content source (a scraper or any other
 * fetcher). Failed fetches arrive with `success: false` and placeholder
 * content, and are dropped at ingestion.
 */
export interface ContentItem {
    content: string;
    url: string;
    title: string;
    sourceName: string;
    success: boolean;
}

/**
 * Where a piece of text came from. Every chunk carries its document's
 * metadata unchanged.
 */
export interface DocumentMetadata {
    source: string;
    url: string;
    title: string;
}

/**
 * A successfully fetched document, ready to be chunked.
 */
export interface Document {
    content: string;
    metadata: DocumentMetadata;
}

/**
 * A bounded span of one document's text.
 * Chunks are the unit of retrieval in the RAG system.
 */
export interface Chunk {
    content: string;
    metadata: DocumentMetadata;
}

// ============================================================================
// Vector Store Types
// ============================================================================

/**
 * Entry in the vector store: a chunk and its embedding.
 * The vector is computed once at build time and never changes.
 */
export interface IndexedChunk {
    chunk: Chunk;
    vector: number[];
}

// ============================================================================
// Retrieval Types
// ============================================================================

/**
 * A distinct origin contributing chunks to the corpus.
 */
export interface Source {
    source: string;
    title: string;
    url: string;
}

/**
 * Citation-annotated context for one query.
 * An empty context with no sources means nothing relevant was found.
 */
export interface RetrievalResult {
    context: string;
    sources: Source[];
}

/**
 * Counts reported after an ingestion batch.
 */
export interface IngestionSummary {
    documentCount: number;
    chunkCount: number;
    skipped: number;
}

// ============================================================================
// Conversation Types
// ============================================================================

/**
 * One question/answer exchange.
 */
export interface ConversationTurn {
    question: string;
    answer: string;
}

/**
 * Result of a Q&A call.
 */
export interface AskResult {
    answer: string;
    sources: Source[];
    contextUsed: string;
}

export interface SentimentResult {
    source: string;
    analysis: string;
}

export interface FactExtractionResult {
    source: string;
    facts: string;
}

/**
 * Lifecycle of a chat engine around a language-model call.
 */
export type ChatEngineState = 'idle' | 'awaiting-response';

// ============================================================================
// Capability Types
// ============================================================================

/**
 * Turns text into a fixed-length vector. Must be deterministic per input
 * and is used for both indexing and querying.
 */
export interface EmbeddingCapability {
    embed(text: string): Promise<number[]>;
}

/**
 * Single-shot text generation.
 */
export interface LanguageModelCapability {
    generate(prompt: string): Promise<string>;
}

/**
 * Options for text generation via Ollama.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Listing entry for GET /api/sessions
 */
export interface SessionSummary {
    id: string;
    createdAt: string; // ISO date
    documentCount: number;
    chunkCount: number;
    turnCount: number;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
}

/**
 * Error body returned by every endpoint.
 */
export interface ErrorResponse {
    error: string;
    code?: string;
}
