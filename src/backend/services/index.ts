/**
 * Backend services
 *
 * Core business logic components:
 * - DocumentChunker: Splits fetched documents into overlapping chunks
 * - EmbeddingIndex / VectorStore: Nearest-neighbour search over chunk embeddings
 * - RAGPipeline: Ingestion, retrieval and citation-annotated context
 * - ChatEngine: Q&A, comparison, summary, sentiment and fact extraction
 * - SessionManager: One chat engine per session
 * - QueryProcessor: Request validation
 */

export {
    validateQuery,
    isContentItem,
    parseIngestRequest,
    parseSummaryRequest,
} from './queryProcessor';

export type { ValidationResult, ParseResult, SummaryOptions } from './queryProcessor';

export { SessionManager, createSessionManager } from './sessionManager';

export type { ChatSession, SessionManagerConfig } from './sessionManager';

export {
    DocumentChunker,
    createDocumentChunker,
    splitIntoChunks,
    splitDocuments,
    validateChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
    DEFAULT_SEPARATORS,
} from './documentChunker';

export type { ChunkingConfig } from './documentChunker';

export { InMemoryVectorStore, createVectorStore, cosineSimilarity } from './vectorStore';

export type { IVectorStore, SearchResult } from './vectorStore';

export { EmbeddingIndex, createEmbeddingIndex } from './embeddingIndex';

export type { ScoredChunk, VectorStoreFactory } from './embeddingIndex';

export { RAGPipeline, createRAGPipeline, DEFAULT_RAG_CONFIG } from './ragPipeline';

export type { RAGPipelineConfig, IRAGPipeline, PipelineStats } from './ragPipeline';

export {
    ConversationMemory,
    createConversationMemory,
    DEFAULT_HISTORY_TURNS,
    NO_HISTORY_PLACEHOLDER,
} from './conversationMemory';

export {
    SUMMARY_TONES,
    SUMMARY_LENGTHS,
    isSummaryTone,
    isSummaryLength,
    getWordCountBand,
    renderTemplate,
    formatQaPrompt,
    formatComparisonPrompt,
    formatSummaryPrompt,
    formatSentimentPrompt,
    formatFactExtractionPrompt,
} from './prompts';

export type { SummaryTone, SummaryLength } from './prompts';

export {
    ChatEngine,
    createChatEngine,
    DEFAULT_CHAT_ENGINE_CONFIG,
    NO_SOURCES_TO_COMPARE,
    NO_CONTENT_TO_SUMMARIZE,
} from './chatEngine';

export type { ChatEngineConfig, ChatEngineStats } from './chatEngine';
