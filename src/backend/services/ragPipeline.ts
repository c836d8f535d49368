/**
 * RAG Pipeline Service
 *
 * Retrieval-Augmented Generation, retrieval half:
 * 1. INGEST: filter fetched content, chunk it, embed and index the chunks
 * 2. RETRIEVE: find the chunks most similar to a query
 * 3. CONTEXT: format them as citation-tagged blocks with their sources
 *
 * Generation lives in the ChatEngine, which consumes this pipeline.
 */

import {
    Chunk,
    ContentItem,
    Document,
    EmbeddingCapability,
    IngestionSummary,
    RetrievalResult,
    Source,
} from '../../shared/types';
import { EmptyInputError, NoValidContentError } from '../errors';
import { ChunkingConfig, DocumentChunker, createDocumentChunker } from './documentChunker';
import { EmbeddingIndex, VectorStoreFactory, createEmbeddingIndex } from './embeddingIndex';

/**
 * Configuration for the RAG pipeline.
 */
export interface RAGPipelineConfig {
    /** Number of chunks to retrieve for context */
    topK: number;
    /** Overrides for the chunker */
    chunking: Partial<ChunkingConfig>;
}

export const DEFAULT_RAG_CONFIG: RAGPipelineConfig = {
    topK: 5,
    chunking: {},
};

export interface PipelineStats {
    documentCount: number;
    chunkCount: number;
    sourceCount: number;
}

/**
 * Interface for the RAG pipeline.
 */
export interface IRAGPipeline {
    ingestDocuments(items: ContentItem[]): Promise<IngestionSummary>;
    retrieveRelevantChunks(query: string, k?: number): Promise<Chunk[]>;
    getContextWithSources(query: string, k?: number): Promise<RetrievalResult>;
    getAllSources(): Source[];
    getChunks(): Chunk[];
    getChunksForSource(sourceName: string): Chunk[];
    hasDocuments(): boolean;
    isReady(): boolean;
    getStats(): PipelineStats;
}

/**
 * Turn a fetched item into a Document, or null if it is unusable.
 */
function toDocument(item: ContentItem): Document | null {
    if (!item.success || item.content.trim().length === 0) {
        return null;
    }
    return {
        content: item.content,
        metadata: {
            source: item.sourceName,
            url: item.url,
            title: item.title,
        },
    };
}

function sourceKey(source: Source): string {
    return JSON.stringify([source.source, source.title, source.url]);
}

export class RAGPipeline implements IRAGPipeline {
    private readonly chunker: DocumentChunker;
    private readonly index: EmbeddingIndex;
    private readonly config: RAGPipelineConfig;
    private documentCount = 0;

    constructor(
        embedder: EmbeddingCapability,
        config: Partial<RAGPipelineConfig> = {},
        createStore?: VectorStoreFactory
    ) {
        this.config = { ...DEFAULT_RAG_CONFIG, ...config };
        this.chunker = createDocumentChunker(this.config.chunking);
        this.index = createEmbeddingIndex(embedder, createStore);
    }

    /**
     * Ingest a batch of fetched content, replacing any previous corpus.
     *
     * Only items with `success: true` and non-empty content are kept. The
     * previous corpus stays searchable until the new index is built.
     *
     * @throws EmptyInputError when the batch is empty
     * @throws NoValidContentError when no item is usable
     * @throws EmbeddingServiceError when embedding fails
     */
    async ingestDocuments(items: ContentItem[]): Promise<IngestionSummary> {
        if (items.length === 0) {
            throw new EmptyInputError('No content items to ingest');
        }

        const documents: Document[] = [];
        for (const item of items) {
            const doc = toDocument(item);
            if (doc) {
                documents.push(doc);
            }
        }

        if (documents.length === 0) {
            throw new NoValidContentError();
        }

        const chunks = this.chunker.split(documents);
        const chunkCount = await this.index.build(chunks);
        this.documentCount = documents.length;

        console.log(`Ingested ${documents.length} documents, split into ${chunkCount} chunks`);

        return {
            documentCount: documents.length,
            chunkCount,
            skipped: items.length - documents.length,
        };
    }

    /**
     * Chunks most similar to the query, most similar first.
     *
     * @throws IndexNotBuiltError before the first ingestion
     */
    async retrieveRelevantChunks(
        query: string,
        k: number = this.config.topK
    ): Promise<Chunk[]> {
        return this.index.search(query, k);
    }

    /**
     * Retrieve chunks and format them with source citations.
     *
     * Each chunk becomes `[Source {rank}: {source} - {title}]\n{content}\n`,
     * blocks joined by a newline. Sources are distinct (source, title, url)
     * tuples in the order they first appear in the ranking.
     */
    async getContextWithSources(
        query: string,
        k: number = this.config.topK
    ): Promise<RetrievalResult> {
        const chunks = await this.retrieveRelevantChunks(query, k);

        const contextParts: string[] = [];
        const sources = new Map<string, Source>();

        chunks.forEach((chunk, i) => {
            const { source, title, url } = chunk.metadata;
            contextParts.push(`[Source ${i + 1}: ${source} - ${title}]\n${chunk.content}\n`);

            const entry: Source = { source, title, url };
            const key = sourceKey(entry);
            if (!sources.has(key)) {
                sources.set(key, entry);
            }
        });

        return {
            context: contextParts.join('\n'),
            sources: [...sources.values()],
        };
    }

    /**
     * Distinct sources by name, each with the title and url first seen for
     * that name, in ingestion order.
     */
    getAllSources(): Source[] {
        const sources = new Map<string, Source>();

        for (const chunk of this.index.getChunks()) {
            const { source, title, url } = chunk.metadata;
            if (!sources.has(source)) {
                sources.set(source, { source, title, url });
            }
        }

        return [...sources.values()];
    }

    getChunks(): Chunk[] {
        return this.index.getChunks();
    }

    getChunksForSource(sourceName: string): Chunk[] {
        return this.index.getChunks().filter((chunk) => chunk.metadata.source === sourceName);
    }

    hasDocuments(): boolean {
        return this.index.size() > 0;
    }

    isReady(): boolean {
        return this.index.isBuilt();
    }

    getStats(): PipelineStats {
        return {
            documentCount: this.documentCount,
            chunkCount: this.index.size(),
            sourceCount: this.getAllSources().length,
        };
    }
}

/**
 * Factory function to create a RAG pipeline.
 */
export function createRAGPipeline(
    embedder: EmbeddingCapability,
    config?: Partial<RAGPipelineConfig>,
    createStore?: VectorStoreFactory
): RAGPipeline {
    return new RAGPipeline(embedder, config, createStore);
}
