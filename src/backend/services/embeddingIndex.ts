/**
 * Embedding Index Service
 *
 * Wraps an embedding capability and a vector store:
 * - build(): embeds every chunk once and fills a fresh store
 * - search(): embeds the query and returns the top-k chunks
 *
 * A build only becomes visible once every chunk has been embedded; if any
 * embedding call fails, the previous index stays in place untouched.
 */

import { Chunk, EmbeddingCapability } from '../../shared/types';
import { EmbeddingServiceError, IndexNotBuiltError, toError } from '../errors';
import { IVectorStore, createVectorStore } from './vectorStore';

/**
 * A chunk paired with its similarity to the query.
 */
export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

export type VectorStoreFactory = () => IVectorStore;

function isVector(value: unknown): value is number[] {
    return (
        Array.isArray(value) &&
        value.length > 0 &&
        value.every((item) => typeof item === 'number' && Number.isFinite(item))
    );
}

export class EmbeddingIndex {
    private store: IVectorStore | null = null;

    constructor(
        private readonly embedder: EmbeddingCapability,
        private readonly createStore: VectorStoreFactory = createVectorStore
    ) {}

    /**
     * Embed chunks and replace the current index.
     *
     * @returns Number of indexed chunks
     * @throws EmbeddingServiceError if the embedding capability fails or
     *   returns vectors of inconsistent length
     */
    async build(chunks: Chunk[]): Promise<number> {
        const store = this.createStore();
        let dimension: number | null = null;

        for (const chunk of chunks) {
            const vector = await this.embed(chunk.content);

            if (dimension === null) {
                dimension = vector.length;
            } else if (vector.length !== dimension) {
                throw new EmbeddingServiceError(
                    `Embedding length mismatch: expected ${dimension}, got ${vector.length}`
                );
            }

            store.add({ chunk, vector });
        }

        this.store = store;
        return store.size();
    }

    /**
     * Top-k chunks for a query, most similar first.
     * @see searchWithScores
     */
    async search(query: string, k: number): Promise<Chunk[]> {
        const results = await this.searchWithScores(query, k);
        return results.map((result) => result.chunk);
    }

    /**
     * Top-k chunks with their cosine similarity to the query.
     *
     * `k` is clamped to the number of indexed chunks; `k <= 0` returns an
     * empty list without calling the embedding capability.
     *
     * @throws IndexNotBuiltError if build() has not completed yet
     */
    async searchWithScores(query: string, k: number): Promise<ScoredChunk[]> {
        const store = this.store;
        if (!store) {
            throw new IndexNotBuiltError();
        }

        if (k <= 0 || store.size() === 0) {
            return [];
        }

        const queryVector = await this.embed(query);
        const dimension = store.dimension();
        if (dimension !== null && queryVector.length !== dimension) {
            throw new EmbeddingServiceError(
                `Query embedding length ${queryVector.length} does not match index dimension ${dimension}`
            );
        }

        return store.search(queryVector, k).map((result) => ({
            chunk: result.entry.chunk,
            score: result.score,
        }));
    }

    isBuilt(): boolean {
        return this.store !== null;
    }

    size(): number {
        return this.store ? this.store.size() : 0;
    }

    /**
     * Indexed chunks in ingestion order.
     */
    getChunks(): Chunk[] {
        return this.store ? this.store.getAll().map((entry) => entry.chunk) : [];
    }

    private async embed(text: string): Promise<number[]> {
        let vector: unknown;
        try {
            vector = await this.embedder.embed(text);
        } catch (error) {
            if (error instanceof EmbeddingServiceError) {
                throw error;
            }
            const cause = toError(error);
            throw new EmbeddingServiceError(`Embedding request failed: ${cause.message}`, cause);
        }

        if (!isVector(vector)) {
            throw new EmbeddingServiceError('Embedding service returned a malformed vector');
        }
        return vector;
    }
}

/**
 * Factory function to create an embedding index.
 */
export function createEmbeddingIndex(
    embedder: EmbeddingCapability,
    createStore?: VectorStoreFactory
): EmbeddingIndex {
    return new EmbeddingIndex(embedder, createStore);
}
