/**
 * Vector Store Service
 *
 * In-memory vector store for semantic similarity search.
 *
 * HOW IT WORKS:
 * 1. Chunks are stored alongside their embedding vectors
 * 2. A query is embedded with the same model
 * 3. Every stored vector is scored against the query with cosine similarity
 * 4. The highest scores win; ties keep insertion order
 */

import { IndexedChunk } from '../../shared/types';

/**
 * Result of a similarity search.
 */
export interface SearchResult {
    entry: IndexedChunk;
    score: number; // Cosine similarity, higher = more similar
}

/**
 * Interface for vector store operations.
 */
export interface IVectorStore {
    add(entry: IndexedChunk): void;
    addMany(entries: IndexedChunk[]): void;
    search(queryVector: number[], limit: number): SearchResult[];
    getAll(): IndexedChunk[];
    size(): number;
    /** Vector length shared by every entry, or null while empty */
    dimension(): number | null;
    clear(): void;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * - 1.0 = identical direction (most similar)
 * - 0.0 = perpendicular (unrelated)
 * - -1.0 = opposite direction
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
    }

    if (a.length === 0) {
        return 0;
    }

    let dotProduct = 0;
    let magnitudeA = 0;
    let magnitudeB = 0;

    for (let i = 0; i < a.length; i++) {
        const aVal = a[i] ?? 0;
        const bVal = b[i] ?? 0;
        dotProduct += aVal * bVal;
        magnitudeA += aVal * aVal;
        magnitudeB += bVal * bVal;
    }

    const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

    // Zero vectors are unrelated to everything
    if (magnitude === 0) {
        return 0;
    }

    return dotProduct / magnitude;
}

/**
 * In-memory Vector Store implementation.
 *
 * Entries are kept in insertion order, which doubles as the tie-breaker
 * for equal scores.
 */
export class InMemoryVectorStore implements IVectorStore {
    private entries: IndexedChunk[] = [];

    /**
     * Add a single entry to the store.
     * @throws Error if the vector length differs from the stored ones
     */
    add(entry: IndexedChunk): void {
        const dimension = this.dimension();
        if (dimension !== null && entry.vector.length !== dimension) {
            throw new Error(
                `Vector dimension mismatch: expected ${dimension}, got ${entry.vector.length}`
            );
        }
        this.entries.push(entry);
    }

    addMany(entries: IndexedChunk[]): void {
        for (const entry of entries) {
            this.add(entry);
        }
    }

    /**
     * Search for entries most similar to the query vector.
     *
     * @param queryVector - The embedding vector to search for
     * @param limit - Maximum number of results; clamped to the store size, 0 or less yields []
     * @returns Results sorted by similarity (highest first)
     */
    search(queryVector: number[], limit: number): SearchResult[] {
        if (limit <= 0 || this.entries.length === 0) {
            return [];
        }

        const results: SearchResult[] = this.entries.map((entry) => ({
            entry,
            score: cosineSimilarity(queryVector, entry.vector),
        }));

        // Array.prototype.sort is stable, so equal scores keep insertion order
        results.sort((a, b) => b.score - a.score);

        return results.slice(0, Math.min(limit, results.length));
    }

    getAll(): IndexedChunk[] {
        return [...this.entries];
    }

    size(): number {
        return this.entries.length;
    }

    dimension(): number | null {
        const first = this.entries[0];
        return first ? first.vector.length : null;
    }

    clear(): void {
        this.entries = [];
    }
}

/**
 * Factory function to create a vector store.
 */
export function createVectorStore(): IVectorStore {
    return new InMemoryVectorStore();
}
