/**
 * Document Chunker Service
 *
 * Splits documents into overlapping chunks for embedding and retrieval.
 *
 * The splitter is recursive over a prioritized list of separators:
 * paragraph break, line break, sentence end, space, and finally single
 * characters. Text is split on the first separator it contains; pieces that
 * are still too long are split again with the next separators, and short
 * pieces are merged back into windows of at most `chunkSize` characters that
 * overlap by at most `chunkOverlap` characters.
 *
 * Every chunk carries its parent document's metadata unchanged, and never
 * spans two documents.
 */

import { Chunk, Document } from '../../shared/types';
import { ConfigurationError, EmptyInputError, NoValidContentError } from '../errors';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
    /** Maximum size for each chunk in characters */
    chunkSize: number;
    /** Maximum number of characters shared by consecutive chunks */
    chunkOverlap: number;
    /** Separators tried in order; '' splits into single characters */
    separators: string[];
}

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Default chunking configuration.
 * 1000 chars is roughly 200-250 tokens, which fits most embedding models.
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
    chunkSize: 1000,
    chunkOverlap: 200,
    separators: [...DEFAULT_SEPARATORS],
};

/**
 * Reject configurations the merge step cannot honor.
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
    if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
        throw new ConfigurationError(`chunkSize must be a positive integer, got ${config.chunkSize}`);
    }
    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
        throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${config.chunkOverlap}`);
    }
    if (config.chunkOverlap >= config.chunkSize) {
        throw new ConfigurationError(
            `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
        );
    }
}

/**
 * Split on a literal separator, keeping the separator at the start of the
 * piece that follows it so that joining the pieces gives back the text.
 */
function splitOnSeparator(text: string, separator: string): string[] {
    if (separator === '') {
        return Array.from(text);
    }

    const [first = '', ...rest] = text.split(separator);
    return [first, ...rest.map((part) => separator + part)].filter((piece) => piece !== '');
}

function pushWindow(chunks: string[], window: string[]): void {
    const content = window.join('').trim();
    if (content.length > 0) {
        chunks.push(content);
    }
}

/**
 * Merge short pieces into windows of at most chunkSize characters.
 *
 * When the next piece would overflow the window, the window is emitted and
 * pieces are dropped from its front until what remains fits in the overlap
 * budget and leaves room for the next piece.
 */
function mergePieces(pieces: string[], chunkSize: number, chunkOverlap: number): string[] {
    const chunks: string[] = [];
    let window: string[] = [];
    let total = 0;

    for (const piece of pieces) {
        if (total + piece.length > chunkSize && window.length > 0) {
            pushWindow(chunks, window);

            while (total > chunkOverlap || (total + piece.length > chunkSize && total > 0)) {
                const dropped = window.shift();
                total -= dropped === undefined ? total : dropped.length;
            }
        }

        window.push(piece);
        total += piece.length;
    }

    pushWindow(chunks, window);
    return chunks;
}

/**
 * Recursively split one text into chunk contents.
 */
function splitText(text: string, separators: string[], config: ChunkingConfig): string[] {
    let separator = separators[separators.length - 1] ?? '';
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i++) {
        const candidate = separators[i] ?? '';
        if (candidate === '') {
            separator = candidate;
            break;
        }
        if (text.includes(candidate)) {
            separator = candidate;
            remaining = separators.slice(i + 1);
            break;
        }
    }

    const chunks: string[] = [];
    let shortPieces: string[] = [];

    for (const piece of splitOnSeparator(text, separator)) {
        if (piece.length < config.chunkSize) {
            shortPieces.push(piece);
            continue;
        }

        if (shortPieces.length > 0) {
            chunks.push(...mergePieces(shortPieces, config.chunkSize, config.chunkOverlap));
            shortPieces = [];
        }

        if (remaining.length === 0) {
            // Nothing left to split on: emit the unit as-is rather than truncate it.
            chunks.push(piece);
        } else {
            chunks.push(...splitText(piece, remaining, config));
        }
    }

    if (shortPieces.length > 0) {
        chunks.push(...mergePieces(shortPieces, config.chunkSize, config.chunkOverlap));
    }

    return chunks;
}

/**
 * Split a single text into chunk contents.
 */
export function splitIntoChunks(
    text: string,
    config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): string[] {
    if (text.trim().length === 0) {
        return [];
    }
    return splitText(text, config.separators, config);
}

/**
 * Split documents into chunks, preserving document order and metadata.
 *
 * Documents whose content is empty after trimming are skipped.
 *
 * @throws EmptyInputError when no documents are given
 * @throws NoValidContentError when every document is empty
 */
export function splitDocuments(
    documents: Document[],
    config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): Chunk[] {
    if (documents.length === 0) {
        throw new EmptyInputError('No documents to split');
    }

    const withContent = documents.filter((doc) => doc.content.trim().length > 0);
    if (withContent.length === 0) {
        throw new NoValidContentError('Every document is empty after stripping whitespace');
    }

    const chunks: Chunk[] = [];
    for (const doc of withContent) {
        for (const content of splitIntoChunks(doc.content, config)) {
            chunks.push({
                content,
                metadata: { ...doc.metadata },
            });
        }
    }

    return chunks;
}

/**
 * Document Chunker holding a validated configuration.
 */
export class DocumentChunker {
    private readonly config: ChunkingConfig;

    constructor(config: Partial<ChunkingConfig> = {}) {
        this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
        validateChunkingConfig(this.config);
    }

    /**
     * Split documents into chunks.
     * @see splitDocuments
     */
    split(documents: Document[]): Chunk[] {
        return splitDocuments(documents, this.config);
    }

    getConfig(): ChunkingConfig {
        return { ...this.config, separators: [...this.config.separators] };
    }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
    return new DocumentChunker(config);
}
