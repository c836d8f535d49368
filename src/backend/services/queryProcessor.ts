/**
 * Query Processor Service
 *
 * Validates request input before it reaches a chat engine, so invalid
 * requests are rejected without touching the embedding or language model.
 *
 * - validateQuery: questions must contain non-whitespace text
 * - parseIngestRequest: a list of well-formed content items
 * - parseSummaryRequest: a known tone and a free-text length
 */

import { ContentItem } from '../../shared/types';
import { SummaryTone, SUMMARY_TONES, isSummaryTone } from './prompts';

/**
 * Result of query validation.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

/**
 * Result of parsing a request body.
 */
export type ParseResult<T> = { valid: true; value: T } | { valid: false; error: string };

export interface SummaryOptions {
    tone: SummaryTone;
    length: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Validates a user question before processing.
 *
 * @param query - The user's input, as received
 * @returns ValidationResult indicating if the query is valid
 */
export function validateQuery(query: unknown): ValidationResult {
    if (typeof query !== 'string') {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs, newlines and other whitespace
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

/**
 * Type guard for one item from the content source.
 */
export function isContentItem(value: unknown): value is ContentItem {
    return (
        isRecord(value) &&
        typeof value.content === 'string' &&
        typeof value.url === 'string' &&
        typeof value.title === 'string' &&
        typeof value.sourceName === 'string' &&
        typeof value.success === 'boolean'
    );
}

/**
 * Parses the body of an ingestion request: `{ items: ContentItem[] }`.
 */
export function parseIngestRequest(body: unknown): ParseResult<ContentItem[]> {
    if (!isRecord(body) || !Array.isArray(body.items)) {
        return { valid: false, error: 'Request body must contain an "items" array' };
    }

    const items: ContentItem[] = [];
    for (const [index, item] of body.items.entries()) {
        if (!isContentItem(item)) {
            return {
                valid: false,
                error: `Item ${index} must have string content, url, title, sourceName and a boolean success`,
            };
        }
        items.push(item);
    }

    return { valid: true, value: items };
}

/**
 * Parses the body of a summary request: `{ tone?, length? }`.
 * Tone defaults to casual, length to medium.
 */
export function parseSummaryRequest(body: unknown): ParseResult<SummaryOptions> {
    const fields: Record<string, unknown> = isRecord(body) ? body : {};
    const tone = fields.tone ?? 'casual';
    const length = fields.length ?? 'medium';

    if (!isSummaryTone(tone)) {
        return {
            valid: false,
            error: `Unknown tone. Supported tones: ${SUMMARY_TONES.join(', ')}`,
        };
    }

    if (typeof length !== 'string') {
        return { valid: false, error: 'Length must be a string' };
    }

    return { valid: true, value: { tone, length } };
}
