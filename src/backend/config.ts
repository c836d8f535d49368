/**
 * Application configuration
 *
 * Every service has its own DEFAULT_*_CONFIG; this module overlays
 * environment variables on top of them. The entry point loads `.env`
 * through dotenv before calling loadConfig().
 *
 * Recognized variables:
 * - PORT, CORS_ORIGIN
 * - OLLAMA_BASE_URL, OLLAMA_MODEL, OLLAMA_EMBEDDING_MODEL,
 *   OLLAMA_TIMEOUT_MS, OLLAMA_TEMPERATURE
 * - CHUNK_SIZE, CHUNK_OVERLAP, RETRIEVAL_TOP_K
 */

import { ConfigurationError } from './errors';
import { DEFAULT_OLLAMA_CONFIG, OllamaClientConfig } from './clients/ollamaClient';
import {
    ChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
    validateChunkingConfig,
} from './services/documentChunker';

export interface AppConfig {
    port: number;
    corsOrigin: string;
    ollama: OllamaClientConfig;
    chunking: ChunkingConfig;
    topK: number;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_APP_CONFIG: AppConfig = {
    port: 3001,
    corsOrigin: '*',
    ollama: DEFAULT_OLLAMA_CONFIG,
    chunking: DEFAULT_CHUNKING_CONFIG,
    topK: 5,
};

function readString(env: Environment, name: string, fallback: string): string {
    const value = env[name]?.trim();
    return value ? value : fallback;
}

function readNumber(
    env: Environment,
    name: string,
    fallback: number,
    { integer = true, min = 0 }: { integer?: boolean; min?: number } = {}
): number {
    const raw = env[name]?.trim();
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min) {
        throw new ConfigurationError(`Invalid value for ${name}: "${raw}"`);
    }
    return value;
}

/**
 * Build the application configuration from environment variables.
 *
 * @throws ConfigurationError for malformed numbers or inconsistent chunking settings
 */
export function loadConfig(env: Environment = process.env): AppConfig {
    const defaults = DEFAULT_APP_CONFIG;

    const chunking: ChunkingConfig = {
        ...defaults.chunking,
        chunkSize: readNumber(env, 'CHUNK_SIZE', defaults.chunking.chunkSize, { min: 1 }),
        chunkOverlap: readNumber(env, 'CHUNK_OVERLAP', defaults.chunking.chunkOverlap),
    };
    validateChunkingConfig(chunking);

    return {
        port: readNumber(env, 'PORT', defaults.port, { min: 1 }),
        corsOrigin: readString(env, 'CORS_ORIGIN', defaults.corsOrigin),
        ollama: {
            baseUrl: readString(env, 'OLLAMA_BASE_URL', defaults.ollama.baseUrl),
            defaultModel: readString(env, 'OLLAMA_MODEL', defaults.ollama.defaultModel),
            embeddingModel: readString(env, 'OLLAMA_EMBEDDING_MODEL', defaults.ollama.embeddingModel),
            temperature: readNumber(env, 'OLLAMA_TEMPERATURE', defaults.ollama.temperature, {
                integer: false,
            }),
            timeoutMs: readNumber(env, 'OLLAMA_TIMEOUT_MS', defaults.ollama.timeoutMs, { min: 1 }),
        },
        chunking,
        topK: readNumber(env, 'RETRIEVAL_TOP_K', defaults.topK, { min: 1 }),
    };
}
