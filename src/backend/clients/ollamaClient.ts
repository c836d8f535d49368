/**
 * Ollama Client
 *
 * Wrapper for communicating with a local Ollama instance.
 * It implements both capabilities the assistant needs:
 * - EmbeddingCapability: embed() via POST /api/embeddings
 * - LanguageModelCapability: generate() via POST /api/generate (non-streaming)
 *
 * GET /api/tags is used as the health check.
 *
 * Transport problems are raised as OllamaError; the capability methods wrap
 * them into EmbeddingServiceError / GenerationServiceError so the services
 * never see transport details.
 */

import {
    EmbeddingCapability,
    GenerationOptions,
    LanguageModelCapability,
} from '../../shared/types';
import { EmbeddingServiceError, GenerationServiceError } from '../errors';

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for text generation */
    defaultModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Sampling temperature for generation */
    temperature: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3.2',
    embeddingModel: 'nomic-embed-text',
    temperature: 0.3,
    timeoutMs: 120000,
};

/**
 * Custom error class for Ollama-specific errors.
 */
export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Ollama answered with a body we cannot use */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Interface defining the Ollama client contract.
 */
export interface IOllamaClient extends EmbeddingCapability, LanguageModelCapability {
    isAvailable(): Promise<boolean>;
    generateCompletion(prompt: string, options?: GenerationOptions): Promise<string>;
    generateEmbedding(text: string): Promise<number[]>;
}

/**
 * Ollama Client Implementation
 */
export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     *
     * @returns true if Ollama is available, false otherwise
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch (error) {
            console.error('Ollama health check failed:', error);
            return false;
        }
    }

    /**
     * LanguageModelCapability: one completion with the configured model.
     * @throws GenerationServiceError
     */
    async generate(prompt: string): Promise<string> {
        try {
            return await this.generateCompletion(prompt);
        } catch (error) {
            const cause = this.wrapError(error, 'Failed to generate completion');
            throw new GenerationServiceError(cause.message, cause);
        }
    }

    /**
     * EmbeddingCapability: one embedding with the configured embedding model.
     * @throws EmbeddingServiceError
     */
    async embed(text: string): Promise<number[]> {
        try {
            return await this.generateEmbedding(text);
        } catch (error) {
            const cause = this.wrapError(error, 'Failed to generate embedding');
            throw new EmbeddingServiceError(cause.message, cause);
        }
    }

    /**
     * Generate a text completion using Ollama.
     *
     * @param prompt - The text prompt to send to the model
     * @param options - Optional generation parameters
     * @returns The generated text response
     * @throws OllamaError if generation fails
     */
    async generateCompletion(
        prompt: string,
        options: GenerationOptions = {}
    ): Promise<string> {
        const model = options.model ?? this.config.defaultModel;

        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/generate`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model,
                        prompt,
                        stream: false,
                        options: {
                            temperature: options.temperature ?? this.config.temperature,
                            num_predict: options.maxTokens ?? 2048,
                        },
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            const data: unknown = await response.json();
            if (!isRecord(data) || typeof data.response !== 'string') {
                throw new OllamaError(
                    'Ollama returned no completion text',
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }
            return data.response;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate completion');
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @param text - The text to embed
     * @returns The embedding vector
     * @throws OllamaError if embedding generation fails
     */
    async generateEmbedding(text: string): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embeddings`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        prompt: text,
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            const data: unknown = await response.json();
            const embedding = isRecord(data) ? data.embedding : undefined;
            if (
                !Array.isArray(embedding) ||
                !embedding.every((value): value is number => typeof value === 'number')
            ) {
                throw new OllamaError(
                    'Ollama returned no embedding vector',
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }
            return embedding;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * Fetch with a timeout enforced through AbortController.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new OllamaError(
                    `Request timed out after ${timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     * - 404: Model not found (user needs to pull it)
     * - Others: API errors
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage =
                isRecord(errorBody) && typeof errorBody.error === 'string'
                    ? errorBody.error
                    : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(
            `Ollama API error: ${errorMessage}`,
            OllamaErrorCode.API_ERROR
        );
    }

    /**
     * Wrap errors in OllamaError for consistent error handling.
     */
    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Connection errors (Ollama not running)
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(
            `${context}: ${message}`,
            OllamaErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

/**
 * Factory function to create an Ollama client.
 */
export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
