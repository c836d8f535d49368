/**
 * External service clients
 *
 * OllamaClient provides both model capabilities the services depend on:
 * EmbeddingCapability (embed) and LanguageModelCapability (generate).
 */

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
} from './ollamaClient';

export type { IOllamaClient, OllamaClientConfig } from './ollamaClient';

export type { EmbeddingCapability, LanguageModelCapability } from '../../shared/types';
