/**
 * Chat Engine Service
 *
 * Conversational layer on top of the RAG pipeline. Composes:
 * - RAGPipeline: retrieval and citation-tagged context
 * - ConversationMemory: recent turns for follow-up questions
 * - Prompt templates: one per generation mode
 * - A language-model capability: the only suspension point of each call
 *
 * Public operations: ask, compareSources, generateSummary,
 * analyzeSentiment, extractFacts, clearMemory.
 *
 * A turn is written to memory only after the model has answered, so a
 * failed or abandoned generation leaves the conversation as it was.
 */

import {
    AskResult,
    ChatEngineState,
    Chunk,
    ContentItem,
    ConversationTurn,
    FactExtractionResult,
    IngestionSummary,
    LanguageModelCapability,
    SentimentResult,
    Source,
} from '../../shared/types';
import { GenerationServiceError, NotReadyError, toError } from '../errors';
import {
    ConversationMemory,
    DEFAULT_HISTORY_TURNS,
    createConversationMemory,
} from './conversationMemory';
import {
    SummaryTone,
    formatComparisonPrompt,
    formatFactExtractionPrompt,
    formatQaPrompt,
    formatSentimentPrompt,
    formatSummaryPrompt,
} from './prompts';
import { IRAGPipeline, PipelineStats } from './ragPipeline';

export const NO_SOURCES_TO_COMPARE = 'No sources to compare.';
export const NO_CONTENT_TO_SUMMARIZE = 'No content to summarize.';

/** Leading chunks of each source used as its comparison sample */
export const COMPARISON_CHUNKS_PER_SOURCE = 3;
/** Leading chunks of each source used for sentiment and fact extraction */
export const ANALYSIS_CHUNKS_PER_SOURCE = 2;
/** Leading chunks of the whole corpus fed to the summary */
export const SUMMARY_CHUNK_LIMIT = 10;

/**
 * Configuration for the chat engine.
 */
export interface ChatEngineConfig {
    /** Chunks retrieved per question */
    topK: number;
    /** Recent turns included in the Q&A prompt */
    historyTurns: number;
}

export const DEFAULT_CHAT_ENGINE_CONFIG: ChatEngineConfig = {
    topK: 5,
    historyTurns: DEFAULT_HISTORY_TURNS,
};

export interface ChatEngineStats extends PipelineStats {
    turnCount: number;
}

function joinContents(chunks: Chunk[], separator: string): string {
    return chunks.map((chunk) => chunk.content).join(separator);
}

export class ChatEngine {
    private readonly config: ChatEngineConfig;
    /** Model calls in flight; concurrent requests may share one engine */
    private pendingCalls = 0;

    constructor(
        private readonly pipeline: IRAGPipeline,
        private readonly llm: LanguageModelCapability,
        private readonly memory: ConversationMemory = createConversationMemory(),
        config: Partial<ChatEngineConfig> = {}
    ) {
        this.config = { ...DEFAULT_CHAT_ENGINE_CONFIG, ...config };
    }

    /**
     * Ingest fetched content into this engine's pipeline.
     * @see RAGPipeline.ingestDocuments
     */
    async ingest(items: ContentItem[]): Promise<IngestionSummary> {
        return this.pipeline.ingestDocuments(items);
    }

    /**
     * Answer a question from retrieved context and recent history.
     *
     * @throws NotReadyError if nothing has been ingested
     * @throws EmbeddingServiceError if the question cannot be embedded
     * @throws GenerationServiceError if the model call fails (memory unchanged)
     */
    async ask(question: string): Promise<AskResult> {
        if (!this.pipeline.isReady()) {
            throw new NotReadyError();
        }

        const { context, sources } = await this.pipeline.getContextWithSources(
            question,
            this.config.topK
        );

        const prompt = formatQaPrompt({
            context,
            chatHistory: this.memory.formatHistory(this.config.historyTurns),
            question,
        });

        const answer = await this.generate(prompt);
        this.memory.append(question, answer);

        return {
            answer,
            sources,
            contextUsed: context,
        };
    }

    /**
     * Compare how each source covers the topic, using the first chunks of
     * every source as its sample.
     */
    async compareSources(): Promise<string> {
        if (!this.pipeline.hasDocuments()) {
            return NO_SOURCES_TO_COMPARE;
        }

        const sources = this.pipeline.getAllSources();

        const sourcesContent = sources.map((source) => {
            const sample = this.sampleSource(source, COMPARISON_CHUNKS_PER_SOURCE);
            return `**${source.source}:**\n${joinContents(sample, '\n')}\n`;
        });

        const sourceBreakdown = sources
            .map((source) => `- ${source.source}: ${source.title}`)
            .join('\n');

        const prompt = formatComparisonPrompt({
            sourcesContent: sourcesContent.join('\n---\n'),
            sourceBreakdown,
        });

        return this.generate(prompt);
    }

    /**
     * Summarize the start of the corpus in the requested tone and length.
     * Lengths other than short/medium/long use the medium word band.
     */
    async generateSummary(tone: SummaryTone = 'casual', length: string = 'medium'): Promise<string> {
        if (!this.pipeline.hasDocuments()) {
            return NO_CONTENT_TO_SUMMARIZE;
        }

        const content = joinContents(
            this.pipeline.getChunks().slice(0, SUMMARY_CHUNK_LIMIT),
            '\n\n'
        );

        return this.generate(formatSummaryPrompt({ content, tone, length }));
    }

    /**
     * One sentiment report per source, in source order.
     */
    async analyzeSentiment(): Promise<SentimentResult[]> {
        const results: SentimentResult[] = [];

        for (const source of this.pipeline.getAllSources()) {
            const text = joinContents(this.sampleSource(source, ANALYSIS_CHUNKS_PER_SOURCE), '\n');
            const analysis = await this.generate(
                formatSentimentPrompt({ text, source: source.source })
            );
            results.push({ source: source.source, analysis });
        }

        return results;
    }

    /**
     * Key claims of each source, labelled fact, opinion or speculation.
     */
    async extractFacts(): Promise<FactExtractionResult[]> {
        const results: FactExtractionResult[] = [];

        for (const source of this.pipeline.getAllSources()) {
            const text = joinContents(this.sampleSource(source, ANALYSIS_CHUNKS_PER_SOURCE), '\n');
            const facts = await this.generate(
                formatFactExtractionPrompt({ text, source: source.source })
            );
            results.push({ source: source.source, facts });
        }

        return results;
    }

    clearMemory(): void {
        this.memory.clear();
    }

    getHistory(nTurns: number = this.config.historyTurns): ConversationTurn[] {
        return this.memory.recent(nTurns);
    }

    getSources(): Source[] {
        return this.pipeline.getAllSources();
    }

    getState(): ChatEngineState {
        return this.pendingCalls > 0 ? 'awaiting-response' : 'idle';
    }

    isReady(): boolean {
        return this.pipeline.isReady();
    }

    getStats(): ChatEngineStats {
        return {
            ...this.pipeline.getStats(),
            turnCount: this.memory.size(),
        };
    }

    private sampleSource(source: Source, limit: number): Chunk[] {
        return this.pipeline.getChunksForSource(source.source).slice(0, limit);
    }

    /**
     * Single-shot model call. Failures surface as GenerationServiceError
     * and are not retried.
     */
    private async generate(prompt: string): Promise<string> {
        this.pendingCalls++;
        try {
            return await this.llm.generate(prompt);
        } catch (error) {
            if (error instanceof GenerationServiceError) {
                throw error;
            }
            const cause = toError(error);
            throw new GenerationServiceError(`Language model request failed: ${cause.message}`, cause);
        } finally {
            this.pendingCalls--;
        }
    }
}

/**
 * Factory function to create a chat engine.
 */
export function createChatEngine(
    pipeline: IRAGPipeline,
    llm: LanguageModelCapability,
    config?: Partial<ChatEngineConfig>
): ChatEngine {
    return new ChatEngine(pipeline, llm, createConversationMemory(), config);
}
