/**
 * Session Manager Service
 *
 * Keeps the chat sessions of a running server. Each session owns its own
 * ChatEngine, and with it its own RAG pipeline, embedding index and
 * conversation memory; sessions share only the stateless model clients.
 *
 * Sessions live in memory for the lifetime of the process.
 */

import { v4 as uuidv4 } from 'uuid';
import {
    EmbeddingCapability,
    LanguageModelCapability,
    SessionSummary,
} from '../../shared/types';
import { SessionNotFoundError } from '../errors';
import { ChatEngine, ChatEngineConfig, createChatEngine } from './chatEngine';
import { RAGPipelineConfig, createRAGPipeline } from './ragPipeline';

/**
 * A chat session and the engine that serves it.
 */
export interface ChatSession {
    id: string;
    createdAt: Date;
    engine: ChatEngine;
}

/**
 * Configuration options for the SessionManager.
 */
export interface SessionManagerConfig {
    /** Embedding capability shared by every session's index */
    embedder: EmbeddingCapability;
    /** Language model shared by every session's engine */
    llm: LanguageModelCapability;
    /** Pipeline settings applied to new sessions */
    rag?: Partial<RAGPipelineConfig>;
    /** Engine settings applied to new sessions */
    chat?: Partial<ChatEngineConfig>;
}

export class SessionManager {
    private readonly sessions = new Map<string, ChatSession>();
    private readonly config: SessionManagerConfig;

    constructor(config: SessionManagerConfig) {
        this.config = config;
    }

    /**
     * Creates a new session with an empty corpus and empty memory.
     */
    createSession(): ChatSession {
        const pipeline = createRAGPipeline(this.config.embedder, this.config.rag);
        const session: ChatSession = {
            id: uuidv4(),
            createdAt: new Date(),
            engine: createChatEngine(pipeline, this.config.llm, this.config.chat),
        };

        this.sessions.set(session.id, session);
        return session;
    }

    /**
     * @returns The session if found, null otherwise
     */
    getSession(id: string): ChatSession | null {
        return this.sessions.get(id) ?? null;
    }

    /**
     * @throws SessionNotFoundError if the session doesn't exist
     */
    requireSession(id: string): ChatSession {
        const session = this.getSession(id);
        if (!session) {
            throw new SessionNotFoundError(id);
        }
        return session;
    }

    /**
     * Summaries of all sessions, most recently created first.
     */
    listSessions(): SessionSummary[] {
        const sessions = [...this.sessions.values()].reverse();
        sessions.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
        return sessions.map((session) => this.summarize(session));
    }

    /**
     * @returns true if deleted, false if session didn't exist
     */
    deleteSession(id: string): boolean {
        return this.sessions.delete(id);
    }

    size(): number {
        return this.sessions.size;
    }

    summarize(session: ChatSession): SessionSummary {
        const stats = session.engine.getStats();
        return {
            id: session.id,
            createdAt: session.createdAt.toISOString(),
            documentCount: stats.documentCount,
            chunkCount: stats.chunkCount,
            turnCount: stats.turnCount,
        };
    }
}

/**
 * Factory function to create a SessionManager instance.
 */
export function createSessionManager(config: SessionManagerConfig): SessionManager {
    return new SessionManager(config);
}
