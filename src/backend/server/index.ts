/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of the Research Assistant. It exposes REST endpoints for:
 * - Health checks (Ollama connectivity)
 * - Session management (one corpus and one conversation per session)
 * - Ingestion of fetched content into a session
 * - The chat operations: ask, compare, summary, sentiment, facts
 * - Conversation memory inspection and reset
 *
 * Routes only validate input and delegate to the session's ChatEngine;
 * every failure goes through the error middleware at the bottom.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { ErrorResponse, HealthResponse } from '../../shared/types';
import { AppConfig, DEFAULT_APP_CONFIG } from '../config';
import { AssistantError, AssistantErrorCode, SessionNotFoundError } from '../errors';
import { IOllamaClient, createOllamaClient } from '../clients/ollamaClient';
import {
    SessionManager,
    createSessionManager,
    parseIngestRequest,
    parseSummaryRequest,
    validateQuery,
} from '../services';

/**
 * Server configuration options.
 */
export interface ServerConfig extends AppConfig {
    /** Ollama client instance (for dependency injection) */
    ollamaClient?: IOllamaClient;
    /** Session manager instance (for dependency injection) */
    sessionManager?: SessionManager;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = DEFAULT_APP_CONFIG;

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

const STATUS_BY_CODE: Record<AssistantErrorCode, number> = {
    [AssistantErrorCode.EMPTY_INPUT]: 422,
    [AssistantErrorCode.NO_VALID_CONTENT]: 422,
    [AssistantErrorCode.INDEX_NOT_BUILT]: 409,
    [AssistantErrorCode.NOT_READY]: 409,
    [AssistantErrorCode.EMBEDDING_SERVICE]: 502,
    [AssistantErrorCode.GENERATION_SERVICE]: 502,
    [AssistantErrorCode.SESSION_NOT_FOUND]: 404,
    [AssistantErrorCode.MISSING_PROMPT_VARIABLE]: 500,
    [AssistantErrorCode.CONFIGURATION]: 500,
};

/**
 * HTTP status and body for an error reaching the error middleware.
 * Unknown errors become a generic 500.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
    if (err instanceof ApiError) {
        return { status: err.statusCode, body: { error: err.message, code: err.code } };
    }

    if (err instanceof AssistantError) {
        const status = STATUS_BY_CODE[err.code];
        if (status >= 500 && status < 502) {
            return { status, body: { error: 'Internal server error', code: err.code } };
        }
        return { status, body: { error: err.message, code: err.code } };
    }

    // body-parser marks malformed JSON with a 4xx status
    if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        return { status: err.status, body: { error: err.message, code: 'INVALID_REQUEST' } };
    }

    return { status: 500, body: { error: 'Internal server error' } };
}

function readTurns(value: unknown): number | undefined {
    if (typeof value !== 'string' || value.trim() === '') {
        return undefined;
    }
    const turns = Number(value);
    if (!Number.isInteger(turns) || turns < 0) {
        throw new ApiError('turns must be a non-negative integer', 400, 'INVALID_TURNS');
    }
    return turns;
}

/**
 * Creates and configures the Express application.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig: ServerConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const ollamaClient = mergedConfig.ollamaClient || createOllamaClient(mergedConfig.ollama);

    const sessionManager =
        mergedConfig.sessionManager ||
        createSessionManager({
            embedder: ollamaClient,
            llm: ollamaClient,
            rag: { topK: mergedConfig.topK, chunking: mergedConfig.chunking },
            chat: { topK: mergedConfig.topK },
        });

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type'],
        })
    );

    // Scraped pages can be large
    app.use(express.json({ limit: '10mb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 200 when Ollama answers, 503 otherwise.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        const ollamaAvailable = await ollamaClient.isAvailable();

        const response: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
        };

        res.status(ollamaAvailable ? 200 : 503).json(response);
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    app.post('/api/sessions', (_req: Request, res: Response) => {
        const session = sessionManager.createSession();
        res.status(201).json({ session: sessionManager.summarize(session) });
    });

    app.get('/api/sessions', (_req: Request, res: Response) => {
        res.json({ sessions: sessionManager.listSessions() });
    });

    app.delete('/api/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
        if (!sessionManager.deleteSession(req.params.id)) {
            next(new SessionNotFoundError(req.params.id));
            return;
        }
        res.json({ success: true });
    });

    // =========================================================================
    // Corpus Endpoints
    // =========================================================================

    /**
     * POST /api/sessions/:id/documents
     *
     * Ingest `{ items: ContentItem[] }` into the session, replacing its
     * previous corpus once the new index is built.
     */
    app.post('/api/sessions/:id/documents', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);

            const parsed = parseIngestRequest(req.body);
            if (!parsed.valid) {
                throw new ApiError(parsed.error, 400, 'INVALID_ITEMS');
            }

            const summary = await session.engine.ingest(parsed.value);
            res.status(201).json({ summary, sources: session.engine.getSources() });
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/sessions/:id/sources', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            res.json({ sources: session.engine.getSources() });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Chat Endpoints
    // =========================================================================

    /**
     * POST /api/sessions/:id/ask
     *
     * Answer `{ question }` from the session's corpus and recent history.
     */
    app.post('/api/sessions/:id/ask', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            const body: unknown = req.body;
            const question = typeof body === 'object' && body !== null && 'question' in body
                ? body.question
                : undefined;

            const validation = validateQuery(question);
            if (!validation.valid || typeof question !== 'string') {
                throw new ApiError(validation.error ?? 'Query is required', 400, 'INVALID_QUERY');
            }

            res.json(await session.engine.ask(question));
        } catch (error) {
            next(error);
        }
    });

    app.post('/api/sessions/:id/compare', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            res.json({ comparison: await session.engine.compareSources() });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/sessions/:id/summary
     *
     * `{ tone?: 'formal' | 'casual' | 'eli5', length?: string }`
     */
    app.post('/api/sessions/:id/summary', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);

            const parsed = parseSummaryRequest(req.body);
            if (!parsed.valid) {
                throw new ApiError(parsed.error, 400, 'INVALID_SUMMARY_OPTIONS');
            }

            const { tone, length } = parsed.value;
            res.json({ summary: await session.engine.generateSummary(tone, length) });
        } catch (error) {
            next(error);
        }
    });

    app.post('/api/sessions/:id/sentiment', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            res.json({ results: await session.engine.analyzeSentiment() });
        } catch (error) {
            next(error);
        }
    });

    app.post('/api/sessions/:id/facts', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            res.json({ results: await session.engine.extractFacts() });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Memory Endpoints
    // =========================================================================

    app.get('/api/sessions/:id/memory', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            const turns = readTurns(req.query.turns);
            res.json({ turns: session.engine.getHistory(turns) });
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/sessions/:id/memory', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = sessionManager.requireSession(req.params.id);
            session.engine.clearMemory();
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const { status, body } = toErrorResponse(err);
        if (status >= 500) {
            console.error('Request failed:', err);
        }
        res.status(status).json(body);
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @param app - The Express application to start
 * @param port - Port to listen on
 * @returns Promise that resolves when server is listening
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<void> {
    return new Promise((resolve) => {
        app.listen(port, () => {
            console.log(`Research Assistant server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve();
        });
    });
}

/**
 * Factory function to create and optionally start the server.
 *
 * @param config - Server configuration
 * @param autoStart - Whether to start the server immediately
 */
export async function createServer(
    config: Partial<ServerConfig> = {},
    autoStart: boolean = false
): Promise<Express> {
    const app = createApp(config);

    if (autoStart) {
        await startServer(app, config.port ?? DEFAULT_SERVER_CONFIG.port);
    }

    return app;
}
