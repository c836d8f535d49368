/**
 * Server route tests
 *
 * The app listens on an ephemeral local port with an in-process fake of
 * the Ollama client, and is exercised over plain HTTP.
 */

import * as http from 'http';
import { Express } from 'express';
import { AssistantErrorCode, MissingPromptVariableError, NotReadyError } from '../../errors';
import { SessionManager, createSessionManager } from '../../services';
import {
    createFakeLanguageModel,
    createKeywordEmbedder,
    makeItem,
    silenceConsole,
} from '../../services/__tests__/testUtils';
import { ApiError, createApp, toErrorResponse } from '../index';

interface TestResponse {
    status: number;
    body: unknown;
}

function createFakeOllamaClient() {
    const { embed } = createKeywordEmbedder(['ai']);
    const { generate } = createFakeLanguageModel('Generated answer');
    return {
        embed,
        generate,
        isAvailable: jest.fn(async (): Promise<boolean> => true),
        generateCompletion: jest.fn(async (prompt: string): Promise<string> => generate(prompt)),
        generateEmbedding: jest.fn(async (text: string): Promise<number[]> => embed(text)),
    };
}

function listen(app: Express): Promise<http.Server> {
    return new Promise((resolve) => {
        const server = app.listen(0, '127.0.0.1', () => resolve(server));
    });
}

function close(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

function send(server: http.Server, method: string, path: string, body?: unknown): Promise<TestResponse> {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        return Promise.reject(new Error('Server is not listening on a TCP port'));
    }

    const payload = body === undefined ? undefined : JSON.stringify(body);

    return new Promise((resolve, reject) => {
        const req = http.request(
            {
                host: '127.0.0.1',
                port: address.port,
                method,
                path,
                agent: false,
                headers: payload
                    ? { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(payload) }
                    : {},
            },
            (res) => {
                let data = '';
                res.setEncoding('utf8');
                res.on('data', (chunk: string) => {
                    data += chunk;
                });
                res.on('end', () => {
                    resolve({ status: res.statusCode ?? 0, body: data ? JSON.parse(data) : null });
                });
            }
        );
        req.on('error', reject);
        if (payload) {
            req.write(payload);
        }
        req.end();
    });
}

describe('toErrorResponse', () => {
    it('should use the status of an ApiError', () => {
        expect(toErrorResponse(new ApiError('Bad input', 400, 'INVALID_QUERY'))).toEqual({
            status: 400,
            body: { error: 'Bad input', code: 'INVALID_QUERY' },
        });
    });

    it('should map assistant errors by code', () => {
        expect(toErrorResponse(new NotReadyError())).toEqual({
            status: 409,
            body: {
                error: 'Chat engine is not ready. Ingest documents before asking questions.',
                code: AssistantErrorCode.NOT_READY,
            },
        });
    });

    it('should hide the message of internal assistant errors', () => {
        expect(toErrorResponse(new MissingPromptVariableError('context'))).toEqual({
            status: 500,
            body: { error: 'Internal server error', code: 'MISSING_PROMPT_VARIABLE' },
        });
    });

    it('should pass through client errors raised by the body parser', () => {
        const parseError = Object.assign(new Error('Unexpected token } in JSON'), { status: 400 });
        expect(toErrorResponse(parseError)).toEqual({
            status: 400,
            body: { error: 'Unexpected token } in JSON', code: 'INVALID_REQUEST' },
        });
    });

    it('should turn anything else into a generic 500', () => {
        expect(toErrorResponse(new Error('disk on fire'))).toEqual({
            status: 500,
            body: { error: 'Internal server error' },
        });
        expect(toErrorResponse('boom').status).toBe(500);
    });
});

describe('Server routes', () => {
    silenceConsole();

    let server: http.Server;
    let manager: SessionManager;
    let ollama: ReturnType<typeof createFakeOllamaClient>;

    beforeEach(async () => {
        ollama = createFakeOllamaClient();
        manager = createSessionManager({ embedder: ollama, llm: ollama });
        server = await listen(createApp({ ollamaClient: ollama, sessionManager: manager }));
    });

    afterEach(async () => {
        await close(server);
    });

    describe('GET /api/health', () => {
        it('should report a reachable Ollama', async () => {
            await expect(send(server, 'GET', '/api/health')).resolves.toEqual({
                status: 200,
                body: { status: 'ok', ollama: true },
            });
        });

        it('should answer 503 when Ollama is down', async () => {
            ollama.isAvailable.mockResolvedValueOnce(false);
            await expect(send(server, 'GET', '/api/health')).resolves.toEqual({
                status: 503,
                body: { status: 'error', ollama: false },
            });
        });
    });

    describe('sessions', () => {
        it('should create a session', async () => {
            const response = await send(server, 'POST', '/api/sessions');

            expect(response.status).toBe(201);
            expect(response.body).toMatchObject({ session: { documentCount: 0, chunkCount: 0, turnCount: 0 } });
            expect(manager.size()).toBe(1);
        });

        it('should list sessions', async () => {
            const session = manager.createSession();

            const response = await send(server, 'GET', '/api/sessions');

            expect(response.body).toEqual({ sessions: [manager.summarize(session)] });
        });

        it('should delete a session', async () => {
            const session = manager.createSession();

            await expect(send(server, 'DELETE', `/api/sessions/${session.id}`)).resolves.toEqual({
                status: 200,
                body: { success: true },
            });
            expect(manager.size()).toBe(0);
        });

        it('should answer 404 for an unknown session', async () => {
            await expect(send(server, 'DELETE', '/api/sessions/missing')).resolves.toEqual({
                status: 404,
                body: { error: 'Session not found: missing', code: 'SESSION_NOT_FOUND' },
            });
            await expect(send(server, 'POST', '/api/sessions/missing/ask', { question: 'Hi' })).resolves.toEqual({
                status: 404,
                body: { error: 'Session not found: missing', code: 'SESSION_NOT_FOUND' },
            });
        });
    });

    describe('POST /api/sessions/:id/documents', () => {
        it('should ingest items and return the sources', async () => {
            const session = manager.createSession();

            await expect(
                send(server, 'POST', `/api/sessions/${session.id}/documents`, { items: [makeItem()] })
            ).resolves.toEqual({
                status: 201,
                body: {
                    summary: { documentCount: 1, chunkCount: 1, skipped: 0 },
                    sources: [{ source: 'example.com', title: 'AI Revolution', url: 'https://example.com' }],
                },
            });
        });

        it('should list the sources of a session', async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);

            await expect(send(server, 'GET', `/api/sessions/${session.id}/sources`)).resolves.toEqual({
                status: 200,
                body: { sources: [{ source: 'example.com', title: 'AI Revolution', url: 'https://example.com' }] },
            });
        });

        it('should reject a malformed body', async () => {
            const session = manager.createSession();

            await expect(send(server, 'POST', `/api/sessions/${session.id}/documents`, {})).resolves.toEqual({
                status: 400,
                body: { error: 'Request body must contain an "items" array', code: 'INVALID_ITEMS' },
            });
        });

        it('should answer 422 when no item is usable', async () => {
            const session = manager.createSession();
            const items = [makeItem({ success: false, content: 'Error fetching page' })];

            await expect(send(server, 'POST', `/api/sessions/${session.id}/documents`, { items })).resolves.toEqual({
                status: 422,
                body: { error: 'No valid documents to process', code: 'NO_VALID_CONTENT' },
            });
        });
    });

    describe('POST /api/sessions/:id/ask', () => {
        it('should answer 409 before ingestion', async () => {
            const session = manager.createSession();

            const response = await send(server, 'POST', `/api/sessions/${session.id}/ask`, { question: 'What is AI?' });

            expect(response.status).toBe(409);
            expect(response.body).toHaveProperty('code', 'NOT_READY');
        });

        it('should reject blank and missing questions', async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);

            await expect(send(server, 'POST', `/api/sessions/${session.id}/ask`, { question: '  ' })).resolves.toEqual({
                status: 400,
                body: { error: 'Query cannot be empty or contain only whitespace', code: 'INVALID_QUERY' },
            });
            await expect(send(server, 'POST', `/api/sessions/${session.id}/ask`, {})).resolves.toEqual({
                status: 400,
                body: { error: 'Query is required', code: 'INVALID_QUERY' },
            });
            expect(ollama.generate).not.toHaveBeenCalled();
        });

        it('should answer with sources and context', async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);

            await expect(
                send(server, 'POST', `/api/sessions/${session.id}/ask`, { question: 'What is AI?' })
            ).resolves.toEqual({
                status: 200,
                body: {
                    answer: 'Generated answer',
                    sources: [{ source: 'example.com', title: 'AI Revolution', url: 'https://example.com' }],
                    contextUsed: '[Source 1: example.com - AI Revolution]\nAI is transforming industries.\n',
                },
            });
        });

        it('should answer 502 when the model fails', async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);
            ollama.generate.mockRejectedValueOnce(new Error('model offline'));

            await expect(
                send(server, 'POST', `/api/sessions/${session.id}/ask`, { question: 'What is AI?' })
            ).resolves.toEqual({
                status: 502,
                body: { error: 'Language model request failed: model offline', code: 'GENERATION_SERVICE' },
            });
            expect(session.engine.getHistory()).toEqual([]);
        });
    });

    describe('analysis routes', () => {
        let sessionId: string;

        beforeEach(async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);
            sessionId = session.id;
        });

        it('should compare sources', async () => {
            await expect(send(server, 'POST', `/api/sessions/${sessionId}/compare`)).resolves.toEqual({
                status: 200,
                body: { comparison: 'Generated answer' },
            });
        });

        it('should summarize with the requested options', async () => {
            await expect(
                send(server, 'POST', `/api/sessions/${sessionId}/summary`, { tone: 'formal', length: 'short' })
            ).resolves.toEqual({ status: 200, body: { summary: 'Generated answer' } });

            expect(ollama.generate.mock.calls[0]?.[0]).toContain('Length: short (100-150 words)');
        });

        it('should reject an unknown tone', async () => {
            await expect(
                send(server, 'POST', `/api/sessions/${sessionId}/summary`, { tone: 'angry' })
            ).resolves.toEqual({
                status: 400,
                body: { error: 'Unknown tone. Supported tones: formal, casual, eli5', code: 'INVALID_SUMMARY_OPTIONS' },
            });
        });

        it('should analyze sentiment per source', async () => {
            await expect(send(server, 'POST', `/api/sessions/${sessionId}/sentiment`)).resolves.toEqual({
                status: 200,
                body: { results: [{ source: 'example.com', analysis: 'Generated answer' }] },
            });
        });

        it('should extract facts per source', async () => {
            await expect(send(server, 'POST', `/api/sessions/${sessionId}/facts`)).resolves.toEqual({
                status: 200,
                body: { results: [{ source: 'example.com', facts: 'Generated answer' }] },
            });
        });
    });

    describe('memory routes', () => {
        it('should return and clear the conversation', async () => {
            const session = manager.createSession();
            await session.engine.ingest([makeItem()]);
            await session.engine.ask('What is AI?');

            await expect(send(server, 'GET', `/api/sessions/${session.id}/memory`)).resolves.toEqual({
                status: 200,
                body: { turns: [{ question: 'What is AI?', answer: 'Generated answer' }] },
            });

            await expect(send(server, 'DELETE', `/api/sessions/${session.id}/memory`)).resolves.toEqual({
                status: 200,
                body: { success: true },
            });
            await expect(send(server, 'GET', `/api/sessions/${session.id}/memory?turns=6`)).resolves.toEqual({
                status: 200,
                body: { turns: [] },
            });
        });

        it('should reject a negative turn count', async () => {
            const session = manager.createSession();

            await expect(send(server, 'GET', `/api/sessions/${session.id}/memory?turns=-1`)).resolves.toEqual({
                status: 400,
                body: { error: 'turns must be a non-negative integer', code: 'INVALID_TURNS' },
            });
        });
    });
});
