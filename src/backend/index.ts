/**
 * Backend module entry point
 *
 * This module contains the Express server and supporting services for the Research Assistant.
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: Business logic (chunking, retrieval, chat engine, sessions)
 * - clients/: External service clients (OllamaClient)
 *
 * When run directly, this file loads `.env` and starts the server.
 * When imported, it exports the server factory functions.
 */

import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createServer } from './server';

// Re-export server components
export {
    createApp,
    createServer,
    startServer,
    toErrorResponse,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig } from './server';

export { loadConfig, DEFAULT_APP_CONFIG } from './config';

export type { AppConfig, Environment } from './config';

export * from './errors';

// Re-export services
export * from './services';

// Re-export clients
export * from './clients';

if (require.main === module) {
    dotenv.config();

    Promise.resolve()
        .then(() => createServer(loadConfig(), true))
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: unknown) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}
