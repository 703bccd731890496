#!/usr/bin/env node
/**
 * Line Command Server - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Credential loading
 * - TCP server startup
 * - Graceful shutdown coordination
 *
 * Usage: line-command-server <users_file> [port]
 */

import { loadEnv } from './lib/env/load-env.js';
import { resolveServerConfig } from './lib/config.js';
import { loadCredentials } from './lib/credentials/index.js';
import { ServerError } from './lib/errors/server-error.js';
import { describeError, logger } from './lib/logger.js';
import { startTcpServer, type TcpServerHandle } from './servers/tcp.js';

async function main(): Promise<void> {
    // Load environment-specific .env file
    loadEnv({ path: process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : '.env' });

    const config = resolveServerConfig(process.argv.slice(2), process.env);
    logger.setLevel(config.logLevel);

    const credentials = await loadCredentials(config.usersFile);

    const server: TcpServerHandle = await startTcpServer(config, credentials);

    const gracefulShutdown = (signal: string) => {
        logger.info('Shutting down server gracefully', { signal });
        server
            .stop()
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                logger.error('Shutdown failed', { error: describeError(err) });
                process.exit(1);
            });
    };

    process.once('SIGINT', () => gracefulShutdown('SIGINT'));
    process.once('SIGTERM', () => gracefulShutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    if (err instanceof ServerError) {
        logger.error(`Fatal: ${err.message}`, { error_code: err.errorCode });
    } else {
        logger.error('Fatal: server failed to start', { error: describeError(err) });
    }
    process.exit(1);
});
