/**
 * Session Handler
 *
 * Handles connection input processing:
 * - Line buffering across received chunks (\n terminated, trailing \r dropped)
 * - Line length limit
 * - Dispatch by authentication state
 *
 * Delegates to:
 * - auth.ts for login states
 * - executor.ts for command execution
 */

import type { Connection, SessionConfig } from './types.js';
import type { CredentialStore } from '../credentials/index.js';
import { MESSAGES } from '../constants.js';
import { logger } from '../logger.js';
import { handleAuthState } from './auth.js';
import { writeLine } from './write-line.js';
import { executeLine } from './executor.js';

/**
 * Send welcome banner
 */
export function sendWelcome(connection: Connection, config: SessionConfig): void {
    writeLine(connection.stream, config.welcomeBanner);
}

function exceedsLimit(text: string, config: SessionConfig): boolean {
    return Buffer.byteLength(text, 'utf-8') > config.maxLineLength;
}

function rejectLongLine(connection: Connection): void {
    logger.warn('Line too long', { connection: connection.id });
    connection.inputBuffer = '';
    writeLine(connection.stream, MESSAGES.LINE_TOO_LONG);
    connection.stream.end();
}

/**
 * Handle input data from the stream
 *
 * Appends to the connection's buffer and processes every complete line in
 * order. Stops as soon as the connection is closed by one of them.
 */
export function handleInput(
    connection: Connection,
    data: string,
    credentials: CredentialStore,
    config: SessionConfig
): void {
    connection.inputBuffer += data;

    let newline = connection.inputBuffer.indexOf('\n');
    while (newline !== -1 && connection.stream.isOpen) {
        const line = connection.inputBuffer.slice(0, newline).replace(/\r$/, '');
        connection.inputBuffer = connection.inputBuffer.slice(newline + 1);

        if (exceedsLimit(line, config)) {
            rejectLongLine(connection);
            return;
        }

        processLine(connection, line, credentials);
        newline = connection.inputBuffer.indexOf('\n');
    }

    if (!connection.stream.isOpen) {
        connection.inputBuffer = '';
        return;
    }

    // Partial line still waiting for its newline; a trailing \r may be half of \r\n
    if (exceedsLimit(connection.inputBuffer.replace(/\r$/, ''), config)) {
        rejectLongLine(connection);
    }
}

/**
 * Process a complete input line based on connection state
 */
export function processLine(connection: Connection, line: string, credentials: CredentialStore): void {
    if (!line.trim()) {
        return;
    }

    // Non-authenticated states go to auth handler
    if (connection.state.kind !== 'AUTHENTICATED') {
        handleAuthState(connection, line, credentials);
        return;
    }

    const result = executeLine(line);

    if (result.kind === 'quit') {
        logger.info('Client quit', { connection: connection.id, username: connection.state.username });
        connection.stream.end();
        return;
    }

    writeLine(connection.stream, result.text);
    if (result.fatal) {
        logger.info('Closing after fatal reply', { connection: connection.id, reply: result.text });
        connection.stream.end();
    }
}
