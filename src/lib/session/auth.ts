/**
 * Session Authentication
 *
 * Handles the login state machine:
 * - AWAITING_USERNAME: `User: <name>` -> OK
 * - AWAITING_PASSWORD: `Password: <pw>` -> greeting, or failure and back to username
 *
 * Malformed login lines are answered with a format error and close the connection.
 */

import type { Connection } from './types.js';
import type { CredentialStore } from '../credentials/index.js';
import { ERROR_PREFIX, MESSAGES, greeting } from '../constants.js';
import { logger } from '../logger.js';
import { parseLoginField } from './parser.js';
import { writeLine } from './write-line.js';

/**
 * Reject a malformed login line and close the connection
 */
function rejectFormat(connection: Connection, expected: string, reason: string): void {
    logger.warn('Invalid login format', { connection: connection.id, reason });
    writeLine(connection.stream, `${ERROR_PREFIX}invalid login format, expected "${expected}"`);
    connection.stream.end();
}

/**
 * Handle authentication state machine
 *
 * Called for every line received while the connection is not authenticated.
 */
export function handleAuthState(connection: Connection, line: string, credentials: CredentialStore): void {
    switch (connection.state.kind) {
        case 'AWAITING_USERNAME':
            handleUsername(connection, line);
            break;

        case 'AWAITING_PASSWORD':
            handlePassword(connection, connection.state.username, line, credentials);
            break;

        case 'AUTHENTICATED':
            // Authenticated lines are routed to the dispatcher by the session handler
            break;
    }
}

/**
 * Handle username input
 */
function handleUsername(connection: Connection, line: string): void {
    const result = parseLoginField(line, 'User');
    if (!result.ok) {
        rejectFormat(connection, 'User: <name>', result.reason);
        return;
    }

    connection.state = { kind: 'AWAITING_PASSWORD', username: result.value };
    writeLine(connection.stream, MESSAGES.USERNAME_ACCEPTED);
}

/**
 * Handle password input
 */
function handlePassword(connection: Connection, username: string, line: string, credentials: CredentialStore): void {
    const result = parseLoginField(line, 'Password');
    if (!result.ok) {
        rejectFormat(connection, 'Password: <password>', result.reason);
        return;
    }

    if (!credentials.verify(username, result.value)) {
        logger.info('Login failed', { connection: connection.id, username });
        connection.state = { kind: 'AWAITING_USERNAME' };
        writeLine(connection.stream, MESSAGES.LOGIN_FAILED);
        return;
    }

    completeLogin(connection, username);
}

/**
 * Transition to AUTHENTICATED and greet the user
 */
function completeLogin(connection: Connection, username: string): void {
    connection.state = { kind: 'AUTHENTICATED', username };
    logger.info('Login succeeded', { connection: connection.id, username });
    writeLine(connection.stream, greeting(username));
}
