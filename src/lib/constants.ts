/**
 * Application-wide constants
 *
 * Defaults and fixed protocol strings shared by the server, the client and the tests.
 */

/**
 * Default listening port
 */
export const DEFAULT_PORT = 1337;

/**
 * Default bind address
 */
export const DEFAULT_HOST = '0.0.0.0';

/**
 * Maximum bytes buffered for a single line before the connection is dropped.
 */
export const DEFAULT_MAX_LINE_LENGTH = 1024;

/**
 * Idle timeout in milliseconds. 0 keeps idle connections open indefinitely.
 */
export const DEFAULT_IDLE_TIMEOUT_MS = 0;

/**
 * Fixed server messages
 */
export const MESSAGES = {
    WELCOME: 'Welcome! Please log in.',
    USERNAME_ACCEPTED: 'OK',
    LOGIN_FAILED: 'Failed to login.',
    LINE_TOO_LONG: 'ERROR: line too long',
} as const;

/**
 * Login line prefixes sent by clients
 */
export const USERNAME_PREFIX = 'User: ';
export const PASSWORD_PREFIX = 'Password: ';

/**
 * Prefix carried by every error reply
 */
export const ERROR_PREFIX = 'ERROR: ';

/**
 * Greeting sent after a successful login
 */
export function greeting(username: string): string {
    return `Hi ${username}, good to see you`;
}
