/**
 * Server Configuration
 *
 * Resolves the runtime configuration from process arguments and environment.
 * Positional arguments (`<users_file> [port]`) win over USERS_FILE and PORT.
 */

import {
    DEFAULT_HOST,
    DEFAULT_IDLE_TIMEOUT_MS,
    DEFAULT_MAX_LINE_LENGTH,
    DEFAULT_PORT,
    MESSAGES,
} from './constants.js';
import { ServerErrors } from './errors/server-error.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface ServerConfig {
    /** TCP port (0 picks an ephemeral port) */
    readonly port: number;

    /** Bind address */
    readonly host: string;

    /** Path to the tab-separated users file */
    readonly usersFile: string;

    /** Maximum bytes buffered for one line */
    readonly maxLineLength: number;

    /** Close connections idle for this long; 0 disables */
    readonly idleTimeoutMs: number;

    /** Banner sent on connect */
    readonly welcomeBanner: string;

    readonly logLevel: LogLevel;
}

const INTEGER_PATTERN = /^\d+$/;

function parsePort(value: string): number {
    const port = Number(value);
    if (!INTEGER_PATTERN.test(value) || port > 65535) {
        throw ServerErrors.invalidPort(value);
    }
    return port;
}

function parseNonNegative(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined || value === '') {
        return fallback;
    }
    if (!INTEGER_PATTERN.test(value)) {
        throw ServerErrors.invalidNumber(name, value);
    }
    return Number(value);
}

/**
 * Build a validated configuration
 *
 * @param argv - positional arguments after the script name
 * @param env - environment (usually process.env after loadEnv)
 */
export function resolveServerConfig(argv: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
    const [fileArg, portArg] = argv;

    const usersFile = fileArg || env.USERS_FILE;
    if (!usersFile) {
        throw ServerErrors.usersFileMissing();
    }

    const portValue = portArg ?? env.PORT;
    const port = portValue ? parsePort(portValue) : DEFAULT_PORT;

    const maxLineLength = parseNonNegative('MAX_LINE_LENGTH', env.MAX_LINE_LENGTH, DEFAULT_MAX_LINE_LENGTH);
    if (maxLineLength === 0) {
        throw ServerErrors.invalidNumber('MAX_LINE_LENGTH', '0', 'a positive integer');
    }

    const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw ServerErrors.invalidLogLevel(logLevel);
    }

    return Object.freeze({
        port,
        host: env.HOST || DEFAULT_HOST,
        usersFile,
        maxLineLength,
        idleTimeoutMs: parseNonNegative('IDLE_TIMEOUT_MS', env.IDLE_TIMEOUT_MS, DEFAULT_IDLE_TIMEOUT_MS),
        welcomeBanner: env.WELCOME_BANNER || MESSAGES.WELCOME,
        logLevel,
    });
}
