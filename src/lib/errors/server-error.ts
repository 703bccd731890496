/**
 * ServerError - Structured errors for startup and configuration failures
 *
 * Connection-level problems never surface as exceptions; they are replies with
 * an explicit fatal flag. ServerError covers the failures that stop the process
 * from starting: bad configuration and unreadable credential sources.
 */
export class ServerError extends Error {
    public readonly name = 'ServerError';

    constructor(
        message: string,
        public readonly errorCode: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, ServerError.prototype);
    }
}

/**
 * Factory methods for common startup failures
 */
export class ServerErrors {
    static usersFileMissing() {
        return new ServerError('No users file given (argument or USERS_FILE)', 'CONFIG_USERS_FILE_MISSING');
    }

    static invalidPort(value: string) {
        return new ServerError(`Invalid port: ${value}`, 'CONFIG_INVALID_PORT', { value });
    }

    static invalidNumber(name: string, value: string, expected = 'a non-negative integer') {
        return new ServerError(`${name} must be ${expected}, got: ${value}`, 'CONFIG_INVALID_NUMBER', {
            name,
            value,
        });
    }

    static invalidLogLevel(value: string) {
        return new ServerError(`Unknown LOG_LEVEL: ${value}`, 'CONFIG_INVALID_LOG_LEVEL', { value });
    }

    static credentialsNotFound(path: string) {
        return new ServerError(`Users file '${path}' not found`, 'CREDENTIALS_NOT_FOUND', { path });
    }

    static credentialsUnreadable(path: string, reason: string) {
        return new ServerError(`Users file '${path}' could not be read: ${reason}`, 'CREDENTIALS_UNREADABLE', {
            path,
        });
    }
}
