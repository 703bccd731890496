/**
 * Line Parser
 *
 * Parses login fields (`User: <name>`, `Password: <pw>`) and command lines
 * (`<command>: <payload>` or `quit`). Failures are returned as values.
 */

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type LoginField = 'User' | 'Password';

/**
 * Parse a `<Label>: <value>` login line
 *
 * The label is compared case-insensitively; the value is everything after the
 * first colon, trimmed, and must not be empty.
 */
export function parseLoginField(line: string, field: LoginField): ParseResult<string> {
    const colon = line.indexOf(':');
    if (colon === -1) {
        return { ok: false, reason: `missing ':' after ${field}` };
    }

    const label = line.slice(0, colon).trim();
    if (label.toLowerCase() !== field.toLowerCase()) {
        return { ok: false, reason: `expected ${field} field, got '${label}'` };
    }

    const value = line.slice(colon + 1).trim();
    if (!value) {
        return { ok: false, reason: `empty ${field} value` };
    }

    return { ok: true, value };
}

/**
 * Parsed authenticated command line
 */
export type ParsedLine =
    | { kind: 'quit' }
    | { kind: 'command'; name: string; payload: string }
    | { kind: 'malformed' };

/**
 * Split a command line into name and payload at the first colon
 */
export function parseCommandLine(line: string): ParsedLine {
    const trimmed = line.trim();
    if (trimmed === 'quit') {
        return { kind: 'quit' };
    }

    const colon = trimmed.indexOf(':');
    if (colon === -1) {
        return { kind: 'malformed' };
    }

    const name = trimmed.slice(0, colon).trim();
    if (name === 'quit') {
        return { kind: 'quit' };
    }

    return { kind: 'command', name, payload: trimmed.slice(colon + 1) };
}

/**
 * Split text on its last whitespace run
 *
 * Returns null when the text holds no whitespace.
 */
export function splitLast(text: string): [string, string] | null {
    const match = /^(.*\S)\s+(\S+)$/s.exec(text.trim());
    if (!match) {
        return null;
    }
    return [match[1], match[2]];
}

/**
 * Integer token check (optional sign, decimal digits)
 */
export function isIntegerToken(token: string): boolean {
    return /^[+-]?\d+$/.test(token);
}
