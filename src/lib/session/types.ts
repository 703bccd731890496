/**
 * Session Types
 *
 * Core interfaces for per-connection session handling.
 * Transport-agnostic: the TCP server and the tests both implement LineStream.
 */

/**
 * Stream a session writes replies to.
 *
 * Implemented by the TCP transport (src/servers/tcp.ts) and by in-memory fakes.
 */
export interface LineStream {
    /** Write raw text to the client */
    write(data: string): void;

    /** Close the connection */
    end(): void;

    /** Check if stream is still open */
    readonly isOpen: boolean;
}

/**
 * Authentication flow state. The pending username lives inside the
 * AWAITING_PASSWORD variant, so it exists exactly while that state is held.
 */
export type ConnectionState =
    | { kind: 'AWAITING_USERNAME' }
    | { kind: 'AWAITING_PASSWORD'; username: string }
    | { kind: 'AUTHENTICATED'; username: string };

export type ConnectionStateKind = ConnectionState['kind'];

/**
 * One accepted client connection
 */
export interface Connection {
    /** Unique connection identifier */
    readonly id: string;

    /** Peer address, for logging */
    readonly remoteAddress: string;

    /** Reply stream (owns the socket) */
    readonly stream: LineStream;

    /** Authentication state */
    state: ConnectionState;

    /** Bytes received but not yet terminated by a newline */
    inputBuffer: string;
}

/**
 * Options the session handler needs from the server configuration
 */
export interface SessionConfig {
    /** Maximum bytes buffered for one line */
    maxLineLength: number;

    /** Banner sent on connect */
    welcomeBanner: string;
}

/**
 * Reply produced by a command handler. `fatal` closes the connection after
 * the text is sent.
 */
export interface CommandReply {
    text: string;
    fatal: boolean;
}

/**
 * Outcome of dispatching one authenticated line
 */
export type DispatchResult = { kind: 'quit' } | ({ kind: 'reply' } & CommandReply);

/**
 * Create a new connection in the initial AWAITING_USERNAME state
 */
export function createConnection(id: string, stream: LineStream, remoteAddress = 'unknown'): Connection {
    return {
        id,
        remoteAddress,
        stream,
        state: { kind: 'AWAITING_USERNAME' },
        inputBuffer: '',
    };
}

/**
 * Generate unique connection ID
 */
export function generateConnectionId(): string {
    return Math.random().toString(36).substring(2, 10);
}
