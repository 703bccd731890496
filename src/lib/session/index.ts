/**
 * Session Module
 *
 * Login state machine, line framing and command dispatch.
 * The TCP transport lives in src/servers/tcp.ts.
 */

// Types
export type {
    LineStream,
    Connection,
    ConnectionState,
    ConnectionStateKind,
    SessionConfig,
    CommandReply,
    DispatchResult,
} from './types.js';

export { createConnection, generateConnectionId } from './types.js';

// Parser
export { parseLoginField, parseCommandLine, splitLast, isIntegerToken } from './parser.js';
export type { ParseResult, ParsedLine, LoginField } from './parser.js';

// Commands
export { commands, isBalanced, gcd, lcm, caesarShift } from './commands.js';
export type { CommandHandler } from './commands.js';

// Dispatcher
export { executeLine } from './executor.js';

// Auth
export { handleAuthState } from './auth.js';

// Session Handler
export { handleInput, processLine, sendWelcome } from './session-handler.js';
export { writeLine } from './write-line.js';

// Registry
export { ConnectionRegistry } from './registry.js';
