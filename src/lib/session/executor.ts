/**
 * Command Dispatcher
 *
 * Maps one authenticated line to a command handler. Stateless.
 */

import type { DispatchResult } from './types.js';
import { commands, errorReply, fatalReply } from './commands.js';
import { parseCommandLine } from './parser.js';

export function executeLine(line: string): DispatchResult {
    const parsed = parseCommandLine(line);

    switch (parsed.kind) {
        case 'quit':
            return { kind: 'quit' };

        case 'malformed':
            return { kind: 'reply', ...fatalReply('invalid command format, expected "<command>: <arguments>"') };

        case 'command': {
            const handler = Object.prototype.hasOwnProperty.call(commands, parsed.name)
                ? commands[parsed.name]
                : undefined;

            if (!handler) {
                return { kind: 'reply', ...errorReply(`unknown command '${parsed.name}'`) };
            }
            return { kind: 'reply', ...handler(parsed.payload) };
        }
    }
}
