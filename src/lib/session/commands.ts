/**
 * Session Commands
 *
 * Pure text commands available after login. Each handler receives the raw
 * payload (everything after the first colon) and returns a reply with an
 * explicit fatal flag.
 */

import { ERROR_PREFIX } from '../constants.js';
import type { CommandReply } from './types.js';
import { isIntegerToken, splitLast } from './parser.js';

/**
 * Command handler signature
 */
export type CommandHandler = (payload: string) => CommandReply;

/**
 * Command registry
 */
export const commands: Record<string, CommandHandler> = {};

function ok(text: string): CommandReply {
    return { text, fatal: false };
}

/**
 * Recoverable error: reported, connection stays open
 */
export function errorReply(message: string): CommandReply {
    return { text: ERROR_PREFIX + message, fatal: false };
}

/**
 * Fatal error: reported, then the connection is closed
 */
export function fatalReply(message: string): CommandReply {
    return { text: ERROR_PREFIX + message, fatal: true };
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Running-balance check: the open count may never dip below zero and must end at zero.
 */
export function isBalanced(parens: string): boolean {
    let open = 0;
    for (const char of parens) {
        open += char === '(' ? 1 : -1;
        if (open < 0) return false;
    }
    return open === 0;
}

function abs(n: bigint): bigint {
    return n < 0n ? -n : n;
}

export function gcd(a: bigint, b: bigint): bigint {
    let x = abs(a);
    let y = abs(b);
    while (y !== 0n) {
        [x, y] = [y, x % y];
    }
    return x;
}

/**
 * Least common multiple, always non-negative; lcm(a, 0) = 0
 */
export function lcm(a: bigint, b: bigint): bigint {
    if (a === 0n || b === 0n) return 0n;
    return abs(a * b) / gcd(a, b);
}

/**
 * Shift ASCII letters within their own case; everything else passes through.
 * Any shift magnitude is accepted and reduced modulo 26.
 */
export function caesarShift(text: string, shift: bigint): string {
    const offset = Number(((shift % 26n) + 26n) % 26n);
    let result = '';

    for (const char of text) {
        const code = char.charCodeAt(0);
        if (code >= 65 && code <= 90) {
            result += String.fromCharCode(((code - 65 + offset) % 26) + 65);
        } else if (code >= 97 && code <= 122) {
            result += String.fromCharCode(((code - 97 + offset) % 26) + 97);
        } else {
            result += char;
        }
    }

    return result;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * parentheses: S - report whether S is balanced
 */
commands['parentheses'] = (payload) => {
    const input = payload.trim();
    if (!input) {
        return errorReply('parentheses requires a parameter');
    }
    if (!/^[()]+$/.test(input)) {
        return errorReply("the string isn't only parentheses");
    }
    return ok(`the parentheses are balanced: ${isBalanced(input) ? 'yes' : 'no'}`);
};

/**
 * lcm: A B - least common multiple of two integers
 */
commands['lcm'] = (payload) => {
    const params = payload.trim().split(/\s+/).filter(Boolean);
    if (params.length !== 2) {
        return errorReply('lcm requires exactly 2 parameters');
    }
    if (!params.every(isIntegerToken)) {
        return errorReply('lcm parameters must be integers');
    }

    const [a, b] = params.map((p) => BigInt(p));
    return ok(`the lcm is: ${lcm(a, b)}`);
};

/**
 * caesar: TEXT SHIFT - case-preserving Caesar cipher
 *
 * TEXT may contain spaces; SHIFT is the last whitespace-separated token.
 * Characters other than letters and spaces in TEXT are fatal.
 */
commands['caesar'] = (payload) => {
    const parts = splitLast(payload);
    if (!parts) {
        return errorReply('caesar requires plaintext and shift');
    }

    const [plaintext, shift] = parts;
    if (!isIntegerToken(shift)) {
        return errorReply('shift must be an integer');
    }
    if (!/^[A-Za-z ]+$/.test(plaintext)) {
        return fatalReply('invalid input');
    }

    return ok(`The ciphertext is: ${caesarShift(plaintext, BigInt(shift))}`);
};
