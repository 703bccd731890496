/**
 * Environment Variable Loader
 *
 * Loads KEY=VALUE pairs from a .env file into process.env without the dotenv package.
 * Comments (#), blank lines, quoted values and inline comments after unquoted values
 * are understood. Existing variables win unless `override` is set.
 */

import { readFileSync, existsSync } from 'node:fs';
import { logger } from '../logger.js';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    target?: NodeJS.ProcessEnv;
}

/**
 * Parse one .env line into a [key, value] pair, or null for lines to skip
 */
function parseLine(line: string): [string, string] | null {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex <= 0) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    const quoted =
        value.length >= 2 &&
        ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")));

    if (quoted) {
        value = value.slice(1, -1);
    } else {
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return key ? [key, value] : null;
}

/**
 * Parse .env file content into ordered key/value entries
 */
export function parseEnv(content: string): Map<string, string> {
    const entries = new Map<string, string>();
    for (const line of content.split(/\r?\n/)) {
        const parsed = parseLine(line);
        if (parsed) {
            entries.set(parsed[0], parsed[1]);
        }
    }
    return entries;
}

/**
 * Load environment variables from a .env file
 *
 * @returns number of variables written to the target
 */
export function loadEnv(options: LoadEnvOptions = {}): number {
    const { path = '.env', override = false, target = process.env } = options;

    if (!existsSync(path)) {
        logger.debug('env file not found', { path });
        return 0;
    }

    let loaded = 0;
    for (const [key, value] of parseEnv(readFileSync(path, 'utf-8'))) {
        if (target[key] !== undefined && !override) {
            continue;
        }
        target[key] = value;
        loaded++;
    }

    logger.debug('env file loaded', { path, loaded });
    return loaded;
}
