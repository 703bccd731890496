/**
 * Credential Store
 *
 * Read-only username -> password table built once at startup from a
 * tab-separated users file (`username<TAB>password` per line).
 */

import { readFile } from 'node:fs/promises';
import { ServerErrors } from '../errors/server-error.js';
import { logger } from '../logger.js';

export class CredentialStore {
    private readonly users: ReadonlyMap<string, string>;

    constructor(entries: Iterable<readonly [string, string]>) {
        this.users = new Map(entries);
    }

    /**
     * Password for a username, or undefined when the user is unknown
     */
    lookup(username: string): string | undefined {
        return this.users.get(username);
    }

    /**
     * Plain equality check against the stored password
     */
    verify(username: string, password: string): boolean {
        const stored = this.users.get(username);
        return stored !== undefined && stored === password;
    }

    get size(): number {
        return this.users.size;
    }
}

/**
 * Parse users file content
 *
 * Lines are trimmed; anything that is not exactly two non-empty tab-separated
 * fields is skipped. A later line for the same username replaces an earlier one.
 */
export function parseCredentials(content: string): CredentialStore {
    const entries: [string, string][] = [];

    for (const raw of content.split(/\r?\n/)) {
        const fields = raw.trim().split('\t');
        if (fields.length !== 2) continue;

        const [username, password] = fields;
        if (!username || !password) continue;

        entries.push([username, password]);
    }

    return new CredentialStore(entries);
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load the users file from disk
 */
export async function loadCredentials(path: string): Promise<CredentialStore> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (err) {
        if (isMissingFile(err)) {
            throw ServerErrors.credentialsNotFound(path);
        }
        throw ServerErrors.credentialsUnreadable(path, err instanceof Error ? err.message : String(err));
    }

    const store = parseCredentials(content);
    logger.info(`Loaded ${store.size} users`, { path });
    return store;
}
