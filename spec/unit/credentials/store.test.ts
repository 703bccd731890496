import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CredentialStore, loadCredentials, parseCredentials } from '@src/lib/credentials/index.js';
import { ServerError } from '@src/lib/errors/server-error.js';

describe('parseCredentials', () => {
    test('should read tab-separated username/password lines', () => {
        const store = parseCredentials('alice\ttest-secret\nbob\tother-secret\n');

        expect(store.size).toBe(2);
        expect(store.lookup('alice')).toBe('test-secret');
        expect(store.lookup('bob')).toBe('other-secret');
    });

    test('should skip lines without exactly two fields', () => {
        const store = parseCredentials(['alice\ttest-secret', 'nofields', 'a\tb\tc', '', 'carol pw'].join('\n'));

        expect(store.size).toBe(1);
        expect(store.lookup('carol')).toBeUndefined();
    });

    test('should skip lines with an empty field', () => {
        const store = parseCredentials('\tpw\nuser\t\n');
        expect(store.size).toBe(0);
    });

    test('should trim lines and accept CRLF endings', () => {
        const store = parseCredentials('  alice\ttest-secret  \r\nbob\tother-secret\r\n');

        expect(store.lookup('alice')).toBe('test-secret');
        expect(store.lookup('bob')).toBe('other-secret');
    });

    test('should let a later line override an earlier one', () => {
        const store = parseCredentials('alice\tfirst\nalice\tsecond\n');
        expect(store.lookup('alice')).toBe('second');
    });
});

describe('CredentialStore.verify', () => {
    const store = new CredentialStore([['alice', 'test-secret']]);

    test('should accept the exact password', () => {
        expect(store.verify('alice', 'test-secret')).toBe(true);
    });

    test('should reject a different password or unknown user', () => {
        expect(store.verify('alice', 'Test-secret')).toBe(false);
        expect(store.verify('bob', 'test-secret')).toBe(false);
    });
});

describe('loadCredentials', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'credentials-'));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('should load a users file', async () => {
        const path = join(dir, 'users.txt');
        await writeFile(path, 'alice\ttest-secret\n');

        const store = await loadCredentials(path);
        expect(store.verify('alice', 'test-secret')).toBe(true);
    });

    test('should raise CREDENTIALS_NOT_FOUND for a missing file', async () => {
        const path = join(dir, 'missing.txt');

        await expect(loadCredentials(path)).rejects.toBeInstanceOf(ServerError);
        await expect(loadCredentials(path)).rejects.toMatchObject({ errorCode: 'CREDENTIALS_NOT_FOUND' });
    });

    test('should raise CREDENTIALS_UNREADABLE when the path is a directory', async () => {
        await expect(loadCredentials(dir)).rejects.toMatchObject({ errorCode: 'CREDENTIALS_UNREADABLE' });
    });
});
