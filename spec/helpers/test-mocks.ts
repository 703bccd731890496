import { CredentialStore } from '@src/lib/credentials/index.js';
import { createConnection, type Connection, type LineStream, type SessionConfig } from '@src/lib/session/index.js';

/**
 * In-memory LineStream that records everything written to it
 */
export class MockStream implements LineStream {
    writes: string[] = [];
    endCount = 0;
    private open = true;

    write(data: string): void {
        if (!this.open) {
            throw new Error('write after end');
        }
        this.writes.push(data);
    }

    end(): void {
        this.endCount++;
        this.open = false;
    }

    get isOpen(): boolean {
        return this.open;
    }

    /**
     * Written text split into lines (without the trailing newline)
     */
    lines(): string[] {
        const text = this.writes.join('');
        if (!text) return [];
        return text.replace(/\n$/, '').split('\n');
    }

    clear(): void {
        this.writes = [];
    }
}

/**
 * Credential store with two test users
 */
export function createMockCredentials(): CredentialStore {
    return new CredentialStore([
        ['alice', 'test-secret'],
        ['bob', 'other-secret'],
    ]);
}

export const mockSessionConfig: SessionConfig = {
    maxLineLength: 64,
    welcomeBanner: 'Welcome! Please log in.',
};

/**
 * Create a connection backed by a MockStream
 */
export function createMockConnection(id = 'conn-1'): { connection: Connection; stream: MockStream } {
    const stream = new MockStream();
    return { connection: createConnection(id, stream, '127.0.0.1:50000'), stream };
}
