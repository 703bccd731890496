/**
 * Line Client
 *
 * Minimal TCP client for the line protocol: connect, send lines, await reply
 * lines. Used by the interactive CLI (src/client.ts) and by the server tests.
 */

import { connect, type Socket } from 'node:net';
import { logger } from '../logger.js';
import { ERROR_PREFIX, MESSAGES, PASSWORD_PREFIX, USERNAME_PREFIX } from '../constants.js';

type LineWaiter = (line: string | null) => void;

export class LineClient {
    private buffer = '';
    private readonly pending: string[] = [];
    private readonly waiters: LineWaiter[] = [];
    private closed = false;

    private constructor(private readonly socket: Socket) {
        socket.setEncoding('utf-8');

        socket.on('data', (chunk: string) => {
            this.buffer += chunk;
            let newline = this.buffer.indexOf('\n');
            while (newline !== -1) {
                this.deliver(this.buffer.slice(0, newline).replace(/\r$/, ''));
                this.buffer = this.buffer.slice(newline + 1);
                newline = this.buffer.indexOf('\n');
            }
        });

        // 'close' follows and settles pending reads with null
        socket.on('error', (err) => {
            logger.debug('Client socket error', { error: err.message });
        });

        socket.on('close', () => {
            this.closed = true;
            for (const waiter of this.waiters.splice(0)) {
                waiter(null);
            }
        });
    }

    /**
     * Open a connection
     *
     * @param timeoutMs - connect timeout
     */
    static connect(host: string, port: number, timeoutMs = 10_000): Promise<LineClient> {
        return new Promise((resolve, reject) => {
            const socket = connect({ host, port });
            let settled = false;

            const fail = (err: Error) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                reject(err);
            };

            socket.setTimeout(timeoutMs, () => fail(new Error(`connection to ${host}:${port} timed out`)));
            socket.once('error', fail);

            socket.once('connect', () => {
                if (settled) return;
                settled = true;
                socket.setTimeout(0);
                socket.off('error', fail);
                resolve(new LineClient(socket));
            });
        });
    }

    private deliver(line: string): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(line);
        } else {
            this.pending.push(line);
        }
    }

    /**
     * Next line from the server, or null once the connection has closed
     */
    readLine(): Promise<string | null> {
        const line = this.pending.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise((resolve) => this.waiters.push(resolve));
    }

    send(line: string): void {
        if (this.closed) return;
        this.socket.write(line + '\n');
    }

    close(): void {
        this.socket.end();
    }

    /**
     * Resolves once the server has closed the connection
     */
    waitForClose(): Promise<void> {
        if (this.closed) {
            return Promise.resolve();
        }
        return new Promise((resolve) => this.socket.once('close', () => resolve()));
    }

    get isClosed(): boolean {
        return this.closed;
    }
}

/**
 * Result of one login attempt
 */
export type LoginOutcome =
    | { success: true; greeting: string }
    | { success: false; reply: string | null };

/**
 * Run the two-step login exchange (username, then password)
 */
export async function login(client: LineClient, username: string, password: string): Promise<LoginOutcome> {
    client.send(USERNAME_PREFIX + username);
    const ack = await client.readLine();
    if (ack !== MESSAGES.USERNAME_ACCEPTED) {
        return { success: false, reply: ack };
    }

    client.send(PASSWORD_PREFIX + password);
    const reply = await client.readLine();
    if (reply === null || reply === MESSAGES.LOGIN_FAILED || reply.startsWith(ERROR_PREFIX)) {
        return { success: false, reply };
    }

    return { success: true, greeting: reply };
}
