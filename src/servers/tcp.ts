/**
 * TCP Server
 *
 * Line-oriented command server on Node's net module. Node's event loop is the
 * readiness multiplexer: the listener reports accepts, each socket reports
 * readable data and end of stream, and all session state is touched from that
 * single thread.
 */

import { createServer, type Socket } from 'node:net';
import type { ServerConfig } from '../lib/config.js';
import type { CredentialStore } from '../lib/credentials/index.js';
import { ERROR_PREFIX } from '../lib/constants.js';
import { describeError, logger } from '../lib/logger.js';
import {
    ConnectionRegistry,
    createConnection,
    generateConnectionId,
    handleInput,
    sendWelcome,
    writeLine,
    type Connection,
    type LineStream,
} from '../lib/session/index.js';

export type TcpServerConfig = Pick<ServerConfig, 'port' | 'host' | 'maxLineLength' | 'idleTimeoutMs' | 'welcomeBanner'>;

/**
 * LineStream implementation for TCP sockets
 *
 * Applies backpressure: once the kernel send buffer is full and replies start
 * queueing in userland, reading from the peer is paused until 'drain'. No new
 * lines are processed, so no new replies are produced, while paused.
 */
export class SocketStream implements LineStream {
    private _isOpen = true;
    private draining = false;

    constructor(private readonly socket: Socket) {}

    write(data: string): void {
        if (!this.isOpen) return;
        if (this.socket.write(data) || this.draining) return;

        this.draining = true;
        this.socket.pause();
        this.socket.once('drain', () => {
            this.draining = false;
            if (this.isOpen) {
                this.socket.resume();
            }
        });
    }

    /** Reply bytes queued in userland, waiting for the peer to read */
    get pendingBytes(): number {
        return this.socket.writableLength;
    }

    /**
     * Flush pending replies, then release the socket
     */
    end(): void {
        if (!this._isOpen) return;
        this._isOpen = false;
        this.socket.end(() => this.socket.destroy());
    }

    /**
     * Drop the socket without flushing
     */
    destroy(): void {
        this._isOpen = false;
        this.socket.destroy();
    }

    get isOpen(): boolean {
        return this._isOpen && !this.socket.destroyed;
    }
}

export interface TcpServerHandle {
    /** Bound port (resolved when 0 was requested) */
    readonly port: number;

    readonly host: string;

    /** Live client connections */
    readonly connections: ConnectionRegistry;

    stop: () => Promise<void>;
}

/**
 * Create and start the TCP server
 *
 * @returns Server handle once the listener is bound
 */
export async function startTcpServer(config: TcpServerConfig, credentials: CredentialStore): Promise<TcpServerHandle> {
    const registry = new ConnectionRegistry();
    const server = createServer();

    const nextId = (): string => {
        let id = generateConnectionId();
        while (registry.has(id)) {
            id = generateConnectionId();
        }
        return id;
    };

    server.on('connection', (socket) => {
        socket.setEncoding('utf-8');
        socket.setNoDelay(true);

        const stream = new SocketStream(socket);
        const connection = createConnection(nextId(), stream, `${socket.remoteAddress}:${socket.remotePort}`);
        registry.register(connection);

        logger.info('Connection accepted', { connection: connection.id, remote: connection.remoteAddress });

        const release = (reason: string) => {
            if (registry.unregister(connection.id)) {
                logger.info('Connection closed', { connection: connection.id, state: connection.state.kind, reason });
            }
        };

        if (config.idleTimeoutMs > 0) {
            socket.setTimeout(config.idleTimeoutMs, () => {
                logger.info('Idle timeout', { connection: connection.id });
                stream.end();
            });
        }

        sendWelcome(connection, config);

        socket.on('data', (chunk: string) => {
            try {
                handleInput(connection, chunk, credentials, config);
            } catch (err) {
                logger.error('Error handling input', { connection: connection.id, error: describeError(err) });
                writeLine(stream, `${ERROR_PREFIX}internal error`);
                stream.end();
            }
        });

        // Zero-length read: peer closed, tear down regardless of state
        socket.on('end', () => {
            release('peer closed');
            stream.destroy();
        });

        socket.on('error', (err) => {
            logger.warn('Socket error', { connection: connection.id, error: err.message });
            release('socket error');
            stream.destroy();
        });

        socket.on('close', () => {
            release('closed');
        });
    });

    await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host, () => {
            server.off('error', reject);
            resolve();
        });
    });

    server.on('error', (err) => {
        logger.error('Listener error', { error: err.message });
    });

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : config.port;

    logger.info(`TCP server listening on ${config.host}:${port}`);

    let stopped = false;

    return {
        port,
        host: config.host,
        connections: registry,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                if (stopped) {
                    resolve();
                    return;
                }
                stopped = true;

                const open: Connection[] = [...registry.values()];
                for (const connection of open) {
                    if (connection.stream instanceof SocketStream) {
                        connection.stream.destroy();
                    }
                    registry.unregister(connection.id);
                }

                server.close((err) => {
                    if (err) {
                        reject(err);
                        return;
                    }
                    logger.info('TCP server stopped');
                    resolve();
                });
            }),
    };
}
