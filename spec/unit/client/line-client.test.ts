import { describe, test, expect } from 'vitest';
import { createServer, type Socket } from 'node:net';
import { LineClient, login } from '@src/lib/client/line-client.js';

/**
 * Start a scripted in-process peer; `onLine` receives each client line
 */
async function startPeer(onLine: (line: string, socket: Socket) => void) {
    const server = createServer((socket) => {
        socket.setEncoding('utf-8');
        let buffer = '';
        socket.on('data', (chunk: string) => {
            buffer += chunk;
            let newline = buffer.indexOf('\n');
            while (newline !== -1) {
                onLine(buffer.slice(0, newline), socket);
                buffer = buffer.slice(newline + 1);
                newline = buffer.indexOf('\n');
            }
        });
        socket.on('error', () => socket.destroy());
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : 0;

    return {
        port,
        close: () => new Promise<void>((resolve) => server.close(() => resolve())),
    };
}

describe('LineClient', () => {
    test('should reassemble lines split across packets', async () => {
        const peer = await startPeer((line, socket) => {
            socket.write(`echo: ${line.slice(0, 3)}`);
            setTimeout(() => socket.write(`${line.slice(3)}\r\nsecond\n`), 10);
        });
        const client = await LineClient.connect('127.0.0.1', peer.port);

        try {
            client.send('abcdef');
            expect(await client.readLine()).toBe('echo: abcdef');
            expect(await client.readLine()).toBe('second');
        } finally {
            client.close();
            await client.waitForClose();
            await peer.close();
        }
    });

    test('should return null once the peer closes', async () => {
        const peer = await startPeer((_line, socket) => socket.end('bye\n'));
        const client = await LineClient.connect('127.0.0.1', peer.port);

        try {
            client.send('hello');
            expect(await client.readLine()).toBe('bye');
            expect(await client.readLine()).toBeNull();
            expect(client.isClosed).toBe(true);
        } finally {
            await peer.close();
        }
    });

    test('should reject when nothing listens', async () => {
        const peer = await startPeer(() => undefined);
        const port = peer.port;
        await peer.close();

        await expect(LineClient.connect('127.0.0.1', port)).rejects.toThrow();
    });
});

describe('login', () => {
    test('should stop after a rejected username line', async () => {
        const peer = await startPeer((_line, socket) => socket.end('ERROR: invalid login format\n'));
        const client = await LineClient.connect('127.0.0.1', peer.port);

        try {
            expect(await login(client, 'alice', 'test-secret')).toEqual({
                success: false,
                reply: 'ERROR: invalid login format',
            });
        } finally {
            await peer.close();
        }
    });

    test('should send both login lines', async () => {
        const received: string[] = [];
        const peer = await startPeer((line, socket) => {
            received.push(line);
            socket.write(received.length === 1 ? 'OK\n' : 'Hi alice, good to see you\n');
        });
        const client = await LineClient.connect('127.0.0.1', peer.port);

        try {
            expect(await login(client, 'alice', 'test-secret')).toEqual({
                success: true,
                greeting: 'Hi alice, good to see you',
            });
            expect(received).toEqual(['User: alice', 'Password: test-secret']);
        } finally {
            client.close();
            await client.waitForClose();
            await peer.close();
        }
    });
});
