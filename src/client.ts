#!/usr/bin/env node
/**
 * Interactive Client
 *
 * Usage: line-command-client [host] [port]
 *
 * Prints the welcome banner, asks for username and password until the login
 * succeeds, then forwards each typed command and prints the reply. Exits on
 * `quit` or when the server closes the connection.
 */

import { createInterface } from 'node:readline/promises';
import { DEFAULT_PORT, MESSAGES } from './lib/constants.js';
import { LineClient, login } from './lib/client/line-client.js';
import { describeError } from './lib/logger.js';

function print(text: string): void {
    process.stdout.write(text + '\n');
}

async function main(): Promise<number> {
    const [host = 'localhost', portArg] = process.argv.slice(2);
    const port = portArg ? Number(portArg) : DEFAULT_PORT;

    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        process.stderr.write(`invalid port: ${portArg}\n`);
        return 1;
    }

    let client: LineClient;
    try {
        client = await LineClient.connect(host, port);
    } catch (err) {
        process.stderr.write(`could not connect to ${host}:${port}: ${describeError(err)}\n`);
        return 1;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    try {
        const banner = await client.readLine();
        if (banner === null) {
            print('Connection closed by server');
            return 1;
        }
        print(banner);

        // Login loop: unlimited retries
        for (;;) {
            const username = await rl.question('Username: ');
            const password = await rl.question('Password: ');
            const outcome = await login(client, username, password);

            if (outcome.success) {
                print(outcome.greeting);
                break;
            }
            if (outcome.reply === null) {
                print('Connection closed by server');
                return 1;
            }
            print(outcome.reply);
            if (outcome.reply !== MESSAGES.LOGIN_FAILED) {
                return 1;
            }
        }

        // Command loop
        for (;;) {
            const line = await rl.question('> ');
            if (!line.trim()) continue;

            client.send(line);
            if (line.trim() === 'quit') {
                await client.waitForClose();
                return 0;
            }

            const reply = await client.readLine();
            if (reply === null) {
                print('Connection closed by server');
                return 1;
            }
            print(reply);
        }
    } finally {
        rl.close();
        client.close();
    }
}

main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
        process.stderr.write(`client error: ${describeError(err)}\n`);
        process.exit(1);
    });
