/**
 * Vitest Configuration
 *
 * Unit tests and in-process server tests under spec/. Server tests bind the
 * TCP server to 127.0.0.1 on an ephemeral port; nothing outside the test
 * process is contacted.
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src'),
            '@spec': resolve(__dirname, './spec'),
        },
    },
    test: {
        globals: false,
        environment: 'node',
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        env: {
            LOG_LEVEL: 'silent',
        },
        testTimeout: 5000,
        hookTimeout: 5000,
        reporters: ['default'],
    },
});
