import type { LineStream } from './types.js';

/**
 * Write one newline-terminated line to the stream
 */
export function writeLine(stream: LineStream, text: string): void {
    if (!stream.isOpen) return;
    stream.write(text + '\n');
}
