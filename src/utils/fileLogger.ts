/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: every line Crawlee's `log` (or anything else) writes to
 * stdout/stderr is also appended to a log file.
 *
 * BEHAVIOUR
 * ─────────
 *  • initFileLogger() truncates the file, so each run leaves exactly its own
 *    output behind (a scheduled job usually uploads it as an artifact).
 *  • closeFileLogger() ends the stream and restores the original writers.
 *  • If the file stream fails mid-run (disk full, permissions), mirroring
 *    stops and the console keeps working.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Writable } from 'stream';

type Restore = () => void;
export type OpenLogStream = (filePath: string) => Writable;

const openAppendStream: OpenLogStream = (filePath) =>
    fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });

let writeStream: Writable | null = null;
let restorers: Restore[] = [];

function mirror(stream: NodeJS.WriteStream): Restore {
    const original = stream.write;
    const mirrored = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
        writeStream?.write(chunk);
        return Reflect.apply(original, stream, [chunk, ...rest]);
    };
    stream.write = mirrored;
    return () => {
        stream.write = original;
    };
}

/**
 * Starts mirroring stdout/stderr into `logFile`. An empty path disables it.
 * @returns the resolved file path, or null when disabled.
 */
export function initFileLogger(logFile: string, open: OpenLogStream = openAppendStream): string | null {
    if (!logFile) return null;
    if (writeStream) closeFileLogger();

    const resolved = path.resolve(logFile);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, '', 'utf-8');
    const stream = open(resolved);
    stream.on('error', (err: Error) => {
        if (writeStream !== stream) return;
        restoreWriters();
        writeStream = null;
        process.stderr.write(`[FileLogger] Stopped writing ${resolved}: ${err.message}\n`);
    });
    writeStream = stream;

    restorers = [mirror(process.stdout), mirror(process.stderr)];
    return resolved;
}

function restoreWriters(): void {
    for (const restore of restorers) restore();
    restorers = [];
}

export function closeFileLogger(): void {
    restoreWriters();

    if (writeStream) {
        writeStream.end();
        writeStream = null;
    }
}
