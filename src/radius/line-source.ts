/**
 * Line sources consumed by the dictionary parser
 */

import { closeSync, fstatSync, openSync, readSync } from 'fs';
import { resolve } from 'path';
import { StringDecoder } from 'string_decoder';

const READ_CHUNK_SIZE = 64 * 1024;

export interface LineSource extends Iterable<string> {
    // Absolute path of the file the lines come from, if any; relative includes resolve against its directory
    readonly origin?: string;
}

export interface OpenedLineSource extends LineSource {
    close(): void;
}

/**
 * Opens an included dictionary by its resolved path. Throws when the file cannot be opened.
 */
export type IncludeOpener = (resolvedPath: string) => OpenedLineSource;

export function textLineSource(text: string, origin?: string): LineSource {
    const lines = text.split(/\r?\n/);
    return {
        origin,
        [Symbol.iterator]: () => lines[Symbol.iterator](),
    };
}

/**
 * Reads a file line by line through a single descriptor held until close()
 */
export class FileLineSource implements OpenedLineSource {
    readonly origin: string;
    private fd: number | null;

    constructor(filePath: string) {
        this.origin = resolve(filePath);
        const fd = openSync(this.origin, 'r');
        try {
            if (!fstatSync(fd).isFile()) {
                throw new Error(`${this.origin} is not a regular file`);
            }
        } catch (err) {
            closeSync(fd);
            throw err;
        }
        this.fd = fd;
    }

    get closed(): boolean {
        return this.fd === null;
    }

    *[Symbol.iterator](): Iterator<string> {
        const decoder = new StringDecoder('utf8');
        const chunk = Buffer.alloc(READ_CHUNK_SIZE);
        let pending = '';

        while (this.fd !== null) {
            const bytesRead = readSync(this.fd, chunk, 0, READ_CHUNK_SIZE, null);
            if (bytesRead === 0) break;

            pending += decoder.write(chunk.subarray(0, bytesRead));
            const lines = pending.split(/\r?\n/);
            pending = lines.pop() ?? '';
            yield* lines;
        }

        pending += decoder.end();
        if (pending !== '') {
            yield pending;
        }
    }

    close(): void {
        if (this.fd !== null) {
            closeSync(this.fd);
            this.fd = null;
        }
    }
}

export const openFileLineSource: IncludeOpener = (resolvedPath) => new FileLineSource(resolvedPath);
