// src/utils/io/fileIo.ts

import type { FileHandle } from 'node:fs/promises';
import { open } from 'node:fs/promises';
import type { ByteSink, ByteSource } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { concatBytes } from '../serialization/serializationHelpers.js';

/**
 * Buffered sink writing to a file. Pending bytes reach the file on `flush()` or `close()`.
 */
export class FileSink implements ByteSink {
    private pending: Uint8Array[] = [];
    private pendingLength = 0;

    private constructor(
        private readonly handle: FileHandle,
        private readonly bufferSize: number,
    ) {}

    /**
     * Creates (or truncates) the file at `filePath` and returns a sink writing to it.
     */
    static async create(filePath: string, bufferSize: number = config.io.fileWriteBufferSize): Promise<FileSink> {
        const handle = await open(filePath, 'w');
        return new FileSink(handle, bufferSize);
    }

    async write(chunk: Uint8Array): Promise<void> {
        if (this.pendingLength + chunk.length > this.bufferSize) {
            await this.flush();
        }
        if (chunk.length >= this.bufferSize) {
            await writeFully(this.handle, chunk);
            return;
        }
        this.pending.push(chunk.slice());
        this.pendingLength += chunk.length;
    }

    async flush(): Promise<void> {
        if (this.pendingLength === 0) {
            return;
        }
        const data = concatBytes(this.pending);
        this.pending = [];
        this.pendingLength = 0;
        await writeFully(this.handle, data);
    }

    async close(): Promise<void> {
        try {
            await this.flush();
        } finally {
            await this.handle.close();
        }
    }
}

/**
 * Sequential source reading from a file.
 */
export class FileSource implements ByteSource {
    private closed = false;

    private constructor(private readonly handle: FileHandle) {}

    static async open(filePath: string): Promise<FileSource> {
        const handle = await open(filePath, 'r');
        return new FileSource(handle);
    }

    async read(length: number): Promise<Uint8Array> {
        if (length <= 0) {
            return new Uint8Array(0);
        }
        const buffer = new Uint8Array(length);
        const { bytesRead } = await this.handle.read(buffer, 0, length, null);
        return buffer.subarray(0, bytesRead);
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.handle.close();
    }
}

async function writeFully(handle: FileHandle, data: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
        const { bytesWritten } = await handle.write(data, offset, data.length - offset, null);
        offset += bytesWritten;
    }
}
