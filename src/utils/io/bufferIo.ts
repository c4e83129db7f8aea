// src/utils/io/bufferIo.ts

import type { ByteSink, ByteSource } from '../../@types/index.js';
import { concatBytes } from '../serialization/serializationHelpers.js';

/**
 * Collects written chunks in memory.
 */
export class BufferSink implements ByteSink {
    private chunks: Uint8Array[] = [];
    private length = 0;

    get byteLength(): number {
        return this.length;
    }

    write(chunk: Uint8Array): Promise<void> {
        // copy, the caller may reuse its buffer
        this.chunks.push(chunk.slice());
        this.length += chunk.length;
        return Promise.resolve();
    }

    toUint8Array(): Uint8Array {
        const merged = concatBytes(this.chunks);
        this.chunks = [merged];
        return merged.slice();
    }
}

/**
 * Reads sequentially from an in-memory byte array.
 */
export class BufferSource implements ByteSource {
    private offset = 0;

    constructor(private readonly bytes: Uint8Array) {}

    get remaining(): number {
        return this.bytes.length - this.offset;
    }

    read(length: number): Promise<Uint8Array> {
        const end = Math.min(this.offset + Math.max(0, length), this.bytes.length);
        const chunk = this.bytes.subarray(this.offset, end);
        this.offset = end;
        return Promise.resolve(chunk);
    }
}
