// src/utils/io/streamIo.ts

import type { Writable } from 'node:stream';
import type { ByteSink, ByteSource } from '../../@types/index.js';

/**
 * Sink over a Node writable stream. A write resolves once the stream has accepted the chunk.
 * The stream is not ended by the sink.
 */
export class StreamSink implements ByteSink {
    constructor(private readonly stream: Writable) {}

    write(chunk: Uint8Array): Promise<void> {
        return new Promise((resolve, reject) => {
            this.stream.write(chunk, (error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }
}

/**
 * Source over any async iterable of byte chunks, such as a Node readable stream
 * (without a string encoding set) or a web ReadableStream.
 */
export class StreamSource implements ByteSource {
    private readonly iterator: AsyncIterator<Uint8Array>;
    private leftover: Uint8Array = new Uint8Array(0);
    private ended = false;

    constructor(stream: AsyncIterable<Uint8Array>) {
        this.iterator = stream[Symbol.asyncIterator]();
    }

    async read(length: number): Promise<Uint8Array> {
        if (length <= 0) {
            return new Uint8Array(0);
        }
        while (this.leftover.length === 0 && !this.ended) {
            const next = await this.iterator.next();
            if (next.done) {
                this.ended = true;
            } else {
                this.leftover = next.value;
            }
        }
        const chunk = this.leftover.subarray(0, length);
        this.leftover = this.leftover.subarray(chunk.length);
        return chunk;
    }

    /**
     * Stops iterating. A Node readable stream is destroyed by this.
     */
    async close(): Promise<void> {
        this.leftover = new Uint8Array(0);
        if (this.ended) {
            return;
        }
        this.ended = true;
        await this.iterator.return?.();
    }
}
