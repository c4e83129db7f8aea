// src/utils/io/ioHelpers.ts

import type { ByteSink, ByteSource, ILogger } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { CorruptionError, IoError, toError } from '../../errors/index.js';
import { concatBytes } from '../serialization/serializationHelpers.js';

/**
 * Reads exactly `length` bytes from the source. The read happens in pieces of at most
 * `chunkSize` bytes, so memory grows with the bytes actually present, not with `length`.
 *
 * @param {ByteSource} source - The source to read from.
 * @param {number} length - Number of bytes required.
 * @param {string} field - Field description used in error messages.
 * @param {string} [entryName] - Entry the field belongs to, if any.
 * @param {number} [chunkSize] - Upper bound for a single read.
 * @return {Promise<Uint8Array>} The requested bytes.
 * @throws {CorruptionError} When the source ends before `length` bytes were read.
 * @throws {IoError} When the source itself fails.
 */
export async function readExact(
    source: ByteSource,
    length: number,
    field: string,
    entryName?: string,
    chunkSize: number = config.io.readChunkSize,
): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let received = 0;
    while (received < length) {
        const chunk = await readFromSource(source, Math.min(length - received, chunkSize));
        if (chunk.length === 0) {
            throw new CorruptionError(
                `Unexpected end of stream while reading ${field}: expected ${length} bytes, got ${received}`,
                entryName,
            );
        }
        // sources may hand out views into buffers they reuse
        chunks.push(chunk.slice());
        received += chunk.length;
    }
    return concatBytes(chunks);
}

/**
 * Checks whether the source has no bytes left.
 */
export async function isAtEnd(source: ByteSource): Promise<boolean> {
    const probe = await readFromSource(source, 1);
    return probe.length === 0;
}

/**
 * Writes a chunk to the sink, reporting a failure as an `IoError`.
 */
export async function writeToSink(sink: ByteSink, chunk: Uint8Array, field: string): Promise<void> {
    try {
        await sink.write(chunk);
    } catch (error) {
        throw new IoError(`Failed to write ${field}: ${toError(error).message}`, error);
    }
}

export async function flushSink(sink: ByteSink): Promise<void> {
    if (!sink.flush) {
        return;
    }
    try {
        await sink.flush();
    } catch (error) {
        throw new IoError(`Failed to flush output: ${toError(error).message}`, error);
    }
}

/**
 * Closes the source when it can be closed, reporting a failure as an `IoError`.
 */
export async function closeSource(source: ByteSource): Promise<void> {
    if (!source.close) {
        return;
    }
    try {
        await source.close();
    } catch (error) {
        throw new IoError(`Failed to close input: ${toError(error).message}`, error);
    }
}

/**
 * Runs `task` and then `release`. When the task fails its error is the one thrown; a release
 * failing on top of it is logged as a warning.
 */
export async function withRelease<T>(
    task: () => Promise<T>,
    release: () => Promise<void>,
    logger: ILogger,
): Promise<T> {
    let result: T;
    try {
        result = await task();
    } catch (error) {
        await releaseAfterFailure(release, logger);
        throw error;
    }
    await release();
    return result;
}

export async function releaseAfterFailure(release: () => Promise<void>, logger: ILogger): Promise<void> {
    try {
        await release();
    } catch (error) {
        logger.warn(`Cleanup after an earlier error failed too: ${toError(error).message}`);
    }
}

async function readFromSource(source: ByteSource, length: number): Promise<Uint8Array> {
    try {
        return await source.read(length);
    } catch (error) {
        throw new IoError(`Failed to read input: ${toError(error).message}`, error);
    }
}
