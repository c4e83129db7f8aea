// src/core/decoder/index.ts

import type { ByteSource, IDecodedImage, IDecodeOptions } from '../../@types/index.js';
import { IoError, toError } from '../../errors/index.js';
import { getDefaultImageProcessor } from '../imageProcessing/processor.js';
import { FileSource } from '../../utils/io/fileIo.js';
import { closeSource, releaseAfterFailure, withRelease } from '../../utils/io/ioHelpers.js';
import { createCallLogger } from '../../utils/logging/logUtils.js';
import { DecodeStateMachine } from './stateMachine.js';

/**
 * Decodes the container stored in a file.
 *
 * @param {string} filePath - Path of the container file.
 * @param {Partial<IDecodeOptions>} [options] - Logger, image processor and progress reporting.
 * @return {Promise<Map<string, IDecodedImage>>} Entry name to decoded image, in stream order.
 */
export async function decode(
    filePath: string,
    options: Partial<IDecodeOptions> = {},
): Promise<Map<string, IDecodedImage>> {
    const resolved = resolveDecodeOptions(options);
    let source: FileSource;
    try {
        source = await FileSource.open(filePath);
    } catch (error) {
        throw new IoError(`Failed to open "${filePath}": ${toError(error).message}`, error);
    }
    return await withRelease(() => decodeFromReader(source, resolved), () => closeSource(source), resolved.logger);
}

/**
 * Decodes a container from any sequential byte source. Either every entry is decoded or an error is thrown;
 * a partially decoded container is never returned. On failure the source is closed when it supports it.
 *
 * @param {ByteSource} source - Source positioned at the start of the container.
 * @param {Partial<IDecodeOptions>} [options] - Logger, image processor and progress reporting.
 * @return {Promise<Map<string, IDecodedImage>>} Entry name to decoded image, in stream order.
 */
export async function decodeFromReader(
    source: ByteSource,
    options: Partial<IDecodeOptions> = {},
): Promise<Map<string, IDecodedImage>> {
    const resolved = resolveDecodeOptions(options);
    const stateMachine = new DecodeStateMachine(source, resolved);
    try {
        await stateMachine.run();
    } catch (error) {
        await releaseAfterFailure(() => closeSource(source), resolved.logger);
        throw error;
    }
    return stateMachine.images;
}

export function resolveDecodeOptions(options: Partial<IDecodeOptions>): IDecodeOptions {
    const verbose = options.verbose ?? false;
    return {
        ...options,
        verbose,
        logger: options.logger ?? createCallLogger('decoder', verbose),
        imageProcessor: options.imageProcessor ?? getDefaultImageProcessor(),
    };
}
