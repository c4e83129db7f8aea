// src/core/encoder/index.ts

import type { ByteSink, IEncodeOptions, IEntry } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { getDefaultImageProcessor } from '../imageProcessing/processor.js';
import { createCallLogger } from '../../utils/logging/logUtils.js';
import { EncodeStateMachine } from './stateMachine.js';

/**
 * Normalizes every entry to PNG and writes a complete container to the sink.
 * On failure the sink may hold a partial container.
 *
 * @param {ByteSink} sink - Destination of the container bytes.
 * @param {Iterable<IEntry>} entries - Entries in write order; names must be unique.
 * @param {Partial<IEncodeOptions>} [options] - Logger, image processor, concurrency and progress reporting.
 * @return {Promise<void>} Resolves once the container has been written and the sink flushed.
 */
export async function encode(
    sink: ByteSink,
    entries: Iterable<IEntry>,
    options: Partial<IEncodeOptions> = {},
): Promise<void> {
    const stateMachine = new EncodeStateMachine(sink, entries, resolveEncodeOptions(options));
    await stateMachine.run();
}

export function resolveEncodeOptions(options: Partial<IEncodeOptions>): IEncodeOptions {
    const verbose = options.verbose ?? false;
    return {
        ...options,
        verbose,
        logger: options.logger ?? createCallLogger('encoder', verbose),
        imageProcessor: options.imageProcessor ?? getDefaultImageProcessor(),
        concurrency: options.concurrency ?? config.encoder.concurrency,
    };
}
