// src/cli/commands.ts

import os from 'node:os';
import path from 'node:path';
import pLimit from 'p-limit';
import type { IDecodedImage, IEntry, ILogger, IProgressBar } from '../@types/index.js';
import { config } from '../config/index.js';
import { decode } from '../core/decoder/index.js';
import { encode } from '../core/encoder/index.js';
import { describeImage } from '../core/imageProcessing/pixelFormat.js';
import { SharpImageProcessor } from '../core/imageProcessing/strategies/SharpImageProcessor.js';
import { IoError, toError } from '../errors/index.js';
import { FileSink } from '../utils/io/fileIo.js';
import { withRelease } from '../utils/io/ioHelpers.js';
import {
    ensureOutputDirectory,
    readBufferFromFile,
    resolveOutputImagePath,
    writeFileAtomically,
} from '../utils/storage/storageUtils.js';

export interface IPackOptions {
    output: string;
    logger: ILogger;
    verbose: boolean;
    concurrency?: number;
    compressionLevel?: number;
    progressBar?: IProgressBar;
}

export interface IUnpackOptions {
    output: string;
    logger: ILogger;
    verbose: boolean;
}

export interface IListOptions {
    logger: ILogger;
    verbose: boolean;
    print: (line: string) => void;
}

/**
 * Packs the given image files into a container named by `options.output`. Entries are named by
 * the base name of their file. The container only appears at its final path once fully written.
 *
 * @param {string[]} inputFiles - Image files, in entry order.
 * @param {IPackOptions} options - Output path, logging and encoder settings.
 * @return {Promise<void>}
 */
export async function pack(inputFiles: string[], options: IPackOptions): Promise<void> {
    const { output, logger, verbose, progressBar } = options;
    const entries = await readEntries(inputFiles, logger);
    const imageProcessor = new SharpImageProcessor(
        options.compressionLevel === undefined ? {} : { compressionLevel: options.compressionLevel },
    );

    await writeFileAtomically(output, async (temporaryPath) => {
        const sink = await createSink(temporaryPath, output);
        await withRelease(
            () =>
                encode(sink, entries, {
                    logger,
                    verbose,
                    imageProcessor,
                    concurrency: options.concurrency ?? config.encoder.concurrency,
                    progressBar,
                }),
            () => closeSink(sink, output),
            logger,
        );
    });
    progressBar?.stop();
    logger.success(`Packed ${entries.length} images into "${output}".`);
}

/**
 * Decodes a container and writes every image into the output directory.
 */
export async function unpack(inputFile: string, options: IUnpackOptions): Promise<void> {
    const { output, logger, verbose } = options;
    const images = await decode(inputFile, { logger, verbose });
    await ensureOutputDirectory(output);

    const imageProcessor = new SharpImageProcessor();
    const writtenPaths = new Set<string>();
    for (const [name, image] of images) {
        const outputPath = resolveOutputImagePath(output, name);
        if (writtenPaths.has(outputPath)) {
            logger.warn(`Entry "${name}" maps to "${outputPath}", which an earlier entry already used. Overwriting.`);
        }
        await writeImage(imageProcessor, image, outputPath, name);
        writtenPaths.add(outputPath);
        logger.debug(`Wrote "${name}" to "${outputPath}".`);
    }
    logger.success(`Unpacked ${images.size} images into "${output}".`);
}

/**
 * Prints one line per entry: name, dimensions and pixel format, tab separated.
 */
export async function list(inputFile: string, options: IListOptions): Promise<void> {
    const { logger, verbose, print } = options;
    const images = await decode(inputFile, { logger, verbose });
    for (const [name, image] of images) {
        print(`${name}\t${image.width}x${image.height}\t${image.format}`);
    }
}

async function readEntries(inputFiles: string[], logger: ILogger): Promise<IEntry[]> {
    const limit = pLimit(Math.max(1, Math.min(config.cli.maxOpenFiles, os.cpus().length)));
    return await Promise.all(
        inputFiles.map((inputFile) =>
            limit(async () => {
                let data: Uint8Array;
                try {
                    data = await readBufferFromFile(inputFile);
                } catch (error) {
                    throw new IoError(`Failed to read "${inputFile}": ${toError(error).message}`, error);
                }
                logger.debug(`Read ${data.length} bytes from "${inputFile}".`);
                return { name: path.basename(inputFile), data };
            })
        ),
    );
}

async function createSink(temporaryPath: string, output: string): Promise<FileSink> {
    try {
        return await FileSink.create(temporaryPath);
    } catch (error) {
        throw new IoError(`Failed to create "${output}": ${toError(error).message}`, error);
    }
}

async function closeSink(sink: FileSink, output: string): Promise<void> {
    try {
        await sink.close();
    } catch (error) {
        throw new IoError(`Failed to write "${output}": ${toError(error).message}`, error);
    }
}

async function writeImage(
    imageProcessor: SharpImageProcessor,
    image: IDecodedImage,
    outputPath: string,
    name: string,
): Promise<void> {
    try {
        await imageProcessor.writeImageFile(image, outputPath);
    } catch (error) {
        throw new IoError(
            `Failed to write entry "${name}" (${describeImage(image)}) to "${outputPath}": ${toError(error).message}`,
            error,
        );
    }
}
