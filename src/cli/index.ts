// src/cli/index.ts

import cliProgress from 'cli-progress';
import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import type { IProgressBar } from '../@types/index.js';
import { config } from '../config/index.js';
import { toError } from '../errors/index.js';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.js';
import { list, pack, unpack } from './commands.js';
import { exitCodeFor } from './exitCodes.js';

interface ICommonOptions {
    log?: boolean;
    verbose?: boolean;
}

interface IPackCommandOptions extends ICommonOptions {
    output: string;
    concurrency?: number;
    compressionLevel?: number;
}

interface IUnpackCommandOptions extends ICommonOptions {
    output: string;
}

function parseIntegerInRange(min: number, max: number): (value: string) => number {
    return (value: string) => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
            throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
        }
        return parsed;
    };
}

/**
 * Logs a failed command on stderr and sets the exit status for its error kind.
 */
function reportFailure(action: string, error: unknown): void {
    getLogger('sfa', console).error(`${action} failed: ${toError(error).message}`);
    process.exitCode = exitCodeFor(error);
}

export function createProgram(): Command {
    const program = new Command();
    program
        .name('sfa')
        .description('Packs images into single file asset (SFA) containers and extracts them again')
        .version('1.0.0');

    program
        .command('pack')
        .description('Create an SFA container from image files')
        .argument('<inputs...>', 'Input images, any format the image library reads; stored as PNG')
        .requiredOption('-o, --output <file>', 'Output SFA file')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .option(
            '--concurrency <number>',
            `Images normalized in parallel (Default: ${config.encoder.concurrency})`,
            parseIntegerInRange(1, 64),
        )
        .option(
            '--compression-level <number>',
            `PNG compression level 0-9 (Default: ${config.imageCompression.compressionLevel})`,
            parseIntegerInRange(0, 9),
        )
        .showHelpAfterError()
        .action(async (inputs: string[], options: IPackCommandOptions) => {
            const verbose = options.verbose ?? false;
            const isLogging = options.log ?? false;
            const logger = getLogger('pack', isLogging ? console : NoopLogFacility, verbose);

            let progressBar: IProgressBar | undefined;
            if (!isLogging) {
                progressBar = new cliProgress.SingleBar({
                    format: 'Packing |{bar}| {percentage}% || {value}/{total} state: {state}',
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                }, cliProgress.Presets.shades_grey);
            }
            try {
                await pack(inputs.map((input) => path.resolve(input)), {
                    output: path.resolve(options.output),
                    logger,
                    verbose,
                    concurrency: options.concurrency,
                    compressionLevel: options.compressionLevel,
                    progressBar,
                });
            } catch (error) {
                progressBar?.stop();
                reportFailure('Packing', error);
            }
        });

    program
        .command('unpack')
        .description('Extract every image of an SFA container into a directory')
        .argument('<input>', 'Input SFA file')
        .requiredOption('-o, --output <directory>', 'Output directory, created when missing')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .action(async (input: string, options: IUnpackCommandOptions) => {
            const verbose = options.verbose ?? false;
            const logger = getLogger('unpack', options.log ? console : NoopLogFacility, verbose);
            try {
                await unpack(path.resolve(input), { output: path.resolve(options.output), logger, verbose });
            } catch (error) {
                reportFailure('Unpacking', error);
            }
        });

    program
        .command('list')
        .description('List the entries of an SFA container')
        .argument('<input>', 'Input SFA file')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .action(async (input: string, options: ICommonOptions) => {
            const verbose = options.verbose ?? false;
            const logger = getLogger('list', options.log ? console : NoopLogFacility, verbose);
            try {
                await list(path.resolve(input), { logger, verbose, print: (line) => console.log(line) });
            } catch (error) {
                reportFailure('Listing', error);
            }
        });

    return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
    await createProgram().parseAsync(argv);
}
