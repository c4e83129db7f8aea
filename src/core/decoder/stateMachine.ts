// src/core/decoder/stateMachine.ts

import { Buffer } from 'node:buffer';
import type { ByteSource, IDecodedImage, IDecodeOptions } from '../../@types/index.js';
import { config, FORMAT_VERSION, HEADER_LENGTH, MAGIC_BYTE } from '../../config/index.js';
import { CorruptionError, FormatError, ImageDecodeError } from '../../errors/index.js';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { DecoderStates } from '../../stateMachine/definedStates.js';
import { isAtEnd, readExact } from '../../utils/io/ioHelpers.js';
import {
    decodeUtf8Strict,
    deserializeUInt32,
    hasMagicBytes,
} from '../../utils/serialization/serializationHelpers.js';
import { describeImage } from '../imageProcessing/pixelFormat.js';

export class DecodeStateMachine extends AbstractStateMachine<DecoderStates, IDecodeOptions> {
    private entryCount = 0;
    private results = new Map<string, IDecodedImage>();

    constructor(
        private readonly source: ByteSource,
        options: IDecodeOptions,
    ) {
        super(DecoderStates.INIT, options);
        this.stateTransitions = [
            { state: DecoderStates.INIT, handler: this.init },
            { state: DecoderStates.READ_HEADER, handler: this.readHeader },
            { state: DecoderStates.READ_ENTRY_COUNT, handler: this.readEntryCount },
            { state: DecoderStates.READ_ENTRIES, handler: this.readEntries },
            { state: DecoderStates.VERIFY_END_OF_STREAM, handler: this.verifyEndOfStream },
        ];
    }

    /**
     * The decoded entries in stream order. Only populated once the machine completed.
     */
    get images(): Map<string, IDecodedImage> {
        if (this.state !== DecoderStates.COMPLETED) {
            throw new Error(`Decoding has not completed (state "${this.state}")`);
        }
        return this.results;
    }

    protected getCompletionState(): DecoderStates {
        return DecoderStates.COMPLETED;
    }

    protected getErrorState(): DecoderStates {
        return DecoderStates.ERROR;
    }

    protected override totalSteps(): number {
        // every entry passes READ_NAME, READ_IMAGE_DATA and DECODE_IMAGE
        return super.totalSteps() + this.entryCount * 3;
    }

    protected override handleError(error: Error): never {
        this.results = new Map();
        return super.handleError(error);
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info('Initializing decoding process...');
    }

    private async readHeader(): Promise<void> {
        const header = await readExact(this.source, HEADER_LENGTH, 'container header');
        if (!hasMagicBytes(header)) {
            throw new FormatError(
                `Not an SFA container: expected magic bytes ${MAGIC_BYTE.toString('hex')}, found ${
                    Buffer.from(header.subarray(0, MAGIC_BYTE.length)).toString('hex')
                }`,
            );
        }
        const version = header[MAGIC_BYTE.length];
        if (version !== FORMAT_VERSION) {
            throw new FormatError(`Unsupported SFA format version ${version}, expected ${FORMAT_VERSION}`);
        }
    }

    private async readEntryCount(): Promise<void> {
        const { logger } = this.options;
        this.entryCount = await this.readUInt32('entry count');
        logger.debug(`Container declares ${this.entryCount} entries.`);
        this.refreshProgressTotal();
    }

    private async readEntries(): Promise<void> {
        for (let index = 0; index < this.entryCount; index++) {
            this.transitionTo(DecoderStates.READ_NAME);
            const name = await this.readName(index);

            this.transitionTo(DecoderStates.READ_IMAGE_DATA);
            const dataLength = await this.readUInt32(`image data length of entry "${name}"`, name);
            const data = await readExact(this.source, dataLength, `image data of entry "${name}"`, name);

            this.transitionTo(DecoderStates.DECODE_IMAGE);
            const image = await this.decodeImage(name, data);
            this.results.set(name, image);
            this.options.logger.debug(`Decoded "${name}" (${describeImage(image)}).`);
        }
    }

    private async verifyEndOfStream(): Promise<void> {
        const { logger } = this.options;
        if (!(await isAtEnd(this.source))) {
            throw new CorruptionError(`Unexpected trailing data after ${this.entryCount} entries`);
        }
        logger.info(`Decoded ${this.results.size} entries.`);
    }

    private async readName(index: number): Promise<string> {
        const field = `name of entry #${index + 1}`;
        const length = await this.readUInt32(`${field} length`);
        if (length === 0) {
            throw new CorruptionError(`Empty ${field}`);
        }
        if (length > config.limits.maxNameBytes) {
            throw new CorruptionError(
                `Declared ${field} length ${length} exceeds the limit of ${config.limits.maxNameBytes} bytes`,
            );
        }
        const bytes = await readExact(this.source, length, field);
        let name: string;
        try {
            name = decodeUtf8Strict(bytes);
        } catch {
            throw new CorruptionError(`The ${field} is not valid UTF-8`);
        }
        if (this.results.has(name)) {
            throw new CorruptionError(`Duplicate entry name "${name}" in container`, name);
        }
        return name;
    }

    private async decodeImage(name: string, data: Uint8Array): Promise<IDecodedImage> {
        try {
            return await this.options.imageProcessor.decodeImage(data, 'png');
        } catch (error) {
            throw new ImageDecodeError(name, error);
        }
    }

    private async readUInt32(field: string, entryName?: string): Promise<number> {
        const bytes = await readExact(this.source, 4, field, entryName);
        return deserializeUInt32(bytes, 0).value;
    }
}
