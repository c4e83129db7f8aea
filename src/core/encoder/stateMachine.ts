// src/core/encoder/stateMachine.ts

import _ from 'lodash';
import type { ByteSink, IEncodeOptions, IEntry } from '../../@types/index.js';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { EncoderStates } from '../../stateMachine/definedStates.js';
import { normalizeImage } from '../normalizer/index.js';
import { flushSink, writeToSink } from '../../utils/io/ioHelpers.js';
import {
    serializeHeader,
    serializeLengthPrefixed,
    serializeUInt32,
    UINT32_MAX,
} from '../../utils/serialization/serializationHelpers.js';
import { validateEntryNames } from './lib/validateNames.js';

export class EncodeStateMachine extends AbstractStateMachine<EncoderStates, IEncodeOptions> {
    private readonly entries: IEntry[];
    private encodedNames: Uint8Array[] = [];
    private bytesWritten = 0;

    constructor(
        private readonly sink: ByteSink,
        entries: Iterable<IEntry>,
        options: IEncodeOptions,
    ) {
        super(EncoderStates.INIT, options);
        this.entries = Array.from(entries);
        this.stateTransitions = [
            { state: EncoderStates.INIT, handler: this.init },
            { state: EncoderStates.VALIDATE_NAMES, handler: this.validateNames },
            { state: EncoderStates.WRITE_HEADER, handler: this.writeHeader },
            { state: EncoderStates.WRITE_ENTRIES, handler: this.writeEntries },
            { state: EncoderStates.FLUSH, handler: this.flush },
        ];
    }

    protected getCompletionState(): EncoderStates {
        return EncoderStates.COMPLETED;
    }

    protected getErrorState(): EncoderStates {
        return EncoderStates.ERROR;
    }

    protected override totalSteps(): number {
        // every entry passes NORMALIZE_ENTRY and WRITE_ENTRY
        return super.totalSteps() + this.entries.length * 2;
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info(`Initializing encoding of ${this.entries.length} entries...`);
    }

    /**
     * Validates all entry names before anything reaches the sink, so that a rejected
     * name never leaves a partial container behind.
     */
    private validateNames(): void {
        const { logger } = this.options;
        if (this.entries.length > UINT32_MAX) {
            throw new RangeError(`Too many entries: ${this.entries.length}`);
        }
        this.encodedNames = validateEntryNames(this.entries.map((entry) => entry.name));
        logger.debug(`Validated ${this.encodedNames.length} entry names.`);
    }

    private async writeHeader(): Promise<void> {
        await this.write(serializeHeader(), 'container header');
        await this.write(serializeUInt32(this.entries.length), 'entry count');
    }

    /**
     * Normalizes entries in batches of `concurrency` and writes them strictly in input order.
     * Within a batch every normalization is awaited before the earliest failure is reported,
     * which keeps the reported error independent of scheduling.
     */
    private async writeEntries(): Promise<void> {
        const { logger, imageProcessor } = this.options;
        const concurrency = Math.max(1, Math.floor(this.options.concurrency));
        const batches = _.chunk(_.range(this.entries.length), concurrency);

        for (const batch of batches) {
            const results = await Promise.allSettled(
                batch.map((index) => {
                    const { name, data } = this.entries[index];
                    return normalizeImage(name, data, imageProcessor);
                }),
            );
            for (const [position, index] of batch.entries()) {
                const { name } = this.entries[index];
                this.transitionTo(EncoderStates.NORMALIZE_ENTRY);
                const result = results[position];
                if (result.status === 'rejected') {
                    throw result.reason;
                }
                logger.debug(`Normalized "${name}" to ${result.value.length} bytes of PNG.`);

                this.transitionTo(EncoderStates.WRITE_ENTRY);
                await this.write(serializeLengthPrefixed(this.encodedNames[index]), `name of entry "${name}"`);
                await this.write(serializeLengthPrefixed(result.value), `image data of entry "${name}"`);
            }
        }
    }

    private async flush(): Promise<void> {
        const { logger } = this.options;
        await flushSink(this.sink);
        logger.info(`Encoded ${this.entries.length} entries (${this.bytesWritten} bytes).`);
    }

    private async write(chunk: Uint8Array, field: string): Promise<void> {
        await writeToSink(this.sink, chunk, field);
        this.bytesWritten += chunk.length;
    }
}
