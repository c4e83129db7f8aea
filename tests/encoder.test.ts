import { describe, expect, it, vi } from 'vitest';

import type { IDecodedImage, IProgressBar } from '../src/@types/index.js';
import { encode } from '../src/core/encoder/index.js';
import { validateEntryNames } from '../src/core/encoder/lib/validateNames.js';
import { DuplicateNameError, ImageDecodeError, InvalidNameError, IoError } from '../src/errors/index.js';
import { BufferSink } from '../src/utils/io/bufferIo.js';
import { FakeImageProcessor, fakeImageBytes } from './helpers/fakeImageProcessor.js';
import { MockLogger } from './helpers/mockLogger.js';

describe('Encoder', () => {
    it('should write the documented wire layout', async () => {
        const sink = new BufferSink();
        await encode(
            sink,
            [
                { name: 'a', data: fakeImageBytes(1, 1, [7]) },
                { name: 'é', data: fakeImageBytes(2, 1, [1, 2], 'canonical') },
            ],
            { imageProcessor: new FakeImageProcessor() },
        );

        expect(Array.from(sink.toUint8Array())).toEqual([
            0x53, 0x46, 0x41, 0x01, // magic + version
            0, 0, 0, 2, // entry count
            0, 0, 0, 1, 0x61, // name "a"
            0, 0, 0, 6, 0x50, 0x49, 0x58, 1, 1, 7, // canonical image
            0, 0, 0, 2, 0xc3, 0xa9, // name "é"
            0, 0, 0, 7, 0x50, 0x49, 0x58, 2, 1, 1, 2,
        ]);
    });

    it('should write an empty container', async () => {
        const sink = new BufferSink();
        await encode(sink, [], { imageProcessor: new FakeImageProcessor() });
        expect(Array.from(sink.toUint8Array())).toEqual([0x53, 0x46, 0x41, 0x01, 0, 0, 0, 0]);
    });

    it('should accept any iterable of entries', async () => {
        function* entries() {
            yield { name: 'first', data: fakeImageBytes(1, 1, [1]) };
            yield { name: 'second', data: fakeImageBytes(1, 1, [2]) };
        }
        const sink = new BufferSink();
        await encode(sink, entries(), { imageProcessor: new FakeImageProcessor() });
        expect(sink.byteLength).toBe(8 + (4 + 5 + 4 + 6) + (4 + 6 + 4 + 6));
    });

    it('should reject the first repeated name before writing anything', async () => {
        const sink = new BufferSink();
        const processor = new FakeImageProcessor();
        const error = await encode(
            sink,
            [
                { name: 'a.png', data: fakeImageBytes(1, 1, [1]) },
                { name: 'b.png', data: fakeImageBytes(1, 1, [2]) },
                { name: 'b.png', data: fakeImageBytes(1, 1, [3]) },
                { name: 'a.png', data: fakeImageBytes(1, 1, [4]) },
            ],
            { imageProcessor: processor },
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DuplicateNameError);
        expect(error).toMatchObject({ kind: 'duplicate-name', entryName: 'b.png', message: 'Duplicate entry name "b.png"' });
        expect(sink.byteLength).toBe(0);
        expect(processor.decodeCalls).toBe(0);
    });

    it('should report an undecodable image with the name of its entry', async () => {
        const error = await encode(
            new BufferSink(),
            [
                { name: 'ok.png', data: fakeImageBytes(1, 1, [1]) },
                { name: 'broken.png', data: Uint8Array.from([1, 2, 3]) },
            ],
            { imageProcessor: new FakeImageProcessor() },
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ImageDecodeError);
        expect(error).toMatchObject({
            entryName: 'broken.png',
            message: 'Entry "broken.png" is not a decodable image: unrecognised image data',
        });
    });

    it('should report the earliest failing entry regardless of completion order', async () => {
        class SlowFailures extends FakeImageProcessor {
            override async decodeImage(bytes: Uint8Array): Promise<IDecodedImage> {
                // first byte is the delay before failing
                await new Promise((resolve) => setTimeout(resolve, bytes[0]));
                throw new Error(`failed after ${bytes[0]}ms`);
            }
        }
        const error = await encode(
            new BufferSink(),
            [
                { name: 'slow', data: Uint8Array.from([40]) },
                { name: 'fast', data: Uint8Array.from([1]) },
            ],
            { imageProcessor: new SlowFailures(), concurrency: 2 },
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ImageDecodeError);
        expect(error).toMatchObject({ entryName: 'slow' });
    });

    it('should keep input order when normalizing concurrently', async () => {
        class ReverseTiming extends FakeImageProcessor {
            override async decodeImage(bytes: Uint8Array): Promise<IDecodedImage> {
                // earlier entries take longer
                await new Promise((resolve) => setTimeout(resolve, 30 - bytes[5] * 10));
                return await super.decodeImage(bytes);
            }
        }
        const entries = [0, 1, 2].map((sample) => ({ name: `n${sample}`, data: fakeImageBytes(1, 1, [sample]) }));

        const concurrent = new BufferSink();
        await encode(concurrent, entries, { imageProcessor: new ReverseTiming(), concurrency: 3 });
        const sequential = new BufferSink();
        await encode(sequential, entries, { imageProcessor: new FakeImageProcessor() });

        expect(concurrent.toUint8Array()).toEqual(sequential.toUint8Array());
    });

    it('should surface sink failures as IoError', async () => {
        const sink = { write: () => Promise.reject(new Error('disk full')) };
        const error = await encode(sink, [{ name: 'a', data: fakeImageBytes(1, 1, [1]) }], {
            imageProcessor: new FakeImageProcessor(),
        }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(IoError);
        expect(error).toMatchObject({ message: 'Failed to write container header: disk full' });
    });

    it('should flush the sink once everything is written', async () => {
        const written: number[] = [];
        const sink = {
            write: vi.fn((chunk: Uint8Array) => {
                written.push(chunk.length);
                return Promise.resolve();
            }),
            flush: vi.fn(() => Promise.resolve()),
        };
        await encode(sink, [{ name: 'a', data: fakeImageBytes(1, 1, [1]) }], { imageProcessor: new FakeImageProcessor() });

        expect(written).toEqual([4, 4, 5, 10]);
        expect(sink.flush).toHaveBeenCalledTimes(1);
        expect(sink.flush.mock.invocationCallOrder[0]).toBeGreaterThan(sink.write.mock.invocationCallOrder[3]);
    });

    it('should trace state transitions and drive the progress bar', async () => {
        const logger = new MockLogger(true);
        const progressBar: IProgressBar = {
            start: vi.fn(),
            setTotal: vi.fn(),
            stop: vi.fn(),
            increment: vi.fn(),
        };
        await encode(
            new BufferSink(),
            [
                { name: 'a', data: fakeImageBytes(1, 1, [1]) },
                { name: 'b', data: fakeImageBytes(1, 1, [2]) },
            ],
            { imageProcessor: new FakeImageProcessor(), logger, verbose: true, progressBar },
        );

        expect(progressBar.start).toHaveBeenCalledWith(10, 0);
        expect(progressBar.increment).toHaveBeenCalledTimes(10);
        expect(progressBar.increment).toHaveBeenLastCalledWith({ state: 'COMPLETED' });
        expect(logger.debugMessages).toContain('STATE :: Transitioning from state "INIT" -> "VALIDATE_NAMES"');
        expect(logger.debugMessages).toContain('STATE :: Transitioning from state "FLUSH" -> "COMPLETED"');
        expect(logger.infoMessages).toContain('Encoded 2 entries (38 bytes).');
    });

    it('should log the failing state', async () => {
        const logger = new MockLogger();
        await expect(
            encode(new BufferSink(), [{ name: '', data: fakeImageBytes(1, 1, [1]) }], {
                imageProcessor: new FakeImageProcessor(),
                logger,
            }),
        ).rejects.toBeInstanceOf(InvalidNameError);
        expect(logger.errorMessages[0]).toBe(
            'Error occurred during "VALIDATE_NAMES": Invalid entry name "": name must not be empty',
        );
    });
});

describe('validateEntryNames', () => {
    it('should return the UTF-8 encoding of every name', () => {
        expect(validateEntryNames(['ab', 'ü']).map((bytes) => Array.from(bytes))).toEqual([[0x61, 0x62], [0xc3, 0xbc]]);
    });

    it('should reject names that are not valid Unicode', () => {
        expect(() => validateEntryNames(['bad\ud800'])).toThrow(InvalidNameError);
    });

    it('should reject names beyond the byte limit', () => {
        expect(() => validateEntryNames(['abcd'], 4)).not.toThrow();
        expect(() => validateEntryNames(['abcde'], 4)).toThrow(
            'Invalid entry name "abcde": name is 5 bytes long, at most 4 allowed',
        );
        // two bytes per character
        expect(() => validateEntryNames(['ééé'], 4)).toThrow(InvalidNameError);
    });

    it('should treat names as case sensitive', () => {
        expect(() => validateEntryNames(['A.png', 'a.png'])).not.toThrow();
    });
});
