// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type {
    BitDepth,
    CanonicalFormat,
    Channels,
    IDecodedImage,
    ImageProcessor,
    IPngSettings,
} from '../../../@types/index.js';
import { config } from '../../../config/index.js';
import { bitDepthOf, pixelFormatForChannels } from '../pixelFormat.js';

export class SharpImageProcessor implements ImageProcessor {
    private readonly pngSettings: IPngSettings;

    constructor(pngSettings: Partial<IPngSettings> = {}) {
        this.pngSettings = { ...config.imageCompression, ...pngSettings };
    }

    /**
     * Decodes the given bytes into raw, interleaved pixel data. The input format is sniffed by sharp.
     * Sources with samples wider than a byte are read as 16-bit, all others as 8-bit; no colour space
     * conversion or orientation correction is applied.
     *
     * @param {Uint8Array} bytes - Encoded image bytes.
     * @param {CanonicalFormat} [expectedFormat] - Reject input that is not of this format.
     * @return {Promise<IDecodedImage>} The decoded pixel grid.
     */
    public async decodeImage(bytes: Uint8Array, expectedFormat?: CanonicalFormat): Promise<IDecodedImage> {
        const image = sharp(bytes, { failOn: 'error' });
        const metadata = await image.metadata();
        if (expectedFormat && metadata.format !== expectedFormat) {
            throw new Error(`expected ${expectedFormat} data, found ${metadata.format ?? 'unknown format'}`);
        }
        const depth = bitDepthOf(metadata.depth);
        const { data, info } = await image
            .raw({ depth: depth === 16 ? 'ushort' : 'uchar' })
            .toBuffer({ resolveWithObject: true });
        return toDecodedImage(data, info.width, info.height, info.channels, depth);
    }

    /**
     * Encodes a pixel grid as a lossless, non-palette PNG of the grid's bit depth.
     *
     * @param {IDecodedImage} image - The pixel grid to encode.
     * @return {Promise<Uint8Array>} PNG bytes.
     */
    public async encodeCanonical(image: IDecodedImage): Promise<Uint8Array> {
        return await this.fromRaw(image)
            .png({
                compressionLevel: this.pngSettings.compressionLevel,
                adaptiveFiltering: this.pngSettings.adaptiveFiltering,
                palette: false,
            })
            .toBuffer();
    }

    /**
     * Writes a pixel grid to disk. The output format follows the file extension; formats without
     * 16-bit support receive 8-bit samples.
     */
    public async writeImageFile(image: IDecodedImage, outputPath: string): Promise<void> {
        await this.fromRaw(image).toFile(outputPath);
    }

    private fromRaw(image: IDecodedImage): sharp.Sharp {
        const raw = { width: image.width, height: image.height, channels: image.channels };
        if (image.depth === 16) {
            // a Uint16Array input tells sharp the raw samples are 16-bit
            return sharp(toSamples16(image.data), { raw }).toColourspace(image.channels < 3 ? 'grey16' : 'rgb16');
        }
        return sharp(image.data, { raw });
    }
}

function toSamples16(data: Uint8Array): Uint16Array {
    const aligned = data.byteOffset % 2 === 0 ? data : data.slice();
    return new Uint16Array(aligned.buffer, aligned.byteOffset, aligned.byteLength >> 1);
}

function toDecodedImage(
    data: Uint8Array,
    width: number,
    height: number,
    channels: Channels,
    depth: BitDepth,
): IDecodedImage {
    return {
        width,
        height,
        channels,
        depth,
        format: pixelFormatForChannels(channels),
        data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    };
}
