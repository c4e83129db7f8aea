// src/core/normalizer/index.ts

import type { IDecodedImage, ImageProcessor } from '../../@types/index.js';
import { ImageDecodeError, ImageEncodeError } from '../../errors/index.js';
import { getDefaultImageProcessor } from '../imageProcessing/processor.js';

/**
 * Converts image bytes of any decodable format into the canonical PNG encoding.
 * Dimensions and pixel values survive; metadata, compression and the original bytes do not.
 *
 * @param {string} name - Name of the entry, used in error reports.
 * @param {Uint8Array} bytes - Source image bytes.
 * @param {ImageProcessor} [processor] - Image capability to decode and encode with.
 * @return {Promise<Uint8Array>} Canonical PNG bytes.
 * @throws {ImageDecodeError} If the bytes are not a decodable image.
 * @throws {ImageEncodeError} If the decoded pixels cannot be written as PNG.
 */
export async function normalizeImage(
    name: string,
    bytes: Uint8Array,
    processor: ImageProcessor = getDefaultImageProcessor(),
): Promise<Uint8Array> {
    let image: IDecodedImage;
    try {
        image = await processor.decodeImage(bytes);
    } catch (error) {
        throw new ImageDecodeError(name, error);
    }
    try {
        return await processor.encodeCanonical(image);
    } catch (error) {
        throw new ImageEncodeError(name, error);
    }
}
