// src/core/encoder/lib/validateNames.ts

import { config } from '../../../config/index.js';
import { DuplicateNameError, InvalidNameError } from '../../../errors/index.js';
import { decodeUtf8Strict, encodeUtf8 } from '../../../utils/serialization/serializationHelpers.js';

/**
 * Checks entry names in iteration order and returns their UTF-8 encodings.
 *
 * @param {string[]} names - Entry names in write order.
 * @param {number} [maxNameBytes] - Largest accepted UTF-8 length of a name.
 * @return {Uint8Array[]} The encoded names, index-aligned with `names`.
 * @throws {InvalidNameError} For an empty, oversized or not UTF-8 representable name.
 * @throws {DuplicateNameError} At the first name that repeats an earlier one.
 */
export function validateEntryNames(
    names: string[],
    maxNameBytes: number = config.limits.maxNameBytes,
): Uint8Array[] {
    const seen = new Set<string>();
    return names.map((name) => {
        if (name.length === 0) {
            throw new InvalidNameError(name, 'name must not be empty');
        }
        const encoded = encodeUtf8(name);
        // lone surrogates are replaced during encoding and would not come back unchanged
        if (decodeUtf8Strict(encoded) !== name) {
            throw new InvalidNameError(name, 'name is not valid Unicode text');
        }
        if (encoded.length > maxNameBytes) {
            throw new InvalidNameError(name, `name is ${encoded.length} bytes long, at most ${maxNameBytes} allowed`);
        }
        if (seen.has(name)) {
            throw new DuplicateNameError(name);
        }
        seen.add(name);
        return encoded;
    });
}
