// src/utils/serialization/serializationHelpers.ts

import { FORMAT_VERSION, HEADER_LENGTH, MAGIC_BYTE } from '../../config/index.js';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export const UINT32_MAX = 0xffffffff;

/**
 * Serializes a 32-bit unsigned integer into a Uint8Array.
 *
 * @param {number} value - The 32-bit unsigned integer to serialize.
 * @returns {Uint8Array} A Uint8Array containing the serialized 32-bit unsigned integer.
 */
export function serializeUInt32(value: number): Uint8Array {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
        throw new RangeError(`Value ${value} does not fit into an unsigned 32-bit field`);
    }
    const buffer = new Uint8Array(4);
    const view = new DataView(buffer.buffer);
    view.setUint32(0, value, false); // false for Big Endian
    return buffer;
}

/**
 * Deserializes a 32-bit unsigned integer from the given Uint8Array at the specified offset.
 *
 * @param {Uint8Array} buffer - The Uint8Array containing the serialized 32-bit unsigned integer.
 * @param {number} offset - The offset in the Uint8Array where the 32-bit unsigned integer starts.
 * @return {{ value: number, newOffset: number }} An object containing the deserialized 32-bit unsigned integer and the new offset.
 */
export function deserializeUInt32(buffer: Uint8Array, offset: number): { value: number; newOffset: number } {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const value = view.getUint32(offset, false); // false for Big Endian
    return { value, newOffset: offset + 4 };
}

/**
 * Prefixes the given bytes with their length as a big endian 32-bit unsigned integer.
 *
 * @param {Uint8Array} data - The field contents.
 * @returns {Uint8Array} `[u32 length][data]`
 */
export function serializeLengthPrefixed(data: Uint8Array): Uint8Array {
    const result = new Uint8Array(4 + data.length);
    result.set(serializeUInt32(data.length), 0);
    result.set(data, 4);
    return result;
}

/**
 * Builds the container header: magic bytes followed by the format version.
 */
export function serializeHeader(version: number = FORMAT_VERSION): Uint8Array {
    const header = new Uint8Array(HEADER_LENGTH);
    header.set(MAGIC_BYTE, 0);
    header[MAGIC_BYTE.length] = version;
    return header;
}

export function hasMagicBytes(header: Uint8Array): boolean {
    return MAGIC_BYTE.every((byte, index) => header[index] === byte);
}

export function encodeUtf8(value: string): Uint8Array {
    return utf8Encoder.encode(value);
}

/**
 * Decodes UTF-8 strictly: malformed sequences throw a TypeError instead of being replaced,
 * and a leading byte order mark is kept as part of the string.
 */
export function decodeUtf8Strict(bytes: Uint8Array): string {
    return utf8Decoder.decode(bytes);
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
    if (chunks.length === 1) {
        return chunks[0];
    }
    const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        result.set(chunk, offset);
        offset += chunk.length;
    }
    return result;
}
