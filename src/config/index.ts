// src/config/index.ts

import { Buffer } from 'node:buffer';

/** "SFA" */
export const MAGIC_BYTE = Buffer.from([0x53, 0x46, 0x41]);
export const FORMAT_VERSION = 0x01;
export const HEADER_LENGTH = MAGIC_BYTE.length + 1;

export const config = {
    imageCompression: {
        compressionLevel: 9,
        adaptiveFiltering: false,
    },
    io: {
        readChunkSize: 64 * 1024, // Upper bound for a single read from a source
        fileWriteBufferSize: 64 * 1024,
    },
    encoder: {
        concurrency: 1, // Entries normalized at once
    },
    cli: {
        maxOpenFiles: 8,
    },
    limits: {
        maxNameBytes: 4096,
    },
} as const;
