// src/core/imageProcessing/pixelFormat.ts

import type { BitDepth, Channels, PixelFormat } from '../../@types/index.js';

export function pixelFormatForChannels(channels: Channels): PixelFormat {
    switch (channels) {
        case 1:
            return 'grey';
        case 2:
            return 'grey-alpha';
        case 3:
            return 'rgb';
        case 4:
            return 'rgba';
    }
}

/**
 * Maps a libvips band format name to the PNG bit depth able to hold it. Anything wider than
 * a byte is kept at 16 bits, the most PNG stores.
 */
export function bitDepthOf(bandFormat: string | undefined): BitDepth {
    return bandFormat === undefined || bandFormat === 'uchar' || bandFormat === 'char' ? 8 : 16;
}

export function describeImage(image: { width: number; height: number; format: PixelFormat; depth: BitDepth }): string {
    return `${image.width}x${image.height} ${image.format}${image.depth === 16 ? ' 16-bit' : ''}`;
}
