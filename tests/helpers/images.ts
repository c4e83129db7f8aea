import os from 'node:os';
import sharp from 'sharp';

export interface IColour {
    r: number;
    g: number;
    b: number;
}

export const RED: IColour = { r: 255, g: 0, b: 0 };
export const BLUE: IColour = { r: 0, g: 0, b: 255 };
export const GREEN: IColour = { r: 0, g: 255, b: 0 };

function solid(width: number, height: number, colour: IColour): sharp.Sharp {
    return sharp({ create: { width, height, channels: 3, background: colour } });
}

export async function solidPng(width: number, height: number, colour: IColour): Promise<Uint8Array> {
    return await solid(width, height, colour).png().toBuffer();
}

export async function solidJpeg(width: number, height: number, colour: IColour): Promise<Uint8Array> {
    return await solid(width, height, colour).jpeg({ quality: 100 }).toBuffer();
}

export async function solidWebp(width: number, height: number, colour: IColour): Promise<Uint8Array> {
    return await solid(width, height, colour).webp({ lossless: true }).toBuffer();
}

/**
 * Image whose pixels all differ, so that row or channel mixups show up.
 */
export async function gradientPng(width: number, height: number): Promise<Uint8Array> {
    const data = new Uint8Array(width * height * 4);
    for (let i = 0; i < width * height; i++) {
        data[i * 4] = (i * 7) % 256;
        data[i * 4 + 1] = (i * 13) % 256;
        data[i * 4 + 2] = (i * 29) % 256;
        data[i * 4 + 3] = 255 - (i % 256);
    }
    return await sharp(data, { raw: { width, height, channels: 4 } }).png().toBuffer();
}

/**
 * PNG with 16-bit samples, one channel for grey or three for RGB.
 */
export async function png16(width: number, height: number, channels: 1 | 3, samples: number[]): Promise<Uint8Array> {
    return await sharp(Uint16Array.from(samples), { raw: { width, height, channels } })
        .toColourspace(channels === 1 ? 'grey16' : 'rgb16')
        .png()
        .toBuffer();
}

export function samples16(data: Uint8Array): number[] {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const samples: number[] = [];
    for (let offset = 0; offset < data.byteLength; offset += 2) {
        samples.push(view.getUint16(offset, os.endianness() === 'LE'));
    }
    return samples;
}

export function pixelAt(data: Uint8Array, channels: number, index: number): number[] {
    return Array.from(data.subarray(index * channels, (index + 1) * channels));
}
