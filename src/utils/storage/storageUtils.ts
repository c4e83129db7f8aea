// src/utils/storage/storageUtils.ts

import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';

/**
 * Output extensions the image library can write. Anything else is stored as PNG.
 */
const WRITABLE_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.tif', '.tiff', '.avif', '.gif'];

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {Promise<void>}
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await mkdir(outputFolder, { recursive: true });
}

/**
 * Reads the entire contents of a file.
 *
 * @param {string} filePath - The file path of the file to be read.
 * @returns {Promise<Uint8Array>} - The contents of the file.
 */
export async function readBufferFromFile(filePath: string): Promise<Uint8Array> {
    return await readFile(filePath);
}

/**
 * Runs `produce` against a temporary path beside `targetPath` and renames the result into place
 * once it succeeded. A failed run leaves `targetPath` untouched and removes the temporary file.
 *
 * @param {string} targetPath - Final location of the file.
 * @param {(temporaryPath: string) => Promise<T>} produce - Writes the complete file to the given path.
 * @return {Promise<T>} Whatever `produce` resolved with.
 */
export async function writeFileAtomically<T>(
    targetPath: string,
    produce: (temporaryPath: string) => Promise<T>,
): Promise<T> {
    const temporaryPath = path.join(
        path.dirname(targetPath),
        `.${path.basename(targetPath)}.${randomBytes(6).toString('hex')}.tmp`,
    );
    try {
        const result = await produce(temporaryPath);
        await rename(temporaryPath, targetPath);
        return result;
    } catch (error) {
        await rm(temporaryPath, { force: true });
        throw error;
    }
}

/**
 * Maps an entry name to a file inside `outputFolder`. Only the base name is used, so names
 * carrying directory parts cannot escape the folder; names without an image extension the
 * library can write get `.png` appended.
 *
 * @param {string} outputFolder - Directory the image is written to.
 * @param {string} entryName - Name of the entry in the container.
 * @return {string} The output file path.
 */
export function resolveOutputImagePath(outputFolder: string, entryName: string): string {
    let fileName = path.basename(entryName.replaceAll('\\', '/'));
    if (fileName === '' || fileName === '.' || fileName === '..') {
        fileName = 'image';
    }
    if (!WRITABLE_IMAGE_EXTENSIONS.includes(path.extname(fileName).toLowerCase())) {
        fileName = `${fileName}.png`;
    }
    return path.join(outputFolder, fileName);
}
