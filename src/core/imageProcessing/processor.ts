// src/core/imageProcessing/processor.ts

import type { ImageProcessor } from '../../@types/index.js';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.js';

let defaultProcessor: ImageProcessor | undefined;

/**
 * Returns the image processor used when a caller does not supply one.
 * Instantiated lazily; the processor itself is stateless.
 */
export function getDefaultImageProcessor(): ImageProcessor {
    defaultProcessor ??= new SharpImageProcessor();
    return defaultProcessor;
}
