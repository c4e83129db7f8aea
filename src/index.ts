// src/index.ts

export type {
    ByteSink,
    ByteSource,
    CanonicalFormat,
    Channels,
    IDecodedImage,
    IDecodeOptions,
    IEncodeOptions,
    IEntry,
    ILogFacility,
    ILogger,
    ImageProcessor,
    IPngSettings,
    IProgressBar,
    PixelFormat,
} from './@types/index.js';
export { FORMAT_VERSION, MAGIC_BYTE } from './config/index.js';
export { encode } from './core/encoder/index.js';
export { decode, decodeFromReader } from './core/decoder/index.js';
export { normalizeImage } from './core/normalizer/index.js';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor.js';
export {
    CorruptionError,
    DuplicateNameError,
    FormatError,
    ImageDecodeError,
    ImageEncodeError,
    InvalidNameError,
    IoError,
    isSfaError,
    SfaError,
} from './errors/index.js';
export type { SfaErrorKind } from './errors/index.js';
export { BufferSink, BufferSource } from './utils/io/bufferIo.js';
export { FileSink, FileSource } from './utils/io/fileIo.js';
export { StreamSink, StreamSource } from './utils/io/streamIo.js';
export { getLogger, Logger, NoopLogFacility } from './utils/logging/logUtils.js';
