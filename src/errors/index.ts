// src/errors/index.ts

export type SfaErrorKind =
    | 'io'
    | 'image-decode'
    | 'image-encode'
    | 'format'
    | 'corruption'
    | 'duplicate-name'
    | 'invalid-name';

interface ISfaErrorOptions {
    cause?: unknown;
    entryName?: string;
}

/**
 * Base class of every error raised by the codec. `kind` discriminates the failure class,
 * `entryName` names the entry being processed when the failure is tied to one.
 */
export abstract class SfaError extends Error {
    abstract readonly kind: SfaErrorKind;
    readonly entryName?: string;

    protected constructor(message: string, options: ISfaErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.entryName = options.entryName;
    }
}

export class IoError extends SfaError {
    readonly kind = 'io';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

export class ImageDecodeError extends SfaError {
    readonly kind = 'image-decode';

    constructor(entryName: string, cause?: unknown) {
        super(`Entry "${entryName}" is not a decodable image${describeCause(cause)}`, { cause, entryName });
    }
}

export class ImageEncodeError extends SfaError {
    readonly kind = 'image-encode';

    constructor(entryName: string, cause?: unknown) {
        super(`Entry "${entryName}" could not be encoded as PNG${describeCause(cause)}`, { cause, entryName });
    }
}

export class FormatError extends SfaError {
    readonly kind = 'format';

    constructor(message: string) {
        super(message);
    }
}

export class CorruptionError extends SfaError {
    readonly kind = 'corruption';

    constructor(message: string, entryName?: string) {
        super(message, { entryName });
    }
}

export class DuplicateNameError extends SfaError {
    readonly kind = 'duplicate-name';

    constructor(entryName: string) {
        super(`Duplicate entry name "${entryName}"`, { entryName });
    }
}

export class InvalidNameError extends SfaError {
    readonly kind = 'invalid-name';

    constructor(entryName: string, reason: string) {
        super(`Invalid entry name "${entryName}": ${reason}`, { entryName });
    }
}

export function isSfaError(error: unknown): error is SfaError {
    return error instanceof SfaError;
}

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
    return cause === undefined ? '' : `: ${toError(cause).message}`;
}
