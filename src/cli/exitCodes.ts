// src/cli/exitCodes.ts

import type { SfaErrorKind } from '../errors/index.js';
import { isSfaError } from '../errors/index.js';

export const UNEXPECTED_FAILURE_EXIT_CODE = 1;

export const ExitCodes: Record<SfaErrorKind, number> = {
    'io': 3,
    'image-decode': 4,
    'format': 5,
    'corruption': 6,
    'duplicate-name': 7,
    'invalid-name': 8,
    'image-encode': 9,
};

export function exitCodeFor(error: unknown): number {
    return isSfaError(error) ? ExitCodes[error.kind] : UNEXPECTED_FAILURE_EXIT_CODE;
}
