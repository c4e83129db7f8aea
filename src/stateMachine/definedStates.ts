// src/stateMachine/definedStates.ts

export enum EncoderStates {
    INIT = 'INIT',
    VALIDATE_NAMES = 'VALIDATE_NAMES',
    WRITE_HEADER = 'WRITE_HEADER',
    WRITE_ENTRIES = 'WRITE_ENTRIES',
    NORMALIZE_ENTRY = 'NORMALIZE_ENTRY',
    WRITE_ENTRY = 'WRITE_ENTRY',
    FLUSH = 'FLUSH',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum DecoderStates {
    INIT = 'INIT',
    READ_HEADER = 'READ_HEADER',
    READ_ENTRY_COUNT = 'READ_ENTRY_COUNT',
    READ_ENTRIES = 'READ_ENTRIES',
    READ_NAME = 'READ_NAME',
    READ_IMAGE_DATA = 'READ_IMAGE_DATA',
    DECODE_IMAGE = 'DECODE_IMAGE',
    VERIFY_END_OF_STREAM = 'VERIFY_END_OF_STREAM',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
