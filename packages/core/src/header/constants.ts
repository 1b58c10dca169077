// packages/core/src/header/constants.ts

/** Flag byte of a standard ROM-loader header block. */
export const HEADER_FLAG = 0x00;
/** Flag byte of a standard ROM-loader data block. */
export const DATA_FLAG   = 0xFF;

/**
 * Header variants known to the ROM loader. Only raw bytes (CODE) are
 * encoded here; program and array headers are not.
 */
export const HEADER_TYPES = {
  bytes: 3,
} as const;

export type HeaderKind = keyof typeof HEADER_TYPES;

/** Third header parameter of a bytes header, always 32768. */
export const BYTES_RESERVED = 0x8000;

export const NAME_LENGTH = 10;

/** flag + type + name + length + address + reserved */
export const HEADER_CONTENT_LENGTH = 1 + 1 + NAME_LENGTH + 2 + 2 + 2;
