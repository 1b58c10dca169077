// packages/core/src/util/frame.ts
import { u16le } from './bytes.js';

const LEN_BYTES = 2 as const;

/** Length prefix of a tape block: body length (content + checksum), little-endian. */
export function encodeBlockLen(n: number): Uint8Array {
  return u16le(n);
}

export const BLOCK_LEN_BYTES = LEN_BYTES;
