// packages/core/src/header/encoder.ts
import {
  BYTES_RESERVED,
  HEADER_CONTENT_LENGTH,
  HEADER_FLAG,
  HEADER_TYPES,
  NAME_LENGTH,
  type HeaderKind,
} from './constants.js';
import { u16le } from '../util/bytes.js';

/** Header of a raw bytes (CODE) file. */
export interface BytesHeader {
  kind       : 'bytes';
  /** 10-byte, space padded name field */
  name       : Uint8Array;
  dataLength : number;
  loadAddress: number;
}

/** Tagged by `kind`; bytes is the only variant encoded so far. */
export type TapHeader = BytesHeader;

/**
 * Content bytes of a header block, flag through the last parameter word.
 * The trailing checksum is appended by the block writer.
 */
export function encodeHeader(header: TapHeader): Uint8Array {
  if (header.name.byteLength !== NAME_LENGTH) {
    throw new RangeError(`Name field must be ${NAME_LENGTH} bytes`);
  }

  const kind: HeaderKind = header.kind;
  const out = new Uint8Array(HEADER_CONTENT_LENGTH);
  out[0] = HEADER_FLAG;
  out[1] = HEADER_TYPES[kind];
  out.set(header.name, 2);

  const params = 2 + NAME_LENGTH;
  out.set(u16le(header.dataLength),  params);
  out.set(u16le(header.loadAddress), params + 2);
  out.set(u16le(BYTES_RESERVED),     params + 4);
  return out;
}
