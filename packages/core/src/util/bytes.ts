export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Block checksum  -------------------------------------- */
/** XOR of every byte; 0 for an empty input. */
export function xorChecksum(...chunks: Uint8Array[]): number {
  let cs = 0;
  for (const c of chunks) {
    for (let i = 0; i < c.length; i++) cs ^= c[i];
  }
  return cs;
}

/* ----------  Little-endian words  --------------------------------- */
export function u16le(n: number): Uint8Array {
  if (!Number.isInteger(n) || n < 0 || n > 0xFFFF) {
    throw new RangeError(`Value does not fit in 16 bits: ${n}`);
  }
  return new Uint8Array([n & 0xFF, n >> 8]);
}

export function toHex(buf: Uint8Array): string {
  return Array.from(buf, b => b.toString(16).padStart(2, '0')).join(' ');
}
