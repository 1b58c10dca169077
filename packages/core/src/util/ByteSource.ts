// packages/core/src/util/ByteSource.ts
import { SourceReadError } from '../errors/index.js';
import { concat } from './bytes.js';

export type ByteInput =
  | Uint8Array
  | Blob
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>;

/**
 * Unified accessor for the payload of a conversion run.
 * The whole input is read into memory once; tape payloads are at most 64K.
 */
export class ByteSource {
  constructor(private readonly src: ByteInput) {}

  /** Read the source to completion. Any failure surfaces as SourceReadError. */
  async readAll(): Promise<Uint8Array> {
    try {
      if (this.src instanceof Uint8Array) return this.src.slice();
      if (this.src instanceof Blob) {
        return new Uint8Array(await this.src.arrayBuffer());
      }
      if (isReadableStream(this.src)) return await readStream(this.src);
      return await readIterable(this.src);
    } catch (err) {
      if (err instanceof SourceReadError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new SourceReadError(`Could not read input: ${msg}`);
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Internals                                                          */
/* ------------------------------------------------------------------ */

function isReadableStream(
  src: ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>,
): src is ReadableStream<Uint8Array> {
  return 'getReader' in src;
}

async function readStream(rs: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = rs.getReader();
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concat(...chunks);
}

async function readIterable(it: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const c of it) chunks.push(c);
  return concat(...chunks);
}
