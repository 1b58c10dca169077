import { createReadStream } from 'node:fs';
import { Readable, Writable } from 'node:stream';

/** Convert Node streams to WHATWG streams in one place */
export function toWebReadable(r: Readable): ReadableStream<Uint8Array> {
  return Readable.toWeb(r);
}
export function toWebWritable(w: Writable): WritableStream<Uint8Array> {
  return Writable.toWeb(w);
}

/** Payload source for a file on disk. */
export function fileInput(path: string): ReadableStream<Uint8Array> {
  return toWebReadable(createReadStream(path));
}
