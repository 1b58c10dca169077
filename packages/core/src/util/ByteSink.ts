// packages/core/src/util/ByteSink.ts
import { concat } from './bytes.js';

/** Destination of an encoded container. Writes are awaited in order. */
export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
}

/** Collects everything in memory. */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(chunk.slice());
  }

  get length(): number {
    return this.chunks.reduce((n, c) => n + c.byteLength, 0);
  }

  bytes(): Uint8Array {
    return concat(...this.chunks);
  }
}

type StreamWriter = ReturnType<WritableStream<Uint8Array>['getWriter']>;

/** Adapts a WHATWG WritableStream; holds its writer lock until close(). */
export class WritableStreamSink implements ByteSink {
  private readonly writer: StreamWriter;

  constructor(ws: WritableStream<Uint8Array>) {
    this.writer = ws.getWriter();
  }

  async write(chunk: Uint8Array): Promise<void> {
    await this.writer.write(chunk);
  }

  async close(): Promise<void> {
    await this.writer.close();
  }

  async abort(reason?: unknown): Promise<void> {
    await this.writer.abort(reason);
  }
}
