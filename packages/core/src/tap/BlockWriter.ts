// packages/core/src/tap/BlockWriter.ts
import { BlockTooLargeError, SinkWriteError } from '../errors/index.js';
import { concat, toHex, xorChecksum } from '../util/bytes.js';
import { BLOCK_LEN_BYTES, encodeBlockLen } from '../util/frame.js';
import type { ByteSink } from '../util/ByteSink.js';
import { createLogger, type Logger } from '../util/logger.js';

/** Largest number of content bytes one block may stage. */
export const TAP_BLOCK_MAX_LENGTH = 0xFFFF - BLOCK_LEN_BYTES;

/**
 * Stages the content of one tape block and, on completion, emits it to the
 * sink as `[u16le length][content][xor checksum]`. Reused once per block.
 */
export class TapBlockWriter {
  private chunks: Uint8Array[] = [];
  private buffered = 0;

  constructor(
    private readonly sink: ByteSink,
    private readonly log: Logger = createLogger(),
  ) {}

  /** Number of content bytes staged for the current block. */
  get pending(): number {
    return this.buffered;
  }

  write(bytes: Uint8Array): void {
    if (this.buffered + bytes.byteLength > TAP_BLOCK_MAX_LENGTH) {
      throw new BlockTooLargeError(
        `Tap block would exceed the maximum length of ${TAP_BLOCK_MAX_LENGTH} bytes`,
      );
    }
    this.chunks.push(bytes.slice());
    this.buffered += bytes.byteLength;
  }

  async completeBlock(): Promise<void> {
    try {
      const content  = concat(...this.chunks);
      const checksum = xorChecksum(content);
      this.log.log(3, `block: ${content.byteLength} content bytes, checksum ${toHex(new Uint8Array([checksum]))}`);
      if (this.log.level >= 4) this.log.log(4, `block bytes: ${toHex(content)}`);

      await this.emit(encodeBlockLen(content.byteLength + 1));
      await this.emit(content);
      await this.emit(new Uint8Array([checksum]));
    } finally {
      this.reset();
    }
  }

  /** Drop whatever is staged without emitting it. */
  reset(): void {
    this.chunks   = [];
    this.buffered = 0;
  }

  private async emit(chunk: Uint8Array): Promise<void> {
    try {
      await this.sink.write(chunk);
    } catch (err) {
      if (err instanceof SinkWriteError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new SinkWriteError(`Write to output failed: ${msg}`);
    }
  }
}
