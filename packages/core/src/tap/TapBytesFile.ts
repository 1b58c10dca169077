// packages/core/src/tap/TapBytesFile.ts
import { AddressOverflowError, EncoderStateError } from '../errors/index.js';
import { DATA_FLAG } from '../header/constants.js';
import { encodeHeader } from '../header/encoder.js';
import { decodeNameField, encodeName, type NameOverflowPolicy } from '../header/name.js';
import { ByteSource, type ByteInput } from '../util/ByteSource.js';
import { createLogger, type Logger } from '../util/logger.js';
import type { TapBlockWriter } from './BlockWriter.js';

const ADDRESS_CEILING = 0xFFFF;

export type TapFileState = 'validated' | 'written' | 'failed';

export interface BuildOptions {
  nameOverflow? : NameOverflowPolicy;
  logger?       : Logger;
}

/**
 * A validated raw bytes (CODE) file: one header block followed by one
 * data block. Instances are only obtained through {@link TapBytesFile.build}.
 */
export class TapBytesFile {
  #state: TapFileState = 'validated';

  private constructor(
    private readonly nameBytes: Uint8Array,
    private readonly payload  : Uint8Array,
    readonly loadAddress      : number,
    private readonly log      : Logger,
  ) {}

  /**
   * Read the payload and validate every parameter.
   * @throws InvalidNameError, SourceReadError, AddressOverflowError
   */
  static async build(
    name       : string,
    source     : ByteInput | ByteSource,
    loadAddress: number,
    opt        : BuildOptions = {},
  ): Promise<TapBytesFile> {
    const log       = opt.logger ?? createLogger();
    const nameBytes = encodeName(name, opt.nameOverflow ?? 'reject');

    const src     = source instanceof ByteSource ? source : new ByteSource(source);
    const payload = await src.readAll();
    log.log(2, `read ${payload.byteLength} payload bytes`);

    if (!Number.isInteger(loadAddress) || loadAddress < 0 || loadAddress > ADDRESS_CEILING) {
      throw new AddressOverflowError(`Start address out of range: ${loadAddress}`);
    }
    if (loadAddress + payload.byteLength > ADDRESS_CEILING) {
      throw new AddressOverflowError(
        `Start address too high, code will roll over 64K-boundary. Address: ${loadAddress}, Length: ${payload.byteLength}`,
      );
    }

    return new TapBytesFile(nameBytes, payload, loadAddress, log);
  }

  get state(): TapFileState {
    return this.#state;
  }

  /** Display name without its padding. */
  get name(): string {
    return decodeNameField(this.nameBytes);
  }

  /** The padded 10-byte name field as stored in the header. */
  get nameField(): Uint8Array {
    return this.nameBytes.slice();
  }

  /** Payload length in bytes. */
  get length(): number {
    return this.payload.byteLength;
  }

  /**
   * Emit the header block, then the data block. Errors raised by the
   * writer propagate unchanged and leave this instance unusable.
   */
  async writeTo(w: TapBlockWriter): Promise<void> {
    if (this.#state !== 'validated') {
      throw new EncoderStateError(`Cannot write a tap file in state '${this.#state}'`);
    }

    try {
      w.write(encodeHeader({
        kind       : 'bytes',
        name       : this.nameBytes,
        dataLength : this.payload.byteLength,
        loadAddress: this.loadAddress,
      }));
      await w.completeBlock();
      this.log.log(2, `header block written for '${this.name}'`);

      w.write(new Uint8Array([DATA_FLAG]));
      w.write(this.payload);
      await w.completeBlock();
      this.log.log(2, `data block written: ${this.payload.byteLength} bytes at ${this.loadAddress}`);
    } catch (err) {
      w.reset();
      this.#state = 'failed';
      throw err;
    }

    this.#state = 'written';
  }
}
