// packages/core/src/index.ts

import { DEFAULTS }                 from './config/defaults.js';
import type { NameOverflowPolicy }  from './header/name.js';
import { TapBlockWriter }           from './tap/BlockWriter.js';
import { TapBytesFile }             from './tap/TapBytesFile.js';
import type { EncodeParams, TapEncoderOptions, TapSummary } from './types/index.js';
import { MemorySink, type ByteSink } from './util/ByteSink.js';
import type { ByteInput }           from './util/ByteSource.js';
import { createLogger, type Logger } from './util/logger.js';

/**
 * TapEncoder turns raw machine code into a `.tap` container holding one
 * bytes header block and one data block.
 */
export class TapEncoder {
  private readonly loadAddress  : number;
  private readonly nameOverflow : NameOverflowPolicy;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: TapEncoderOptions = {}) {
    this.loadAddress  = opt.loadAddress  ?? DEFAULTS.loadAddress;
    this.nameOverflow = opt.nameOverflow ?? DEFAULTS.nameOverflow;
    this.log = createLogger(opt.verbose ?? DEFAULTS.verbose, opt.logger);
  }

  /**
   * Encode the whole container in memory.
   * @returns header block followed by data block
   */
  async encode(input: ByteInput, params: EncodeParams): Promise<Uint8Array> {
    const sink = new MemorySink();
    await this.encodeTo(sink, input, params);
    return sink.bytes();
  }

  /**
   * Encode straight into a sink. On failure the sink may already hold a
   * truncated container; discarding it is up to the caller.
   */
  async encodeTo(
    sink  : ByteSink,
    input : ByteInput,
    params: EncodeParams,
  ): Promise<TapSummary> {
    return this.write(await this.prepare(input, params), sink);
  }

  /**
   * Read and validate everything without producing output, so callers can
   * reject bad input before opening a destination.
   */
  async prepare(input: ByteInput, params: EncodeParams): Promise<TapBytesFile> {
    return TapBytesFile.build(
      params.name,
      input,
      params.loadAddress ?? this.loadAddress,
      { nameOverflow: this.nameOverflow, logger: this.log },
    );
  }

  /** Emit a prepared file's two blocks to the sink. */
  async write(file: TapBytesFile, sink: ByteSink): Promise<TapSummary> {
    let bytesWritten = 0;
    const counting: ByteSink = {
      async write(chunk) {
        await sink.write(chunk);
        bytesWritten += chunk.byteLength;
      },
    };

    await file.writeTo(new TapBlockWriter(counting, this.log));
    this.log.log(1, `wrote '${file.name}': ${file.length} bytes at ${file.loadAddress}`);

    return {
      name        : file.name,
      loadAddress : file.loadAddress,
      length      : file.length,
      bytesWritten,
    };
  }
}

export { TapBytesFile, type TapFileState, type BuildOptions } from './tap/TapBytesFile.js';
export { TapBlockWriter, TAP_BLOCK_MAX_LENGTH } from './tap/BlockWriter.js';
export { encodeHeader, type TapHeader, type BytesHeader } from './header/encoder.js';
export { encodeName, type NameOverflowPolicy } from './header/name.js';
export * from './header/constants.js';
export { ByteSource, type ByteInput } from './util/ByteSource.js';
export { MemorySink, WritableStreamSink, type ByteSink } from './util/ByteSink.js';
export { xorChecksum } from './util/bytes.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export { DEFAULTS } from './config/defaults.js';
export * from './errors/index.js';
export type { EncodeParams, TapEncoderOptions, TapSummary } from './types/index.js';
