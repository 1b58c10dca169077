// packages/node-runtime/src/index.ts
import { TapEncoder, type TapEncoderOptions } from '../../core/src/index.js';

export function createTapEncoder(cfg?: TapEncoderOptions): TapEncoder {
  return new TapEncoder(cfg);
}

export * from '../../core/src/index.js';
export { fileInput, toWebReadable, toWebWritable } from './streamAdapter.js';
export { createProgram, type CliIO } from './program.js';
