import type { NameOverflowPolicy } from '../header/name.js';
import type { Verbosity } from '../util/logger.js';

/* ------------------------- Encoder configuration --------------------- */
export interface TapEncoderOptions {
  /** Load address used when a call does not pass one; defaults to 32768 */
  loadAddress?  : number;
  /** What to do with names longer than 10 characters; defaults to 'reject' */
  nameOverflow? : NameOverflowPolicy;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?      : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?       : (msg: string) => void;
}

/* ------------------------- Per-call parameters ----------------------- */
export interface EncodeParams {
  name         : string;
  loadAddress? : number;
}

/** What was written by one conversion run. */
export interface TapSummary {
  name         : string;
  loadAddress  : number;
  /** payload length */
  length       : number;
  /** total container bytes handed to the sink */
  bytesWritten : number;
}
