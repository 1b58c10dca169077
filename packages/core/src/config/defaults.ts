import type { NameOverflowPolicy } from '../header/name.js';
import type { Verbosity } from '../util/logger.js';

export interface TapDefaults {
  loadAddress : number;
  nameOverflow: NameOverflowPolicy;
  verbose     : Verbosity;
}

export const DEFAULTS: Readonly<TapDefaults> = {
  loadAddress : 32768,    // start of the upper 32K
  nameOverflow: 'reject',
  verbose     : 0,
};
