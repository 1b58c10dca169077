// packages/core/src/header/name.ts
import { InvalidNameError } from '../errors/index.js';
import { NAME_LENGTH } from './constants.js';

export type NameOverflowPolicy = 'reject' | 'truncate';

const SPACE = 0x20;

/**
 * True when an ASCII-quoting routine would leave the character as is:
 * printable ASCII other than the double quote and the backslash.
 */
function isPlainAscii(code: number): boolean {
  return code >= 0x20 && code <= 0x7E && code !== 0x22 && code !== 0x5C;
}

/**
 * Validate a display name and lay it out in the fixed 10-byte field,
 * space padded on the right.
 */
export function encodeName(
  name: string,
  overflow: NameOverflowPolicy = 'reject',
): Uint8Array {
  for (let i = 0; i < name.length; i++) {
    if (!isPlainAscii(name.charCodeAt(i))) {
      throw new InvalidNameError(
        `Illegal characters in tap file name: ${JSON.stringify(name)}`,
      );
    }
  }

  if (name.length > NAME_LENGTH && overflow === 'reject') {
    throw new InvalidNameError(
      `Tap file name longer than ${NAME_LENGTH} characters: ${name}`,
    );
  }

  const field = new Uint8Array(NAME_LENGTH).fill(SPACE);
  const len   = Math.min(name.length, NAME_LENGTH);
  for (let i = 0; i < len; i++) field[i] = name.charCodeAt(i);
  return field;
}

/** Display form of a name field: trailing padding removed. */
export function decodeNameField(field: Uint8Array): string {
  return String.fromCharCode(...field).replace(/ +$/, '');
}
