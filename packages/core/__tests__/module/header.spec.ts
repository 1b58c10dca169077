import { encodeHeader } from '../../src/header/encoder.js';
import { decodeNameField, encodeName } from '../../src/header/name.js';
import {
  BYTES_RESERVED,
  DATA_FLAG,
  HEADER_CONTENT_LENGTH,
  HEADER_FLAG,
  HEADER_TYPES,
} from '../../src/header/constants.js';
import { InvalidNameError } from '../../src/errors/index.js';

const ascii = (s: string) => Array.from(s, c => c.charCodeAt(0));

describe('header constants', () => {
  it('match the ROM loader layout', () => {
    expect(HEADER_FLAG).toBe(0x00);
    expect(DATA_FLAG).toBe(0xFF);
    expect(HEADER_TYPES.bytes).toBe(3);
    expect(BYTES_RESERVED).toBe(32768);
    expect(HEADER_CONTENT_LENGTH).toBe(18);
  });
});

describe('encodeName', () => {
  it('pads short names with spaces', () => {
    expect(Array.from(encodeName('CODE'))).toEqual(ascii('CODE      '));
  });

  it('keeps a 10-character name unchanged', () => {
    expect(Array.from(encodeName('ABCDEFGHIJ'))).toEqual(ascii('ABCDEFGHIJ'));
  });

  it('turns the empty name into ten spaces', () => {
    expect(Array.from(encodeName(''))).toEqual(new Array(10).fill(0x20));
  });

  it('accepts punctuation and spaces', () => {
    expect(Array.from(encodeName('a b-1!~'))).toEqual(ascii('a b-1!~   '));
  });

  it.each([
    ['backslash',    'A\\B'],
    ['double quote', 'say"hi'],
    ['non-ASCII',    'café'],
    ['newline',      'A\nB'],
    ['tab',          'A\tB'],
    ['DEL',          'A\u007fB'],
    ['emoji',        'ok\u{1F600}'],
  ])('rejects a name with a %s', (_label, name) => {
    expect(() => encodeName(name)).toThrow(InvalidNameError);
  });

  it('rejects names longer than 10 characters by default', () => {
    expect(() => encodeName('ELEVENCHARS')).toThrow(InvalidNameError);
    expect(() => encodeName('ELEVENCHARS')).toThrow('Tap file name longer than 10 characters: ELEVENCHARS');
  });

  it('truncates long names when asked to', () => {
    expect(Array.from(encodeName('ELEVENCHARS', 'truncate'))).toEqual(ascii('ELEVENCHAR'));
  });

  it('still rejects illegal characters under the truncate policy', () => {
    expect(() => encodeName('0123456789\\', 'truncate')).toThrow(InvalidNameError);
  });

  it('decodes a field back to its display form', () => {
    expect(decodeNameField(encodeName('CODE'))).toBe('CODE');
    expect(decodeNameField(encodeName(''))).toBe('');
    expect(decodeNameField(encodeName(' X '))).toBe(' X');
  });
});

describe('encodeHeader', () => {
  it('lays out a bytes header', () => {
    const h = encodeHeader({
      kind       : 'bytes',
      name       : encodeName('CODE'),
      dataLength : 3,
      loadAddress: 32768,
    });

    expect(h.byteLength).toBe(HEADER_CONTENT_LENGTH);
    expect(Array.from(h)).toEqual([
      0x00, 0x03,
      ...ascii('CODE      '),
      0x03, 0x00,
      0x00, 0x80,
      0x00, 0x80,
    ]);
  });

  it('writes length and address little-endian', () => {
    const h = encodeHeader({
      kind       : 'bytes',
      name       : encodeName('X'),
      dataLength : 0x1234,
      loadAddress: 0xFEDC,
    });
    expect(Array.from(h.subarray(12, 16))).toEqual([0x34, 0x12, 0xDC, 0xFE]);
  });

  it('refuses a name field of the wrong size', () => {
    expect(() => encodeHeader({
      kind       : 'bytes',
      name       : new Uint8Array(9),
      dataLength : 0,
      loadAddress: 0,
    })).toThrow(RangeError);
  });
});
