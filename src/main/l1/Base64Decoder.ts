import { MalformedInputError, InvalidCharacterError } from '../utils/errors';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
const PAD = '=';

/** 6-bit value per ASCII code, -1 for characters outside the alphabet */
const DECODE_TABLE: Int8Array = (() => {
  const table = new Int8Array(128).fill(-1);
  for (let i = 0; i < ALPHABET.length; i++) {
    table[ALPHABET.charCodeAt(i)] = i;
  }
  return table;
})();

function sextet(input: string, position: number): number {
  const code = input.charCodeAt(position);
  const value = code < DECODE_TABLE.length ? DECODE_TABLE[code] : -1;
  if (value < 0) {
    throw new InvalidCharacterError(position, input[position]);
  }
  return value;
}

/**
 * Number of bytes `input` decodes to: three per quartet, minus one per
 * trailing pad character.
 */
export function decodedLength(input: string): number {
  let length = (input.length / 4) * 3;
  for (let i = input.length - 1; i >= 0 && input[i] === PAD; i--) {
    length--;
  }
  return length;
}

/**
 * Strict standard-alphabet Base64 decoder.
 *
 * All-or-nothing: the whole input is validated before any byte is produced.
 * Throws MalformedInputError for a length that is not a multiple of 4 or for
 * padding anywhere but the last one or two positions, and
 * InvalidCharacterError for anything outside `A-Z a-z 0-9 + /`.
 */
export function decodeBase64(input: string): Buffer {
  if (input.length % 4 !== 0) {
    throw new MalformedInputError(`Base64 length ${input.length} is not a multiple of 4`);
  }

  const firstPad = input.indexOf(PAD);
  if (firstPad !== -1) {
    const padCount = input.length - firstPad;
    if (padCount > 2) {
      throw new MalformedInputError(`Padding at position ${firstPad} is not in the final two characters`);
    }
    for (let i = firstPad; i < input.length; i++) {
      if (input[i] !== PAD) {
        throw new MalformedInputError(`Data character after padding at position ${i}`);
      }
    }
  }

  const dataLength = firstPad === -1 ? input.length : firstPad;
  for (let i = 0; i < dataLength; i++) {
    sextet(input, i);
  }

  const out = Buffer.alloc(decodedLength(input));
  let j = 0;
  for (let i = 0; i < input.length; i += 4) {
    const c2 = input[i + 2];
    const c3 = input[i + 3];
    let v = (sextet(input, i) << 18) | (sextet(input, i + 1) << 12);
    if (c2 !== PAD) v |= sextet(input, i + 2) << 6;
    if (c3 !== PAD) v |= sextet(input, i + 3);

    out[j++] = (v >> 16) & 0xFF;
    if (c2 !== PAD) out[j++] = (v >> 8) & 0xFF;
    if (c3 !== PAD) out[j++] = v & 0xFF;
  }

  return out;
}
