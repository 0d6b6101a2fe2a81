/**
 * key=value extraction from tuner diagnostic text.
 *
 * The tuner reports status as loosely formatted text such as
 * "ch=atsc3:33 lock=atsc3 ss=100(-35dBm) snq=88(24dB) seq=100 bps=18234567 pps=0".
 * These helpers are substring scanners, not tokenizers, with one guard:
 * a key only matches where it starts a token, i.e. at the start of the blob
 * or after a character that is not a letter, digit or underscore. That keeps
 * "se=" from matching inside "base=".
 */

import { STATUS } from '@shared/constants';

const NUMBER = /^\s*([+-]?)(?:0[xX]([0-9a-fA-F]+)|(\d+))/;
const DECIMAL = /^\s*([+-]?\d+)/;
const WORD_CHAR = /[A-Za-z0-9_]/;

/**
 * Index just past the first token-starting occurrence of `key`, or -1.
 */
export function findKey(blob: string, key: string): number {
  if (key.length === 0) return -1;
  let from = 0;
  while (from <= blob.length - key.length) {
    const idx = blob.indexOf(key, from);
    if (idx === -1) return -1;
    if (idx === 0 || !WORD_CHAR.test(blob[idx - 1])) {
      return idx + key.length;
    }
    from = idx + 1;
  }
  return -1;
}

/**
 * Numeric value after `key`: `0x` hex or decimal, optional sign.
 * A present key followed by no digits reads as 0.
 * Returns STATUS.FIELD_ABSENT when the key is not in the blob.
 */
export function parseStatusValue(blob: string, key: string): number {
  const start = findKey(blob, key);
  if (start === -1) return STATUS.FIELD_ABSENT;

  const match = NUMBER.exec(blob.slice(start));
  if (!match) return 0;

  const [, sign, hexDigits, decDigits] = match;
  const magnitude = hexDigits !== undefined ? parseInt(hexDigits, 16) : parseInt(decDigits, 10);
  return sign === '-' ? -magnitude : magnitude;
}

/**
 * Decimal integer right after the first `(` following `key`,
 * e.g. -35 from "ss=100(-35dBm)".
 * Returns STATUS.FIELD_ABSENT when the key or the parenthesis is missing.
 */
export function parseDbValue(blob: string, key: string): number {
  const start = findKey(blob, key);
  if (start === -1) return STATUS.FIELD_ABSENT;

  const paren = blob.indexOf('(', start);
  if (paren === -1) return STATUS.FIELD_ABSENT;

  const match = DECIMAL.exec(blob.slice(paren + 1));
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Whitespace-delimited text token after `key`, e.g. "atsc3:33" for "ch=".
 * Returns null when the key is absent.
 */
export function parseStatusString(blob: string, key: string): string | null {
  const start = findKey(blob, key);
  if (start === -1) return null;
  const rest = blob.slice(start);
  const end = rest.search(/\s/);
  return end === -1 ? rest : rest.slice(0, end);
}

export function isFieldPresent(value: number): boolean {
  return value !== STATUS.FIELD_ABSENT;
}
