import { describe, it, expect } from 'vitest';
import { findKey, parseStatusValue, parseDbValue, parseStatusString, isFieldPresent } from './statusParser';
import { STATUS } from '@shared/constants';

const STATUS_LINE = 'ch=atsc3:33 lock=atsc3 ss=100(-35dBm) snq=88(24dB) seq=100 bps=18234567 pps=0';

describe('findKey', () => {
  it('returns the index just past the key', () => {
    expect(findKey('a=1 bps=2', 'bps=')).toBe(8);
  });

  it('matches at the start of the blob', () => {
    expect(findKey('bps=2', 'bps=')).toBe(4);
  });

  it('skips occurrences inside a longer key', () => {
    expect(findKey('base=7 se=3', 'se=')).toBe(10);
    expect(findKey('base=7', 'se=')).toBe(-1);
  });

  it('accepts keys after punctuation and newlines', () => {
    expect(findKey('x,se=1', 'se=')).toBe(5);
    expect(findKey('x\nse=1', 'se=')).toBe(5);
  });

  it('returns -1 for an empty key', () => {
    expect(findKey('abc', '')).toBe(-1);
  });
});

describe('parseStatusValue', () => {
  it('reads a decimal value', () => {
    expect(parseStatusValue(STATUS_LINE, 'bps=')).toBe(18234567);
    expect(parseStatusValue(STATUS_LINE, 'pps=')).toBe(0);
  });

  it('returns the absent sentinel for a missing key', () => {
    expect(parseStatusValue('foo=12 bar=34', 'baz=')).toBe(STATUS.FIELD_ABSENT);
    expect(parseStatusValue('foo=12 bar=34', 'baz=')).toBe(-999);
  });

  it('reads hexadecimal values', () => {
    expect(parseStatusValue('bsid=0x1A2B', 'bsid=')).toBe(6699);
    expect(parseStatusValue('tsid=0X00ff', 'tsid=')).toBe(255);
  });

  it('reads leading-zero values as decimal', () => {
    expect(parseStatusValue('n=010', 'n=')).toBe(10);
  });

  it('reads signed values', () => {
    expect(parseStatusValue('offset=-12', 'offset=')).toBe(-12);
    expect(parseStatusValue('offset=+7', 'offset=')).toBe(7);
  });

  it('stops at the first non-digit', () => {
    expect(parseStatusValue('ss=100(-35dBm)', 'ss=')).toBe(100);
  });

  it('reads 0 when the key has no digits after it', () => {
    expect(parseStatusValue('lock=none', 'lock=')).toBe(0);
  });

  it('does not match a key embedded in another key', () => {
    expect(parseStatusValue('xbps=5 bps=9', 'bps=')).toBe(9);
    expect(parseStatusValue('base=7', 'se=')).toBe(STATUS.FIELD_ABSENT);
  });

  it('searches across lines', () => {
    expect(parseStatusValue('0: mod=qam64\nbsid=0x10', 'bsid=')).toBe(16);
  });
});

describe('parseDbValue', () => {
  it('reads the parenthesized value after the key', () => {
    expect(parseDbValue(STATUS_LINE, 'ss=')).toBe(-35);
    expect(parseDbValue(STATUS_LINE, 'snq=')).toBe(24);
  });

  it('returns the absent sentinel when the key is missing', () => {
    expect(parseDbValue(STATUS_LINE, 'xx=')).toBe(STATUS.FIELD_ABSENT);
  });

  it('returns the absent sentinel when no parenthesis follows', () => {
    expect(parseDbValue('ss=100', 'ss=')).toBe(STATUS.FIELD_ABSENT);
  });

  it('uses the first parenthesis after the key', () => {
    expect(parseDbValue('ss=94 snq=87(24dB)', 'ss=')).toBe(24);
  });
});

describe('parseStatusString', () => {
  it('returns the token after the key', () => {
    expect(parseStatusString('ch=atsc3:33:0+1 lock=atsc3', 'ch=')).toBe('atsc3:33:0+1');
  });

  it('runs to the end of the blob', () => {
    expect(parseStatusString('ch=atsc3:33:0+1 lock=atsc3', 'lock=')).toBe('atsc3');
  });

  it('returns null for a missing key', () => {
    expect(parseStatusString('ss=1', 'ch=')).toBeNull();
  });

  it('returns an empty string for an empty value', () => {
    expect(parseStatusString('ch= lock=1', 'ch=')).toBe('');
  });
});

describe('isFieldPresent', () => {
  it('is false only for the sentinel', () => {
    expect(isFieldPresent(STATUS.FIELD_ABSENT)).toBe(false);
    expect(isFieldPresent(0)).toBe(true);
    expect(isFieldPresent(-35)).toBe(true);
  });
});
