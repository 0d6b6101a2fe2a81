import { describe, it, expect } from 'vitest';
import { STATUS, L1, REPORT, DEVICE, LOG_LEVELS } from './constants';

describe('STATUS', () => {
  it('uses a sentinel no status field can hold', () => {
    expect(STATUS.FIELD_ABSENT).toBe(-999);
  });
});

describe('L1', () => {
  it('fits the CRC inside L1-Basic', () => {
    expect(L1.CRC_BITS).toBeLessThan(L1.BASIC_BITS);
    expect(L1.BASIC_BITS % 8).toBe(0);
  });

  it('emits trailer chunks no wider than one read', () => {
    expect(L1.TRAILER_CHUNK_BITS).toBeLessThanOrEqual(32);
  });
});

describe('REPORT', () => {
  it('separates sections with a 64-character rule', () => {
    expect(REPORT.SEPARATOR).toBe('-'.repeat(64));
  });
});

describe('DEVICE', () => {
  it('maps every capture variable to its own file', () => {
    const files = Object.values(DEVICE.CAPTURE_FILES);
    expect(new Set(files).size).toBe(files.length);
    for (const file of files) {
      expect(file).toMatch(/^[a-z0-9]+\.txt$/);
    }
  });
});

describe('LOG_LEVELS', () => {
  it('lists electron-log level names', () => {
    expect(Object.values(LOG_LEVELS)).toEqual(['error', 'warn', 'info', 'debug']);
  });
});
