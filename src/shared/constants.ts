export const APP_VERSION = '0.1.0';

export const STATUS = {
  /** Returned by the status parsers when a key is not present in the blob */
  FIELD_ABSENT: -999,
} as const;

export const L1 = {
  /** L1-Basic is a fixed 200-bit block, CRC included */
  BASIC_BITS: 200,
  CRC_BITS: 32,
  /** Width of each raw-bits line emitted for data left over after L1D_crc */
  TRAILER_CHUNK_BITS: 32,
  /** Firmware builds after this date expose the l1detail variable */
  MIN_FIRMWARE_VERSION: 20250623,
} as const;

export const REPORT = {
  STORAGE_DIR: 'reports',
  SEPARATOR: '-'.repeat(64),
  NOT_SET: 'Not set',
} as const;

export const DEVICE = {
  CAPTURE_FILES: {
    status: 'status.txt',
    streaminfo: 'streaminfo.txt',
    plpinfo: 'plpinfo.txt',
    version: 'version.txt',
    l1detail: 'l1detail.txt',
  },
  DEFAULT_TUNER_INDEX: 0,
} as const;

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;

export type LogLevel = typeof LOG_LEVELS[keyof typeof LOG_LEVELS];
