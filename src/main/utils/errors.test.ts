import { describe, it, expect } from 'vitest';
import {
  TunerInspectorError,
  MalformedInputError,
  InvalidCharacterError,
  BufferExhaustedError,
  DeviceError,
  ReportError,
  UsageError,
  isError,
  getErrorMessage,
} from './errors';

describe('error hierarchy', () => {
  it('gives each error its name and code', () => {
    const cases: Array<[TunerInspectorError, string, string]> = [
      [new MalformedInputError('bad'), 'MalformedInputError', 'MALFORMED_INPUT'],
      [new InvalidCharacterError(1, '-'), 'InvalidCharacterError', 'INVALID_CHARACTER'],
      [new BufferExhaustedError(8, 0, 4), 'BufferExhaustedError', 'BUFFER_EXHAUSTED'],
      [new DeviceError('gone'), 'DeviceError', 'DEVICE_ERROR'],
      [new ReportError('disk'), 'ReportError', 'REPORT_ERROR'],
      [new UsageError('usage'), 'UsageError', 'USAGE_ERROR'],
    ];
    for (const [error, name, code] of cases) {
      expect(error).toBeInstanceOf(TunerInspectorError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it('describes an invalid character', () => {
    expect(new InvalidCharacterError(5, '*').message).toBe('Invalid Base64 character "*" at position 5');
  });

  it('describes an exhausted buffer', () => {
    expect(new BufferExhaustedError(32, 320, 328).message).toBe('Cannot read 32 bits at offset 320: buffer holds 328 bits');
  });

  it('appends the inner error message to ReportError', () => {
    const error = new ReportError('Failed to save report', new Error('EACCES'));
    expect(error.message).toBe('Failed to save report: EACCES');
    expect(error.details).toBeInstanceOf(Error);
    expect(new ReportError('Failed to save report', 'text').message).toBe('Failed to save report');
  });
});

describe('isError', () => {
  it('narrows Error instances', () => {
    expect(isError(new Error('x'))).toBe(true);
    expect(isError('x')).toBe(false);
    expect(isError({ message: 'x' })).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('reads the message of an Error', () => {
    expect(getErrorMessage(new DeviceError('tuner gone'))).toBe('tuner gone');
  });

  it('stringifies anything else', () => {
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(null)).toBe('null');
  });
});
