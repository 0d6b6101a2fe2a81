export class TunerInspectorError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TunerInspectorError';
  }
}

/** Base64 input with a bad length or misplaced padding */
export class MalformedInputError extends TunerInspectorError {
  constructor(message: string, details?: unknown, code: string = 'MALFORMED_INPUT') {
    super(message, code, details);
    this.name = 'MalformedInputError';
  }
}

export class InvalidCharacterError extends MalformedInputError {
  constructor(
    public position: number,
    public character: string
  ) {
    super(`Invalid Base64 character ${JSON.stringify(character)} at position ${position}`, undefined, 'INVALID_CHARACTER');
    this.name = 'InvalidCharacterError';
  }
}

export class BufferExhaustedError extends TunerInspectorError {
  constructor(
    public requestedBits: number,
    public bitOffset: number,
    public bitLength: number
  ) {
    super(`Cannot read ${requestedBits} bits at offset ${bitOffset}: buffer holds ${bitLength} bits`, 'BUFFER_EXHAUSTED');
    this.name = 'BufferExhaustedError';
  }
}

export class DeviceError extends TunerInspectorError {
  constructor(message: string, details?: unknown) {
    super(message, 'DEVICE_ERROR', details);
    this.name = 'DeviceError';
  }
}

export class ReportError extends TunerInspectorError {
  constructor(message: string, details?: unknown) {
    // Surface the inner error message so it reaches the user
    const innerMsg = details instanceof Error ? details.message : undefined;
    const fullMessage = innerMsg ? `${message}: ${innerMsg}` : message;
    super(fullMessage, 'REPORT_ERROR', details);
    this.name = 'ReportError';
  }
}

export class UsageError extends TunerInspectorError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}
