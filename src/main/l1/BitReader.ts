import { BufferExhaustedError } from '../utils/errors';

/** Widest single read; wider fields are assembled from two reads */
export const MAX_READ_BITS = 32;

/**
 * Bit-level cursor over a byte buffer for L1 signaling parsing.
 *
 * Bits are numbered MSB-first: bit 0 is the most significant bit of byte 0,
 * so absolute bit `p` lives in `buffer[p >> 3]` at bit position `7 - (p & 7)`.
 * Every read is bounds-checked before the buffer is touched and either
 * consumes exactly `n` bits or throws BufferExhaustedError without moving.
 */
export class BitReader {
  private buffer: Uint8Array;
  private _offset = 0;
  private _bitLength: number;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this._bitLength = buffer.length * 8;
  }

  /** Current bit position */
  get offset(): number {
    return this._offset;
  }

  get bitLength(): number {
    return this._bitLength;
  }

  get bitsRemaining(): number {
    return this._bitLength - this._offset;
  }

  get eof(): boolean {
    return this._offset >= this._bitLength;
  }

  /**
   * Read `n` bits (1..32) as an unsigned integer.
   * Accumulates arithmetically so 32-bit values stay positive.
   */
  readBits(n: number): number {
    if (!Number.isInteger(n) || n < 1 || n > MAX_READ_BITS) {
      throw new RangeError(`Bit width must be an integer from 1 to ${MAX_READ_BITS}, got ${n}`);
    }
    this.ensureAvailable(n);

    let value = 0;
    let pos = this._offset;
    let left = n;

    while (left > 0) {
      const byte = this.buffer[pos >> 3];
      const bitInByte = pos & 7;
      const take = Math.min(8 - bitInByte, left);
      const chunk = (byte >> (8 - bitInByte - take)) & ((1 << take) - 1);
      value = value * (1 << take) + chunk;
      pos += take;
      left -= take;
    }

    this._offset = pos;
    return value;
  }

  /**
   * Discard `n` bits (any width, e.g. reserved fields or padding).
   */
  skip(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Skip width must be a non-negative integer, got ${n}`);
    }
    this.ensureAvailable(n);
    this._offset += n;
  }

  private ensureAvailable(n: number): void {
    if (this._offset + n > this._bitLength) {
      throw new BufferExhaustedError(n, this._offset, this._bitLength);
    }
  }
}
