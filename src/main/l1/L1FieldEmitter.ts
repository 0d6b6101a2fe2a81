import type { L1Line } from '@shared/types/l1.types';
import type { BitReader } from './BitReader';
import type { EnumTable } from './constants';

/** Turns a raw field value into its display form */
export type FieldFormatter = (raw: number) => string;

export const decimal: FieldFormatter = raw => String(raw);

/** Counts carried as N-1 in the bitstream */
export const plusOne: FieldFormatter = raw => String(raw + 1);

export function hex(digits: number): FieldFormatter {
  return raw => `0x${raw.toString(16).padStart(digits, '0')}`;
}

export function named(table: EnumTable): FieldFormatter {
  return raw => table[raw] ?? `Unknown(${raw})`;
}

export function labelled(prefix: string, inner: FieldFormatter = decimal): FieldFormatter {
  return raw => `${prefix}${inner(raw)}`;
}

/**
 * Reads fields off a BitReader and records each one as an output line.
 * Every read goes through the reader, so exhaustion surfaces as
 * BufferExhaustedError from the first field that does not fit.
 */
export class L1FieldEmitter {
  readonly lines: L1Line[] = [];

  constructor(readonly reader: BitReader) {}

  /** Read a `width`-bit field, record it and return the raw value */
  field(name: string, width: number, indent: number, format: FieldFormatter = decimal): number {
    const raw = this.reader.readBits(width);
    this.lines.push({ kind: 'field', name, raw, value: format(raw), indent });
    return raw;
  }

  /** Consume bits that carry no information (reserved fields, padding) */
  reserved(width: number): void {
    this.reader.skip(width);
  }

  section(title: string): void {
    this.lines.push({ kind: 'section', title });
  }

  group(label: string, indent: number): void {
    this.lines.push({ kind: 'group', label, indent });
  }

  spacer(): void {
    this.lines.push({ kind: 'spacer' });
  }
}
