import type { L1DecodeResult, L1Line } from '@shared/types/l1.types';
import { L1 } from '@shared/constants';
import { BitReader } from './BitReader';
import { L1FieldEmitter } from './L1FieldEmitter';
import { L1BasicParser } from './L1BasicParser';
import { L1DetailParser } from './L1DetailParser';
import { decodeBase64 } from './Base64Decoder';
import { INDENT, SECTION_TITLE } from './constants';
import { BufferExhaustedError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Top-level ATSC 3.0 L1 signaling decoder.
 *
 * Handles:
 * - L1-Basic followed by L1-Detail in a single pass over one BitReader
 * - Truncated input: decoding stops at the first field that does not fit
 *   and the output ends with a truncation marker
 * - Bits left after L1D_crc, emitted as a raw trailer
 *
 * Each call owns its reader and output, so concurrent calls share nothing.
 */
export class L1SignalingParser {
  static parse(data: Uint8Array): L1DecodeResult {
    const reader = new BitReader(data);
    const out = new L1FieldEmitter(reader);
    let detailSizeBytes: number | undefined;

    try {
      const basic = L1BasicParser.parse(out);
      detailSizeBytes = basic.detailSizeBytes;
      L1DetailParser.parse(out, basic, reader.offset);
    } catch (error) {
      if (!(error instanceof BufferExhaustedError)) {
        throw error;
      }
      logger.warn(`L1 signaling truncated: ${error.message}`);
      out.lines.push({ kind: 'truncated', bitOffset: error.bitOffset, requestedBits: error.requestedBits });
      return {
        lines: out.lines,
        totalBits: reader.bitLength,
        bitsConsumed: reader.offset,
        truncated: true,
        detailSizeBytes,
      };
    }

    const bitsConsumed = reader.offset;
    L1SignalingParser.emitTrailer(out);

    return {
      lines: out.lines,
      totalBits: reader.bitLength,
      bitsConsumed,
      truncated: false,
      detailSizeBytes,
    };
  }

  /**
   * Decode the Base64 l1detail variable and parse it.
   * Base64 errors propagate: there is nothing to decode without the bytes.
   */
  static parseBase64(encoded: string): L1DecodeResult {
    return L1SignalingParser.parse(decodeBase64(encoded));
  }

  private static emitTrailer(out: L1FieldEmitter): void {
    const { reader } = out;
    if (reader.eof) return;

    out.spacer();
    out.section(`--- Undecoded trailer (${reader.bitsRemaining} bits) ---`);
    while (!reader.eof) {
      const bitOffset = reader.offset;
      const width = Math.min(L1.TRAILER_CHUNK_BITS, reader.bitsRemaining);
      const bits = reader.readBits(width).toString(2).padStart(width, '0');
      out.lines.push({ kind: 'raw', bitOffset, bits, indent: INDENT.SUBFRAME });
    }
  }
}

/** Render one decoded line as display text; indentation is cosmetic */
export function formatL1Line(line: L1Line): string {
  switch (line.kind) {
    case 'section':
      return line.title;
    case 'group':
      return `${' '.repeat(line.indent)}${line.label}`;
    case 'field':
      return `${' '.repeat(line.indent)}${line.name}: ${line.value}`;
    case 'spacer':
      return '';
    case 'raw':
      return `${' '.repeat(line.indent)}bits[${line.bitOffset}]: ${line.bits}`;
    case 'truncated':
      return SECTION_TITLE.TRUNCATED;
  }
}

export function formatL1Lines(result: L1DecodeResult): string[] {
  return result.lines.map(formatL1Line);
}
