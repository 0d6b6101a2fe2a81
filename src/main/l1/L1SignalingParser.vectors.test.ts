import { describe, it, expect, vi } from 'vitest';
import type { L1DecodeResult } from '@shared/types/l1.types';

vi.mock('../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { L1SignalingParser, formatL1Lines } from './L1SignalingParser';

/*
 * Frames laid out by hand from the A/322 field tables, independent of the
 * demo generator. L1-Basic is time-aligned, one subframe, GI_1_192, all
 * other fields zero:
 *
 *   byte 0      L1B_version in the top 3 bits
 *   bytes 6-7   L1B_L1_Detail_size_bytes at bits 50..62
 *   byte 12     L1B_first_sub_guard_interval = 1 at bits 95..98
 *   byte 15     L1B_first_sub_mimo_mixed at bit 120 (version 1)
 *   bytes 21-24 L1B_crc = 0x11223344
 *
 * L1-Detail carries one PLP: size 1000, CRC + 64K LDPC, 256QAM 10/15,
 * no TI, fec_block_start 5. Its bytes 7-12 hold those fields; byte 0
 * holds L1D_version and, from version 1, L1D_bsid = 0x1234 follows at
 * detail bit 103.
 */
const VERSION_0 = Buffer.from(
  '00000000000000220000000020000000000000000011223344' +
  '0000000000000007d019c00014' +
  'cafebabe',
  'hex',
);

const VERSION_1 = Buffer.from(
  '20000000000000260000000020000080000000000011223344' +
  '1000000000000007d019c000142468' +
  '0badf00d',
  'hex',
);

/** Version 2 adds the mixed pass: L1D_plp_mimo = 1 then stream combining 1, IQ 0, PH 1 */
const VERSION_2 = Buffer.from(
  '20000000000000280000000020000080000000000011223344' +
  '2000000000000007d019c000142469a0' +
  'feedface',
  'hex',
);

function values(result: L1DecodeResult, name: string): string[] {
  return result.lines.flatMap(line => (line.kind === 'field' && line.name === name ? [line.value] : []));
}

function lastWord(data: Buffer): string {
  return `0x${data.readUInt32BE(data.length - 4).toString(16).padStart(8, '0')}`;
}

const PLP_LINES = [
  '',
  'Subframe #0:',
  '  L1D_frequency_interleaver: Preamble Only',
  '  L1D_num_plp: 1',
  '    PLP #0:',
  '      L1D_plp_id: 0',
  '      L1D_plp_lls_flag: 0',
  '      L1D_plp_layer: Core',
  '      L1D_plp_start: 0',
  '      L1D_plp_size: 1000',
  '      L1D_plp_scrambler_type: PRBS',
  '      L1D_plp_fec_type: CRC + 64K LDPC',
  '      L1D_plp_mod: 256QAM',
  '      L1D_plp_cod: 10/15',
  '      L1D_plp_TI_mode: No TI',
  '      L1D_plp_fec_block_start: 5',
  '      L1D_plp_type: non-dispersed',
];

function detailLines(result: L1DecodeResult): string[] {
  const formatted = formatL1Lines(result);
  return formatted.slice(formatted.indexOf('--- L1-Detail Signaling ---'));
}

describe('L1SignalingParser on hand-laid frames', () => {
  describe('L1-Detail version 0', () => {
    const result = L1SignalingParser.parse(VERSION_0);

    it('decodes to the end of the buffer', () => {
      expect(VERSION_0.length).toBe(42);
      expect(result.truncated).toBe(false);
      expect(result.bitsConsumed).toBe(336);
      expect(result.detailSizeBytes).toBe(17);
      expect(values(result, 'L1B_version')).toEqual(['0']);
      expect(values(result, 'L1B_first_sub_guard_interval')).toEqual(['GI_1_192']);
      expect(values(result, 'L1B_crc')).toEqual(['0x11223344']);
    });

    it('reads no L1D_bsid', () => {
      expect(detailLines(result)).toEqual([
        '--- L1-Detail Signaling ---',
        'L1D_version: 0',
        'L1D_num_rf: 0',
        ...PLP_LINES,
        'L1D_crc: 0xcafebabe',
      ]);
    });

    it('takes L1D_crc from the last 32 bits', () => {
      expect(values(result, 'L1D_crc')).toEqual([lastWord(VERSION_0)]);
    });
  });

  describe('L1-Detail version 1', () => {
    const result = L1SignalingParser.parse(VERSION_1);

    it('decodes to the end of the buffer', () => {
      expect(VERSION_1.length).toBe(44);
      expect(result.truncated).toBe(false);
      expect(result.bitsConsumed).toBe(352);
      expect(result.detailSizeBytes).toBe(19);
      expect(values(result, 'L1B_version')).toEqual(['1']);
      expect(values(result, 'L1B_first_sub_mimo_mixed')).toEqual(['1']);
    });

    it('reads L1D_bsid but skips the mixed pass even when the first subframe is mixed', () => {
      expect(detailLines(result)).toEqual([
        '--- L1-Detail Signaling ---',
        'L1D_version: 1',
        'L1D_num_rf: 0',
        ...PLP_LINES,
        'L1D_bsid: 0x1234',
        'L1D_crc: 0x0badf00d',
      ]);
    });

    it('takes L1D_crc from the last 32 bits', () => {
      expect(values(result, 'L1D_crc')).toEqual([lastWord(VERSION_1)]);
    });
  });

  describe('L1-Detail version 2', () => {
    const result = L1SignalingParser.parse(VERSION_2);

    it('decodes to the end of the buffer', () => {
      expect(VERSION_2.length).toBe(45);
      expect(result.truncated).toBe(false);
      expect(result.bitsConsumed).toBe(360);
      expect(result.detailSizeBytes).toBe(20);
    });

    it('reads the mixed pass after L1D_bsid', () => {
      expect(detailLines(result).slice(-8)).toEqual([
        'L1D_bsid: 0x1234',
        '  Subframe #0:',
        '    PLP #0:',
        '      L1D_plp_mimo: 1',
        '        L1D_plp_mimo_stream_combining: 1',
        '        L1D_plp_mimo_IQ_interleaving: 0',
        '        L1D_plp_mimo_PH: 1',
        'L1D_crc: 0xfeedface',
      ]);
    });

    it('takes L1D_crc from the last 32 bits', () => {
      expect(values(result, 'L1D_crc')).toEqual([lastWord(VERSION_2)]);
    });
  });

  it('decodes the Base64 form of a frame the same way', () => {
    expect(L1SignalingParser.parseBase64(VERSION_1.toString('base64'))).toEqual(L1SignalingParser.parse(VERSION_1));
  });
});
