/**
 * Field names and enumeration tables for ATSC 3.0 L1 signaling.
 *
 * References:
 * - ATSC A/322, "Physical Layer Protocol", section 9 (L1-Basic and L1-Detail syntax)
 *
 * Tables are indexed by the raw code point. Code points past the end of a
 * table (or mapped to undefined) render as Unknown(<n>).
 */

import type { Modulation } from '@shared/types/modcod.types';

export type EnumTable = readonly (string | undefined)[];

export const MIMO_PILOT_ENCODING: EnumTable = ['Walsh-Hadamard', 'Null pilots'];

export const LLS_FLAG: EnumTable = ['No LLS', 'LLS present'];

export const TIME_INFO_FLAG: EnumTable = ['Not included', 'ms precision', 'us precision', 'ns precision'];

export const PAPR_REDUCTION: EnumTable = ['None', 'Tone reservation only', 'ACE only', 'Both TR and ACE'];

export const FRAME_LENGTH_MODE: EnumTable = ['Time-aligned', 'Symbol-aligned'];

export const MIMO: EnumTable = ['No MIMO', 'MIMO'];

export const MISO: EnumTable = ['No MISO', 'MISO 64 coefficients', 'MISO 256 coefficients'];

export const FFT_SIZE: EnumTable = ['8K', '16K', '32K'];

/** Code point 0 is reserved; 1..12 are the A/322 guard intervals */
export const GUARD_INTERVAL: EnumTable = [
  undefined,
  'GI_1_192',
  'GI_2_384',
  'GI_3_512',
  'GI_4_768',
  'GI_5_1024',
  'GI_6_1536',
  'GI_7_2048',
  'GI_8_2432',
  'GI_9_3072',
  'GI_10_3648',
  'GI_11_4096',
  'GI_12_4864',
];

export const FREQUENCY_INTERLEAVER: EnumTable = ['Preamble Only', 'All Symbols'];

export const PLP_LAYER: EnumTable = ['Core', 'Enhanced'];

export const SCRAMBLER_TYPE: EnumTable = ['PRBS'];

export const PLP_FEC_TYPE: EnumTable = [
  'BCH + 16K LDPC',
  'BCH + 64K LDPC',
  'CRC + 16K LDPC',
  'CRC + 64K LDPC',
  '16K LDPC only',
  '64K LDPC only',
];

/** Highest FEC type that carries L1D_plp_mod / L1D_plp_cod */
export const MAX_MODCOD_FEC_TYPE = 5;

export const PLP_MODULATION: readonly Modulation[] = ['QPSK', '16QAM', '64QAM', '256QAM', '1024QAM', '4096QAM'];

export const PLP_CODE_RATE: EnumTable = [
  '2/15', '3/15', '4/15', '5/15', '6/15', '7/15',
  '8/15', '9/15', '10/15', '11/15', '12/15', '13/15',
];

export const TI_MODE = {
  NONE: 0,
  CTI: 1,
  HTI: 2,
} as const;

export const PLP_TI_MODE: EnumTable = ['No TI', 'CTI', 'HTI'];

export const PLP_TYPE: EnumTable = ['non-dispersed', 'dispersed'];

export const CORE_LAYER = 0;

/** Version gates */
export const VERSION = {
  /** L1-Basic version that adds L1B_first_sub_mimo_mixed */
  BASIC_MIMO_MIXED: 1,
  /** L1-Detail version that adds L1D_bsid */
  DETAIL_BSID: 1,
  /** L1-Detail version that adds the L1D_mimo_mixed pass */
  DETAIL_MIMO_MIXED: 2,
} as const;

/** Reserved run closing L1-Basic, before L1B_crc */
export const BASIC_RESERVED_BITS = 48;

/** Display indentation per nesting level */
export const INDENT = {
  TOP: 0,
  SUBFRAME: 2,
  PLP_HEADER: 4,
  PLP: 6,
  NESTED: 8,
} as const;

export const SECTION_TITLE = {
  BASIC: '--- L1-Basic Signaling ---',
  DETAIL: '--- L1-Detail Signaling ---',
  TRUNCATED: '--- Truncated ---',
} as const;
