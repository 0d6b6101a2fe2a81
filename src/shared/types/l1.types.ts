/** Heading that opens a signaling block, e.g. "--- L1-Basic Signaling ---" */
export interface L1SectionLine {
  kind: 'section';
  title: string;
}

/** Label that opens a nested group such as a subframe or a PLP */
export interface L1GroupLine {
  kind: 'group';
  label: string;
  indent: number;
}

/** One decoded signaling element */
export interface DecodedField {
  kind: 'field';
  /** A/322 field name, e.g. "L1D_plp_mod" */
  name: string;
  /** Value as it was carried in the bitstream */
  raw: number;
  /** Display form: biased count, enumeration name or hex */
  value: string;
  indent: number;
}

export interface L1SpacerLine {
  kind: 'spacer';
}

/** Bits after L1D_crc, shown as-is */
export interface L1RawBitsLine {
  kind: 'raw';
  bitOffset: number;
  bits: string;
  indent: number;
}

/** Terminal marker emitted when the buffer ran out mid-grammar */
export interface L1TruncatedLine {
  kind: 'truncated';
  bitOffset: number;
  requestedBits: number;
}

export type L1Line =
  | L1SectionLine
  | L1GroupLine
  | DecodedField
  | L1SpacerLine
  | L1RawBitsLine
  | L1TruncatedLine;

export interface L1DecodeResult {
  lines: L1Line[];
  /** Number of bits in the input buffer */
  totalBits: number;
  /** Bits consumed by the grammar, trailer excluded */
  bitsConsumed: number;
  truncated: boolean;
  /** L1B_L1_Detail_size_bytes, when L1-Basic decoded far enough to carry it */
  detailSizeBytes?: number;
}
