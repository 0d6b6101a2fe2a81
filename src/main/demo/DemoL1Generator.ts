/**
 * Synthetic ATSC 3.0 L1 signaling for demo mode and tests.
 *
 * Encodes a typed description of an L1-Basic + L1-Detail frame with the
 * same field order the decoder reads, and fills in
 * L1B_L1_Detail_size_bytes from the encoded detail length. Values in the
 * description are wire values: counts that A/322 carries as N-1 are given
 * as N-1 here too, except the subframe and PLP counts, which come from the
 * array lengths.
 */

import { VERSION, BASIC_RESERVED_BITS, TI_MODE, CORE_LAYER, MAX_MODCOD_FEC_TYPE } from '../l1/constants';

// ── Bit packing ────────────────────────────────────────────────────

/** MSB-first bit packer, the inverse of BitReader */
export class BitWriter {
  private bits: number[] = [];

  get bitLength(): number {
    return this.bits.length;
  }

  write(value: number, width: number): this {
    if (value < 0 || value >= 2 ** width) {
      throw new RangeError(`Value ${value} does not fit in ${width} bits`);
    }
    for (let i = width - 1; i >= 0; i--) {
      this.bits.push(Math.floor(value / 2 ** i) % 2);
    }
    return this;
  }

  zeros(width: number): this {
    for (let i = 0; i < width; i++) this.bits.push(0);
    return this;
  }

  append(other: BitWriter): this {
    this.bits.push(...other.bits);
    return this;
  }

  padToByte(): this {
    return this.zeros((8 - (this.bits.length % 8)) % 8);
  }

  /** Packs the bits, zero-filling the final partial byte */
  toBuffer(): Buffer {
    const out = Buffer.alloc(Math.ceil(this.bits.length / 8));
    this.bits.forEach((bit, i) => {
      if (bit) out[i >> 3] |= 0x80 >> (i & 7);
    });
    return out;
  }
}

// ── Frame description ──────────────────────────────────────────────

export interface DemoPlpMimo {
  streamCombining: number;
  iqInterleaving: number;
  ph: number;
}

export interface DemoPlp {
  id: number;
  llsFlag?: number;
  /** 0 core, 1 enhanced */
  layer?: number;
  start: number;
  size: number;
  scramblerType?: number;
  fecType: number;
  /** Written only when fecType <= 5 */
  mod?: number;
  cod?: number;
  tiMode: number;
  /** TI mode 0 */
  fecBlockStart?: number;
  /** TI mode 1 */
  ctiFecBlockStart?: number;
  /** Written when the frame bonds RF channels */
  bondedRfIds?: number[];
  channelBondingFormat?: number;
  /** Written when the subframe is MIMO */
  mimo?: DemoPlpMimo;
  /** Core layer: present makes the PLP dispersed */
  dispersed?: { numSubslices: number; subsliceInterval: number };
  tiExtendedInterleaving?: number;
  cti?: { depth: number; startRow: number };
  /**
   * With interSubframe, numFecBlocks holds one entry per TI block and its
   * length sets L1D_plp_HTI_num_ti_blocks; otherwise numTiBlocks is used
   * and numFecBlocks holds a single entry.
   */
  hti?: {
    interSubframe: boolean;
    numTiBlocks?: number;
    numFecBlocksMax: number;
    numFecBlocks: number[];
    cellInterleaver: number;
  };
  /** Enhanced layer */
  ldmInjectionLevel?: number;
  /** Second-pass MIMO detail; null writes L1D_plp_mimo = 0 */
  mixedMimo?: DemoPlpMimo | null;
}

export interface DemoSubframe {
  mimo?: number;
  miso?: number;
  fftSize?: number;
  reducedCarriers?: number;
  guardInterval?: number;
  numOfdmSymbols?: number;
  scatteredPilotPattern?: number;
  scatteredPilotBoost?: number;
  sbsFirst?: number;
  sbsLast?: number;
  subframeMultiplex?: number;
  frequencyInterleaver?: number;
  sbsNullCells?: number;
  mimoMixed?: number;
  plps: DemoPlp[];
}

export interface DemoL1Frame {
  basicVersion?: number;
  detailVersion?: number;
  mimoScatteredPilotEncoding?: number;
  llsFlag?: number;
  timeInfoFlag?: number;
  time?: { sec: number; msec: number; usec?: number; nsec?: number };
  returnChannelFlag?: number;
  paprReduction?: number;
  /** frameLength selects frame_length_mode 0, timeOffset mode 1 */
  frameLength?: { frameLength: number; excessSamples: number };
  timeOffset?: { timeOffset: number; additionalSamples: number };
  preambleNumSymbols?: number;
  preambleReducedCarriers?: number;
  detailContentTag?: number;
  detailFecType?: number;
  detailAdditionalParityMode?: number;
  detailTotalCells?: number;
  bondedBsids?: number[];
  subframes: DemoSubframe[];
  /** Written from detail version 1 */
  bsid: number;
  basicCrc?: number;
  detailCrc?: number;
  /** Extra zero bytes inside the declared detail size, before L1D_crc */
  detailPaddingBytes?: number;
  /** Overrides the computed L1B_L1_Detail_size_bytes */
  detailSizeBytes?: number;
  /** Bytes appended after L1D_crc */
  trailer?: number[];
}

// ── Encoding ───────────────────────────────────────────────────────

function writeSymbolParams(w: BitWriter, sf: DemoSubframe): void {
  w.write(sf.mimo ?? 0, 1)
    .write(sf.miso ?? 0, 2)
    .write(sf.fftSize ?? 0, 2)
    .write(sf.reducedCarriers ?? 0, 3)
    .write(sf.guardInterval ?? 1, 4)
    .write(sf.numOfdmSymbols ?? 0, 11)
    .write(sf.scatteredPilotPattern ?? 0, 5)
    .write(sf.scatteredPilotBoost ?? 0, 3)
    .write(sf.sbsFirst ?? 0, 1)
    .write(sf.sbsLast ?? 0, 1);
}

function writeMimo(w: BitWriter, mimo: DemoPlpMimo | undefined): void {
  w.write(mimo?.streamCombining ?? 0, 1)
    .write(mimo?.iqInterleaving ?? 0, 1)
    .write(mimo?.ph ?? 0, 1);
}

function writePlp(w: BitWriter, plp: DemoPlp, numRf: number, mimo: boolean): void {
  const layer = plp.layer ?? CORE_LAYER;
  w.write(plp.id, 6)
    .write(plp.llsFlag ?? 0, 1)
    .write(layer, 2)
    .write(plp.start, 24)
    .write(plp.size, 24)
    .write(plp.scramblerType ?? 0, 2)
    .write(plp.fecType, 4);

  if (plp.fecType <= MAX_MODCOD_FEC_TYPE) {
    w.write(plp.mod ?? 0, 4).write(plp.cod ?? 0, 4);
  }

  w.write(plp.tiMode, 2);
  if (plp.tiMode === TI_MODE.NONE) w.write(plp.fecBlockStart ?? 0, 15);
  else if (plp.tiMode === TI_MODE.CTI) w.write(plp.ctiFecBlockStart ?? 0, 22);

  if (numRf > 0) {
    const bonded = plp.bondedRfIds ?? [];
    w.write(bonded.length, 3);
    if (bonded.length > 0) {
      w.write(plp.channelBondingFormat ?? 0, 2);
      bonded.forEach(id => w.write(id, 3));
    }
  }

  if (mimo) writeMimo(w, plp.mimo);

  if (layer !== CORE_LAYER) {
    w.write(plp.ldmInjectionLevel ?? 0, 5);
    return;
  }

  w.write(plp.dispersed ? 1 : 0, 1);
  if (plp.dispersed) {
    w.write(plp.dispersed.numSubslices, 14).write(plp.dispersed.subsliceInterval, 24);
  }
  const qpsk = plp.fecType <= MAX_MODCOD_FEC_TYPE && (plp.mod ?? 0) === 0;
  if ((plp.tiMode === TI_MODE.CTI || plp.tiMode === TI_MODE.HTI) && qpsk) {
    w.write(plp.tiExtendedInterleaving ?? 0, 1);
  }
  if (plp.tiMode === TI_MODE.CTI) {
    w.write(plp.cti?.depth ?? 0, 3).write(plp.cti?.startRow ?? 0, 11);
  } else if (plp.tiMode === TI_MODE.HTI) {
    const hti = plp.hti ?? { interSubframe: false, numFecBlocksMax: 0, numFecBlocks: [0], cellInterleaver: 0 };
    const numTiBlocks = hti.interSubframe ? hti.numFecBlocks.length - 1 : hti.numTiBlocks ?? 0;
    w.write(hti.interSubframe ? 1 : 0, 1)
      .write(numTiBlocks, 4)
      .write(hti.numFecBlocksMax, 12);
    if (hti.interSubframe) hti.numFecBlocks.forEach(n => w.write(n, 12));
    else w.write(hti.numFecBlocks[0] ?? 0, 12);
    w.write(hti.cellInterleaver, 1);
  }
}

function encodeDetail(frame: DemoL1Frame, basicVersion: number): BitWriter {
  const w = new BitWriter();
  const detailVersion = frame.detailVersion ?? 0;
  const bonded = frame.bondedBsids ?? [];
  const timeInfoFlag = frame.timeInfoFlag ?? 0;

  w.write(detailVersion, 4).write(bonded.length, 3);
  bonded.forEach(bsid => w.write(bsid, 16).zeros(3));

  if (timeInfoFlag > 0) {
    const time = frame.time ?? { sec: 0, msec: 0 };
    w.write(time.sec, 32).write(time.msec, 10);
    if (timeInfoFlag > 1) w.write(time.usec ?? 0, 10);
    if (timeInfoFlag > 2) w.write(time.nsec ?? 0, 10);
  }

  frame.subframes.forEach((sf, i) => {
    if (i > 0) writeSymbolParams(w, sf);
    if (frame.subframes.length > 1) w.write(sf.subframeMultiplex ?? 0, 1);
    w.write(sf.frequencyInterleaver ?? 0, 1);
    if (sf.sbsFirst || sf.sbsLast) w.write(sf.sbsNullCells ?? 0, 13);
    w.write(sf.plps.length - 1, 6);
    sf.plps.forEach(plp => writePlp(w, plp, bonded.length, (sf.mimo ?? 0) === 1));
  });

  if (detailVersion >= VERSION.DETAIL_BSID) w.write(frame.bsid, 16);

  if (detailVersion >= VERSION.DETAIL_MIMO_MIXED) {
    frame.subframes.forEach((sf, i) => {
      const mixed = i === 0 && basicVersion < VERSION.BASIC_MIMO_MIXED ? 0 : sf.mimoMixed ?? 0;
      if (i > 0) w.write(mixed, 1);
      if (mixed !== 1) return;
      sf.plps.forEach(plp => {
        w.write(plp.mixedMimo ? 1 : 0, 1);
        if (plp.mixedMimo) writeMimo(w, plp.mixedMimo);
      });
    });
  }

  w.padToByte().zeros((frame.detailPaddingBytes ?? 0) * 8);
  return w;
}

function encodeBasic(frame: DemoL1Frame, basicVersion: number, detailSizeBytes: number): BitWriter {
  const w = new BitWriter();
  const first = frame.subframes[0];

  w.write(basicVersion, 3)
    .write(frame.mimoScatteredPilotEncoding ?? 0, 1)
    .write(frame.llsFlag ?? 0, 1)
    .write(frame.timeInfoFlag ?? 0, 2)
    .write(frame.returnChannelFlag ?? 0, 1)
    .write(frame.paprReduction ?? 0, 2);

  if (frame.timeOffset) {
    w.write(1, 1).write(frame.timeOffset.timeOffset, 16).write(frame.timeOffset.additionalSamples, 7);
  } else {
    const fl = frame.frameLength ?? { frameLength: 0, excessSamples: 0 };
    w.write(0, 1).write(fl.frameLength, 10).write(fl.excessSamples, 13);
  }

  w.write(frame.subframes.length - 1, 8)
    .write(frame.preambleNumSymbols ?? 0, 3)
    .write(frame.preambleReducedCarriers ?? 0, 3)
    .write(frame.detailContentTag ?? 0, 2)
    .write(detailSizeBytes, 13)
    .write(frame.detailFecType ?? 0, 3)
    .write(frame.detailAdditionalParityMode ?? 0, 2)
    .write(frame.detailTotalCells ?? 0, 19);

  writeSymbolParams(w, first);

  if (basicVersion >= VERSION.BASIC_MIMO_MIXED) {
    w.write(first.mimoMixed ?? 0, 1).zeros(BASIC_RESERVED_BITS - 1);
  } else {
    w.zeros(BASIC_RESERVED_BITS);
  }

  w.write(frame.basicCrc ?? 0, 32);
  return w;
}

/** Encode a frame into L1-Basic + L1-Detail bytes */
export function generateL1Frame(frame: DemoL1Frame): Buffer {
  if (frame.subframes.length === 0) {
    throw new RangeError('A frame needs at least one subframe');
  }
  const basicVersion = frame.basicVersion ?? 0;
  const detail = encodeDetail(frame, basicVersion);
  const detailSizeBytes = frame.detailSizeBytes ?? (detail.bitLength + 32) / 8;

  const frameBits = encodeBasic(frame, basicVersion, detailSizeBytes)
    .append(detail)
    .write(frame.detailCrc ?? 0, 32);
  (frame.trailer ?? []).forEach(byte => frameBits.write(byte, 8));
  return frameBits.toBuffer();
}

// ── Demo tuner content ─────────────────────────────────────────────

export const DEMO_BSID = 0x0A1B;

/** Single subframe, two core-layer PLPs: 64QAM 8/15 with CTI and 256QAM 10/15 without TI */
export const DEMO_L1_FRAME: DemoL1Frame = {
  basicVersion: 1,
  detailVersion: 1,
  llsFlag: 1,
  timeInfoFlag: 1,
  time: { sec: 1_760_000_000, msec: 250 },
  paprReduction: 0,
  frameLength: { frameLength: 200, excessSamples: 0 },
  preambleNumSymbols: 1,
  detailFecType: 1,
  detailTotalCells: 2_730,
  subframes: [
    {
      fftSize: 1,
      guardInterval: 5,
      numOfdmSymbols: 71,
      scatteredPilotPattern: 3,
      scatteredPilotBoost: 4,
      frequencyInterleaver: 1,
      plps: [
        {
          id: 0, llsFlag: 1, start: 0, size: 1_200_000, fecType: 3, mod: 2, cod: 6,
          tiMode: TI_MODE.CTI, ctiFecBlockStart: 0, cti: { depth: 3, startRow: 0 },
        },
        {
          id: 1, start: 1_200_000, size: 2_400_000, fecType: 3, mod: 3, cod: 8,
          tiMode: TI_MODE.NONE, fecBlockStart: 12,
        },
      ],
    },
  ],
  bsid: DEMO_BSID,
  basicCrc: 0x1A2B3C4D,
  detailCrc: 0x5E6F7A8B,
};

/** The demo frame as the tuner's Base64 l1detail variable */
export function generateDemoL1Detail(): string {
  return generateL1Frame(DEMO_L1_FRAME).toString('base64');
}
