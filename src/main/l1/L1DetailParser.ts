import type { L1FieldEmitter } from './L1FieldEmitter';
import { named, plusOne, hex } from './L1FieldEmitter';
import type { L1BasicInfo } from './L1BasicParser';
import {
  MIMO,
  MISO,
  FFT_SIZE,
  GUARD_INTERVAL,
  FREQUENCY_INTERLEAVER,
  PLP_LAYER,
  SCRAMBLER_TYPE,
  PLP_FEC_TYPE,
  MAX_MODCOD_FEC_TYPE,
  PLP_MODULATION,
  PLP_CODE_RATE,
  PLP_TI_MODE,
  TI_MODE,
  PLP_TYPE,
  CORE_LAYER,
  VERSION,
  INDENT,
  SECTION_TITLE,
} from './constants';
import { L1 } from '@shared/constants';
import { logger } from '../utils/logger';

/** Per-subframe values the closing MIMO-mixed pass needs */
interface SubframeInfo {
  /** Raw value: the subframe carries numPlp + 1 PLPs */
  numPlp: number;
}

/** Per-frame values read in the L1-Detail header */
interface DetailContext {
  basic: L1BasicInfo;
  numRf: number;
}

/** Modulation index when the PLP signals one, undefined for FEC types above 5 */
type PlpModulation = number | undefined;

const QPSK = 0;

/**
 * Parser for the variable-length L1-Detail block.
 *
 * Layout: header (version, bonded RF list, optional time), then
 * L1B_num_subframes + 1 subframes of L1D_num_plp + 1 PLPs each, then
 * the version-gated L1D_bsid and MIMO-mixed pass, padding up to
 * L1B_L1_Detail_size_bytes and the closing L1D_crc.
 */
export class L1DetailParser {
  /**
   * @param detailStart - bit offset where L1-Detail begins, used for the size check
   */
  static parse(out: L1FieldEmitter, basic: L1BasicInfo, detailStart: number): void {
    out.spacer();
    out.section(SECTION_TITLE.DETAIL);

    const version = out.field('L1D_version', 4, INDENT.TOP);
    const numRf = out.field('L1D_num_rf', 3, INDENT.TOP);
    for (let i = 0; i < numRf; i++) {
      out.field('L1D_bonded_bsid', 16, INDENT.SUBFRAME, hex(4));
      out.reserved(3);
    }

    L1DetailParser.parseTime(out, basic.timeInfoFlag);

    const ctx: DetailContext = { basic, numRf };
    const subframes: SubframeInfo[] = [];
    for (let i = 0; i <= basic.numSubframes; i++) {
      subframes.push(L1DetailParser.parseSubframe(out, ctx, i));
    }

    if (version >= VERSION.DETAIL_BSID) {
      out.field('L1D_bsid', 16, INDENT.TOP, hex(4));
    }

    if (version >= VERSION.DETAIL_MIMO_MIXED) {
      L1DetailParser.parseMimoMixed(out, basic, subframes);
    }

    L1DetailParser.skipPadding(out, basic.detailSizeBytes, detailStart);
    out.field('L1D_crc', L1.CRC_BITS, INDENT.TOP, hex(8));
  }

  /** Each precision tier adds one more 10-bit sub-second field */
  private static parseTime(out: L1FieldEmitter, timeInfoFlag: number): void {
    if (timeInfoFlag === 0) return;
    out.field('L1D_time_sec', 32, INDENT.TOP);
    out.field('L1D_time_msec', 10, INDENT.TOP);
    if (timeInfoFlag > 1) out.field('L1D_time_usec', 10, INDENT.TOP);
    if (timeInfoFlag > 2) out.field('L1D_time_nsec', 10, INDENT.TOP);
  }

  private static parseSubframe(out: L1FieldEmitter, ctx: DetailContext, index: number): SubframeInfo {
    const { basic } = ctx;
    const sf = INDENT.SUBFRAME;

    out.spacer();
    out.group(`Subframe #${index}:`, INDENT.TOP);

    // Subframe 0 takes its symbol parameters from L1-Basic
    let mimo = basic.firstSubMimo;
    let sbsFirst = basic.firstSubSbsFirst;
    let sbsLast = basic.firstSubSbsLast;

    if (index > 0) {
      mimo = out.field('L1D_mimo', 1, sf, named(MIMO)) === 1;
      out.field('L1D_miso', 2, sf, named(MISO));
      out.field('L1D_fft_size', 2, sf, named(FFT_SIZE));
      out.field('L1D_reduced_carriers', 3, sf);
      out.field('L1D_guard_interval', 4, sf, named(GUARD_INTERVAL));
      out.field('L1D_num_ofdm_symbols', 11, sf, plusOne);
      out.field('L1D_scattered_pilot_pattern', 5, sf);
      out.field('L1D_scattered_pilot_boost', 3, sf);
      sbsFirst = out.field('L1D_sbs_first', 1, sf) === 1;
      sbsLast = out.field('L1D_sbs_last', 1, sf) === 1;
    }

    if (basic.numSubframes > 0) {
      out.field('L1D_subframe_multiplex', 1, sf);
    }
    out.field('L1D_frequency_interleaver', 1, sf, named(FREQUENCY_INTERLEAVER));
    if (sbsFirst || sbsLast) {
      out.field('L1D_sbs_null_cells', 13, sf);
    }

    const numPlp = out.field('L1D_num_plp', 6, sf, plusOne);
    for (let j = 0; j <= numPlp; j++) {
      L1DetailParser.parsePlp(out, ctx, j, mimo);
    }

    return { numPlp };
  }

  private static parsePlp(out: L1FieldEmitter, ctx: DetailContext, index: number, mimo: boolean): void {
    const p = INDENT.PLP;

    out.group(`PLP #${index}:`, INDENT.PLP_HEADER);
    out.field('L1D_plp_id', 6, p);
    out.field('L1D_plp_lls_flag', 1, p);
    const layer = out.field('L1D_plp_layer', 2, p, named(PLP_LAYER));
    out.field('L1D_plp_start', 24, p);
    out.field('L1D_plp_size', 24, p);
    out.field('L1D_plp_scrambler_type', 2, p, named(SCRAMBLER_TYPE));

    const fecType = out.field('L1D_plp_fec_type', 4, p, named(PLP_FEC_TYPE));
    let mod: PlpModulation;
    if (fecType <= MAX_MODCOD_FEC_TYPE) {
      mod = out.field('L1D_plp_mod', 4, p, named(PLP_MODULATION));
      out.field('L1D_plp_cod', 4, p, named(PLP_CODE_RATE));
    }

    const tiMode = out.field('L1D_plp_TI_mode', 2, p, named(PLP_TI_MODE));
    if (tiMode === TI_MODE.NONE) {
      out.field('L1D_plp_fec_block_start', 15, p);
    } else if (tiMode === TI_MODE.CTI) {
      out.field('L1D_plp_CTI_fec_block_start', 22, p);
    }

    if (ctx.numRf > 0) {
      const numBonded = out.field('L1D_plp_num_channel_bonded', 3, p);
      if (numBonded > 0) {
        out.field('L1D_plp_channel_bonding_format', 2, p);
        for (let k = 0; k < numBonded; k++) {
          out.field('L1D_plp_bonded_rf_id', 3, INDENT.NESTED);
        }
      }
    }

    if (mimo) {
      L1DetailParser.parsePlpMimo(out, p);
    }

    if (layer === CORE_LAYER) {
      L1DetailParser.parseCoreLayer(out, tiMode, mod);
    } else {
      out.field('L1D_plp_ldm_injection_level', 5, p);
    }
  }

  private static parsePlpMimo(out: L1FieldEmitter, indent: number): void {
    out.field('L1D_plp_mimo_stream_combining', 1, indent);
    out.field('L1D_plp_mimo_IQ_interleaving', 1, indent);
    out.field('L1D_plp_mimo_PH', 1, indent);
  }

  private static parseCoreLayer(out: L1FieldEmitter, tiMode: number, mod: PlpModulation): void {
    const p = INDENT.PLP;

    const dispersed = out.field('L1D_plp_type', 1, p, named(PLP_TYPE)) === 1;
    if (dispersed) {
      out.field('L1D_plp_num_subslices', 14, p, plusOne);
      out.field('L1D_plp_subslice_interval', 24, p);
    }

    if ((tiMode === TI_MODE.CTI || tiMode === TI_MODE.HTI) && mod === QPSK) {
      out.field('L1D_plp_TI_extended_interleaving', 1, p);
    }

    if (tiMode === TI_MODE.CTI) {
      out.field('L1D_plp_CTI_depth', 3, p);
      out.field('L1D_plp_CTI_start_row', 11, p);
    } else if (tiMode === TI_MODE.HTI) {
      const interSubframe = out.field('L1D_plp_HTI_inter_subframe', 1, p);
      const numTiBlocks = out.field('L1D_plp_HTI_num_ti_blocks', 4, p, plusOne);
      out.field('L1D_plp_HTI_num_fec_blocks_max', 12, p, plusOne);
      if (interSubframe === 0) {
        out.field('L1D_plp_HTI_num_fec_blocks', 12, p, plusOne);
      } else {
        for (let k = 0; k <= numTiBlocks; k++) {
          out.field('L1D_plp_HTI_num_fec_blocks', 12, INDENT.NESTED, plusOne);
        }
      }
      out.field('L1D_plp_HTI_cell_interleaver', 1, p);
    }
  }

  private static parseMimoMixed(out: L1FieldEmitter, basic: L1BasicInfo, subframes: SubframeInfo[]): void {
    subframes.forEach((subframe, i) => {
      out.group(`Subframe #${i}:`, INDENT.SUBFRAME);

      let mimoMixed = basic.firstSubMimoMixed;
      if (i > 0) {
        mimoMixed = out.field('L1D_mimo_mixed', 1, INDENT.PLP_HEADER) === 1;
      }
      if (!mimoMixed) return;

      for (let j = 0; j <= subframe.numPlp; j++) {
        out.group(`PLP #${j}:`, INDENT.PLP_HEADER);
        const plpMimo = out.field('L1D_plp_mimo', 1, INDENT.PLP);
        if (plpMimo === 1) {
          L1DetailParser.parsePlpMimo(out, INDENT.NESTED);
        }
      }
    });
  }

  /**
   * L1B_L1_Detail_size_bytes covers the whole detail block, CRC included.
   * Whatever the grammar left unread before the CRC is padding.
   */
  private static skipPadding(out: L1FieldEmitter, detailSizeBytes: number, detailStart: number): void {
    const consumed = out.reader.offset - detailStart;
    const padding = detailSizeBytes * 8 - L1.CRC_BITS - consumed;
    if (padding > 0) {
      out.reserved(padding);
    } else if (padding < 0) {
      logger.warn(`L1-Detail overran its declared size of ${detailSizeBytes} bytes by ${-padding} bits`);
    }
  }
}
