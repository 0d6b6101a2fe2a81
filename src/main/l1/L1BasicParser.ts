import type { L1FieldEmitter } from './L1FieldEmitter';
import { named, plusOne, hex, labelled } from './L1FieldEmitter';
import {
  MIMO_PILOT_ENCODING,
  LLS_FLAG,
  TIME_INFO_FLAG,
  PAPR_REDUCTION,
  FRAME_LENGTH_MODE,
  MIMO,
  MISO,
  FFT_SIZE,
  GUARD_INTERVAL,
  VERSION,
  BASIC_RESERVED_BITS,
  INDENT,
  SECTION_TITLE,
} from './constants';

/**
 * L1-Basic values that gate fields later in the frame.
 */
export interface L1BasicInfo {
  version: number;
  timeInfoFlag: number;
  /** Raw value: the frame carries numSubframes + 1 subframes */
  numSubframes: number;
  detailSizeBytes: number;
  firstSubMimo: boolean;
  firstSubSbsFirst: boolean;
  firstSubSbsLast: boolean;
  firstSubMimoMixed: boolean;
}

const TOP = INDENT.TOP;
const NESTED = INDENT.SUBFRAME;

/**
 * Parser for the fixed 200-bit L1-Basic block.
 *
 * The only fork is L1B_frame_length_mode, which selects between
 * {frame_length, excess_samples} and {time_offset, additional_samples}.
 * L1B_version >= 1 spends one of the trailing reserved bits on
 * L1B_first_sub_mimo_mixed.
 */
export class L1BasicParser {
  static parse(out: L1FieldEmitter): L1BasicInfo {
    out.section(SECTION_TITLE.BASIC);

    const version = out.field('L1B_version', 3, TOP);
    out.field('L1B_mimo_scattered_pilot_encoding', 1, TOP, named(MIMO_PILOT_ENCODING));
    out.field('L1B_lls_flag', 1, TOP, named(LLS_FLAG));
    const timeInfoFlag = out.field('L1B_time_info_flag', 2, TOP, named(TIME_INFO_FLAG));
    out.field('L1B_return_channel_flag', 1, TOP);
    out.field('L1B_papr_reduction', 2, TOP, named(PAPR_REDUCTION));

    const frameLengthMode = out.field('L1B_frame_length_mode', 1, TOP, named(FRAME_LENGTH_MODE));
    if (frameLengthMode === 0) {
      out.field('L1B_frame_length', 10, NESTED);
      out.field('L1B_excess_samples_per_symbol', 13, NESTED);
    } else {
      out.field('L1B_time_offset', 16, NESTED);
      out.field('L1B_additional_samples', 7, NESTED);
    }

    const numSubframes = out.field('L1B_num_subframes', 8, TOP, plusOne);
    out.field('L1B_preamble_num_symbols', 3, TOP, plusOne);
    out.field('L1B_preamble_reduced_carriers', 3, TOP);
    out.field('L1B_L1_Detail_content_tag', 2, TOP);
    const detailSizeBytes = out.field('L1B_L1_Detail_size_bytes', 13, TOP);
    out.field('L1B_L1_Detail_fec_type', 3, TOP, labelled('Mode ', plusOne));
    out.field('L1B_L1_Detail_additional_parity_mode', 2, TOP, labelled('K='));
    out.field('L1B_L1_Detail_total_cells', 19, TOP);

    const firstSubMimo = out.field('L1B_first_sub_mimo', 1, TOP, named(MIMO)) === 1;
    out.field('L1B_first_sub_miso', 2, TOP, named(MISO));
    out.field('L1B_first_sub_fft_size', 2, TOP, named(FFT_SIZE));
    out.field('L1B_first_sub_reduced_carriers', 3, TOP);
    out.field('L1B_first_sub_guard_interval', 4, TOP, named(GUARD_INTERVAL));
    out.field('L1B_first_sub_num_ofdm_symbols', 11, TOP, plusOne);
    out.field('L1B_first_sub_scattered_pilot_pattern', 5, TOP);
    out.field('L1B_first_sub_scattered_pilot_boost', 3, TOP);
    const firstSubSbsFirst = out.field('L1B_first_sub_sbs_first', 1, TOP) === 1;
    const firstSubSbsLast = out.field('L1B_first_sub_sbs_last', 1, TOP) === 1;

    let firstSubMimoMixed = false;
    if (version >= VERSION.BASIC_MIMO_MIXED) {
      firstSubMimoMixed = out.field('L1B_first_sub_mimo_mixed', 1, TOP) === 1;
      out.reserved(BASIC_RESERVED_BITS - 1);
    } else {
      out.reserved(BASIC_RESERVED_BITS);
    }

    out.field('L1B_crc', 32, TOP, hex(8));

    return {
      version,
      timeInfoFlag,
      numSubframes,
      detailSizeBytes,
      firstSubMimo,
      firstSubSbsFirst,
      firstSubSbsLast,
      firstSubMimoMixed,
    };
  }
}
