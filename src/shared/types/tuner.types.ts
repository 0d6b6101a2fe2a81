export interface ProgramLine {
  text: string;
  encrypted: boolean;
}

export interface PlpLine {
  id: number;
  text: string;
  locked: boolean;
}

export interface TunerStatusSummary {
  /** Channel as shown to the user; PLP selection is split off into `lock` */
  channel: string;
  lock: string;
  isAtsc3: boolean;
  streamIdLabel: 'BSID' | 'TSID';
  /** STATUS.FIELD_ABSENT when neither id is reported */
  streamId: number;
  signalStrength: number;
  signalQuality: number;
  symbolQuality: number;
  /** dBm from the ss= parenthetical, STATUS.FIELD_ABSENT when absent */
  signalStrengthDbm: number;
  /** dB from the snq= parenthetical, STATUS.FIELD_ABSENT when absent */
  snrDb: number;
  networkRateMbps: number;
  programs: ProgramLine[];
  plps: PlpLine[];
}

/** Raw text blobs as the tuner returns them */
export interface TunerSnapshot {
  status: string;
  streaminfo: string;
  plpinfo: string;
}

export interface PlpReportMeta {
  rfChannel: number;
  /** BSID, else TSID, else 0 */
  streamId: number;
}

export interface PlpReport {
  lines: string[];
  meta: PlpReportMeta;
  l1Included: boolean;
}
