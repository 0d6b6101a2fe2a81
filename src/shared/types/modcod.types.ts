export type Modulation = 'QPSK' | '16QAM' | '64QAM' | '256QAM' | '1024QAM' | '4096QAM';

/** Required-SNR range for one (modulation, code rate) pair */
export interface ModCodEntry {
  mod: string;
  cod: string;
  minSnr: number;
  maxSnr: number;
}
