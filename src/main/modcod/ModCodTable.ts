/**
 * Required-SNR lookup for ATSC 3.0 (modulation, code rate) pairs.
 *
 * The table (modcod-snr.json) holds fixed physical-layer constants:
 * QPSK through 4096QAM at code rates 2/15 through 13/15, each with the
 * minimum and maximum SNR in dB a receiver needs for that ModCod.
 */

import type { ModCodEntry } from '@shared/types/modcod.types';
import table from './modcod-snr.json';

export const MODCOD_TABLE: readonly Readonly<ModCodEntry>[] = Object.freeze(
  table.map(entry => Object.freeze({ ...entry }))
);

/**
 * Canonicalize a device modulation string into a table key.
 * Digits are collected in order, every other character is upper-cased,
 * and the digits go first: "qam256" -> "256QAM", "qpsk" -> "QPSK".
 */
export function normalizeModulation(raw: string): string {
  let digits = '';
  let letters = '';
  for (const ch of raw) {
    if (ch >= '0' && ch <= '9') {
      digits += ch;
    } else {
      letters += ch.toUpperCase();
    }
  }
  return digits + letters;
}

/**
 * Exact match on both fields; undefined when the pair is not in the table.
 */
export function lookupModCod(mod: string, cod: string): Readonly<ModCodEntry> | undefined {
  return MODCOD_TABLE.find(entry => entry.mod === mod && entry.cod === cod);
}
