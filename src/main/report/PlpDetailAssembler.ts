import { REPORT } from '@shared/constants';
import { parseStatusValue, parseStatusString, isFieldPresent } from '../status/statusParser';
import { formatId } from '../status/TunerStatus';
import { normalizeModulation, lookupModCod } from '../modcod/ModCodTable';
import { L1SignalingParser, formatL1Lines } from '../l1/L1SignalingParser';
import { MalformedInputError } from '../utils/errors';
import { logger } from '../utils/logger';

function idLine(label: string, value: number): string {
  return `${label}: ${isFieldPresent(value) ? formatId(value) : REPORT.NOT_SET}`;
}

/**
 * Required-SNR annotation for a plpinfo line carrying mod= and cod=,
 * or null when either token is missing or the pair is not in the table.
 */
export function snrAnnotation(line: string): string | null {
  const mod = parseStatusString(line, 'mod=');
  const cod = parseStatusString(line, 'cod=');
  if (mod === null || cod === null) return null;

  const entry = lookupModCod(normalizeModulation(mod), cod);
  if (!entry) return null;
  return `  -> Required SNR: Min ${entry.minSnr.toFixed(2)} dB, Max ${entry.maxSnr.toFixed(2)} dB`;
}

/**
 * Decoded L1 section. A bad Base64 string yields a single explanatory
 * line instead of throwing, so the PLP lines above it still render.
 */
export function l1Section(l1Detail: string): string[] {
  try {
    return formatL1Lines(L1SignalingParser.parseBase64(l1Detail.trim()));
  } catch (error) {
    if (!(error instanceof MalformedInputError)) throw error;
    logger.warn('Could not decode L1 detail:', error.message);
    return [`L1 detail unavailable: ${error.message}`];
  }
}

/**
 * Build the PLP & L1 details report.
 *
 * Layout: BSID and TSID header, each plpinfo line followed by its
 * required-SNR annotation when one applies, then (when `l1Detail` is given)
 * a separator and the decoded L1 signaling.
 *
 * @param plpinfo - tuner plpinfo text, one PLP per line plus a bsid= line
 * @param streaminfo - tuner streaminfo text (only tsid= is used)
 * @param l1Detail - Base64 l1detail variable, decoded here exactly once
 */
export function assemblePlpDetails(plpinfo: string, streaminfo: string, l1Detail?: string): string[] {
  const lines: string[] = [''];

  lines.push(idLine('L1D BSID', parseStatusValue(plpinfo, 'bsid=')));
  lines.push(idLine('SLT TSID', parseStatusValue(streaminfo, 'tsid=')));
  lines.push('');

  for (const raw of plpinfo.split('\n')) {
    const line = raw.replace(/\r$/, '');
    if (line.length === 0 || line.startsWith('bsid=')) continue;

    lines.push(line);
    const annotation = snrAnnotation(line);
    if (annotation) lines.push(annotation);
    lines.push('');
  }

  if (l1Detail !== undefined) {
    lines.push('', REPORT.SEPARATOR, '');
    lines.push(...l1Section(l1Detail));
  }

  return lines;
}
