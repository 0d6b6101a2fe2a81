import type { TunerSnapshot, TunerStatusSummary, ProgramLine, PlpLine } from '@shared/types/tuner.types';
import { STATUS } from '@shared/constants';
import { parseStatusValue, parseDbValue, parseStatusString, isFieldPresent } from './statusParser';

const ATSC3_PREFIX = 'atsc3:';

function splitLines(blob: string): string[] {
  return blob.split('\n').map(line => line.replace(/\r$/, '')).filter(line => line.length > 0);
}

/**
 * "atsc3:33:0+16" carries the PLP selection after the second colon;
 * show it as channel "atsc3:33" and lock "atsc3:0+16".
 */
function splitChannel(channel: string, lock: string): { channel: string; lock: string } {
  if (!channel.startsWith(ATSC3_PREFIX)) return { channel, lock };
  const second = channel.indexOf(':', ATSC3_PREFIX.length);
  if (second === -1) return { channel, lock };
  return {
    channel: channel.slice(0, second),
    lock: `${ATSC3_PREFIX}${channel.slice(second + 1)}`,
  };
}

/** Lines of streaminfo that describe a program */
export function extractPrograms(streaminfo: string): ProgramLine[] {
  return splitLines(streaminfo)
    .filter(line => line.includes(':') || line.includes('program='))
    .map(text => ({ text, encrypted: text.includes('(encrypted)') }));
}

/** PLP lines of plpinfo, bsid line excluded, sorted by leading PLP id */
export function extractPlps(plpinfo: string): PlpLine[] {
  return splitLines(plpinfo)
    .filter(line => !line.startsWith('bsid='))
    .map(text => {
      const id = parseInt(text, 10);
      return { id: Number.isNaN(id) ? 0 : id, text, locked: text.includes('lock=1') };
    })
    .sort((a, b) => a.id - b.id);
}

/**
 * Fold the tuner's status, streaminfo and plpinfo text into one summary.
 * ATSC 3.0 streams are identified by BSID (from plpinfo), everything else
 * by TSID (from streaminfo).
 */
export function summarizeTunerStatus(snapshot: TunerSnapshot): TunerStatusSummary {
  const { status, streaminfo, plpinfo } = snapshot;

  const rawChannel = parseStatusString(status, 'ch=') ?? '';
  const rawLock = parseStatusString(status, 'lock=') ?? '';
  const { channel, lock } = splitChannel(rawChannel, rawLock);
  const isAtsc3 = rawLock.includes('atsc3');

  let streamId = parseStatusValue(streaminfo, 'tsid=');
  if (isAtsc3) {
    const bsid = parseStatusValue(plpinfo, 'bsid=');
    if (isFieldPresent(bsid)) streamId = bsid;
  }

  const bps = parseStatusValue(status, 'bps=');
  const pps = parseStatusValue(status, 'pps=');
  const networkRateMbps = pps > 0 && isFieldPresent(bps) ? bps / 1_000_000 : 0;

  const percent = (key: string): number => {
    const value = parseStatusValue(status, key);
    return isFieldPresent(value) ? value : 0;
  };

  return {
    channel,
    lock,
    isAtsc3,
    streamIdLabel: isAtsc3 ? 'BSID' : 'TSID',
    streamId,
    signalStrength: percent('ss='),
    signalQuality: percent('snq='),
    symbolQuality: percent('seq='),
    signalStrengthDbm: parseDbValue(status, 'ss='),
    snrDb: parseDbValue(status, 'snq='),
    networkRateMbps,
    programs: extractPrograms(streaminfo),
    plps: isAtsc3 ? extractPlps(plpinfo) : [],
  };
}

function withDb(percent: number, db: number, unit: string): string {
  const base = `${percent}%`;
  return db === STATUS.FIELD_ABSENT ? base : `${base} [${db} ${unit}]`;
}

export function formatId(value: number): string {
  return `${value} (0x${value.toString(16).toUpperCase()})`;
}

export function formatTunerStatus(summary: TunerStatusSummary): string[] {
  const lines = [
    `Channel: ${summary.channel}  Lock: ${summary.lock}`,
  ];
  if (isFieldPresent(summary.streamId)) {
    lines.push(`${summary.streamIdLabel}: ${formatId(summary.streamId)}`);
  }
  lines.push(
    `Signal Strength: ${withDb(summary.signalStrength, summary.signalStrengthDbm, 'dBm')}`,
    `Signal Quality: ${withDb(summary.signalQuality, summary.snrDb, 'dB')}`,
    `Symbol Quality: ${summary.symbolQuality}%`,
    `Network Rate: ${summary.networkRateMbps.toFixed(3)} Mbps`,
  );

  if (summary.programs.length > 0) {
    lines.push('Programs:');
    for (const program of summary.programs) {
      lines.push(`  ${program.text}`);
    }
  }

  if (summary.plps.length > 0) {
    lines.push('PLP Info:');
    for (const plp of summary.plps) {
      lines.push(`  ${plp.text}`);
    }
  }

  return lines;
}
