import type { PlpReport, PlpReportMeta } from '@shared/types/tuner.types';
import { L1 } from '@shared/constants';
import type { TunerClient } from '../device/TunerClient';
import { parseStatusValue, parseDbValue, parseStatusString, isFieldPresent } from '../status/statusParser';
import { assemblePlpDetails } from './PlpDetailAssembler';
import { DeviceError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/** Leading digits of a firmware version string, 0 when there are none */
export function firmwareNumber(version: string): number {
  const match = /^\d+/.exec(version);
  return match ? parseInt(match[0], 10) : 0;
}

/**
 * The l1detail variable exists on firmware newer than
 * L1.MIN_FIRMWARE_VERSION, and only when the tuner reports dB readings.
 */
export function supportsL1Detail(status: string, firmwareVersion: string): boolean {
  return isFieldPresent(parseDbValue(status, 'ss=')) &&
    firmwareNumber(firmwareVersion) > L1.MIN_FIRMWARE_VERSION;
}

/** RF channel number after the first ':' of ch= (e.g. 33 for "atsc3:33:0+1"), 0 when none */
export function rfChannel(status: string): number {
  const channel = parseStatusString(status, 'ch=');
  if (channel === null) return 0;
  const colon = channel.indexOf(':');
  const match = /^\d+/.exec(colon === -1 ? channel : channel.slice(colon + 1));
  return match ? parseInt(match[0], 10) : 0;
}

export function reportMeta(status: string, plpinfo: string, streaminfo: string): PlpReportMeta {
  const bsid = parseStatusValue(plpinfo, 'bsid=');
  const tsid = parseStatusValue(streaminfo, 'tsid=');
  let streamId = 0;
  if (isFieldPresent(bsid)) streamId = bsid;
  else if (isFieldPresent(tsid)) streamId = tsid;
  return { rfChannel: rfChannel(status), streamId };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** rf<rf>-bsid<id>-details-<YYYYMMDD-HHMMSS>.txt, in local time */
export function reportFileName(meta: PlpReportMeta, date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}-` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `rf${meta.rfChannel}-bsid${meta.streamId}-details-${stamp}.txt`;
}

/**
 * Gathers the PLP, stream and L1 variables from a tuner and assembles
 * the details report.
 */
export class PlpReportService {
  constructor(private client: TunerClient, private tunerIndex: number) {}

  /**
   * @returns the report, or null when the tuner reports no PLP info
   */
  async buildReport(): Promise<PlpReport | null> {
    try {
      const plpinfo = await this.client.getPlpInfo();
      if (plpinfo === null || plpinfo.trim().length === 0) {
        logger.info(`Tuner ${this.tunerIndex} reports no PLP info`);
        return null;
      }

      const streaminfo = (await this.client.getStreamInfo()) ?? '';
      const status = (await this.client.getStatus()) ?? '';
      const firmware = (await this.client.getFirmwareVersion()) ?? '';

      let l1Detail: string | undefined;
      if (supportsL1Detail(status, firmware)) {
        const raw = await this.client.getL1Detail(this.tunerIndex);
        // A blank answer carries no frame
        l1Detail = raw !== null && raw.trim().length > 0 ? raw : undefined;
      } else {
        logger.debug(`L1 detail not available (firmware "${firmware}")`);
      }

      return {
        lines: assemblePlpDetails(plpinfo, streaminfo, l1Detail),
        meta: reportMeta(status, plpinfo, streaminfo),
        l1Included: l1Detail !== undefined,
      };
    } catch (error) {
      if (error instanceof DeviceError) throw error;
      throw new DeviceError(`Failed to query tuner ${this.tunerIndex}: ${getErrorMessage(error)}`, error);
    }
  }
}
