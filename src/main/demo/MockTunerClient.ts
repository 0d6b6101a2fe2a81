/**
 * Mock tuner client for offline use (demo mode).
 *
 * Simulates an ATSC 3.0 tuner locked on RF 33 with two PLPs, on firmware
 * new enough to expose l1detail. Activated via DEMO_MODE=true or --demo.
 */

import type { TunerClient } from '../device/TunerClient';
import { DEMO_BSID, generateDemoL1Detail } from './DemoL1Generator';
import { logger } from '../utils/logger';

export const DEMO_FIRMWARE_VERSION = '20250815';

export const DEMO_STATUS = 'ch=atsc3:33:0+1 lock=atsc3:33 ss=94(-38dBm) snq=87(24dB) seq=100 bps=21452800 pps=2043';

export const DEMO_STREAMINFO = [
  '3: 5.1 KDMO-HD (encrypted)',
  '4: 5.2 KDMO-WX',
  'tsid=0x0A1B',
].join('\n');

export const DEMO_PLPINFO = [
  `bsid=0x${DEMO_BSID.toString(16).toUpperCase()}`,
  '1: sched=1 lock=1 mod=qam256 cod=10/15 layer=core lls=0',
  '0: sched=1 lock=1 mod=qam64 cod=8/15 layer=core lls=1',
].join('\n');

export class MockTunerClient implements TunerClient {
  async getStatus(): Promise<string | null> {
    return this.answer('status', DEMO_STATUS);
  }

  async getStreamInfo(): Promise<string | null> {
    return this.answer('streaminfo', DEMO_STREAMINFO);
  }

  async getPlpInfo(): Promise<string | null> {
    return this.answer('plpinfo', DEMO_PLPINFO);
  }

  async getFirmwareVersion(): Promise<string | null> {
    return this.answer('version', DEMO_FIRMWARE_VERSION);
  }

  async getL1Detail(tunerIndex: number): Promise<string | null> {
    return this.answer(`tuner${tunerIndex}/l1detail`, generateDemoL1Detail());
  }

  private answer(variable: string, value: string): string {
    logger.debug(`[DEMO] ${variable}`);
    return value;
  }
}
