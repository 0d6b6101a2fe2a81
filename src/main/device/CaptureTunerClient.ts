import { promises as fs } from 'fs';
import { join } from 'path';
import { DEVICE } from '@shared/constants';
import type { TunerClient } from './TunerClient';
import { DeviceError } from '../utils/errors';
import { logger } from '../utils/logger';

type CaptureFile = keyof typeof DEVICE.CAPTURE_FILES;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Tuner client backed by a directory of captured device variables
 * (status.txt, streaminfo.txt, plpinfo.txt, version.txt, l1detail.txt).
 * A missing file means the tuner did not report that variable.
 */
export class CaptureTunerClient implements TunerClient {
  constructor(private capturePath: string) {}

  getStatus(): Promise<string | null> {
    return this.read('status');
  }

  getStreamInfo(): Promise<string | null> {
    return this.read('streaminfo');
  }

  getPlpInfo(): Promise<string | null> {
    return this.read('plpinfo');
  }

  async getFirmwareVersion(): Promise<string | null> {
    const version = await this.read('version');
    return version === null ? null : version.trim();
  }

  async getL1Detail(tunerIndex: number): Promise<string | null> {
    logger.debug(`Reading captured /tuner${tunerIndex}/l1detail`);
    const detail = await this.read('l1detail');
    return detail === null ? null : detail.trim();
  }

  private async read(file: CaptureFile): Promise<string | null> {
    const filePath = join(this.capturePath, DEVICE.CAPTURE_FILES[file]);

    try {
      const text = await fs.readFile(filePath, 'utf-8');
      logger.debug(`Loaded ${file} from ${filePath}`);
      return text;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new DeviceError(`Failed to read captured ${file}`, error);
    }
  }
}
