import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { ReportError } from '../utils/errors';
import { logger } from '../utils/logger';

export class ReportStorage {
  constructor(private storagePath: string) {}

  async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.storagePath, { recursive: true });
    } catch (error) {
      throw new ReportError('Failed to create report directory', error);
    }
  }

  /**
   * Write one line per report line, each newline-terminated.
   * @returns absolute path of the written file
   */
  async save(lines: readonly string[], fileName: string): Promise<string> {
    await this.ensureDirectory();

    const filePath = resolve(join(this.storagePath, fileName));

    try {
      const text = lines.map(line => `${line}\n`).join('');
      await fs.writeFile(filePath, text, 'utf-8');
      logger.info(`Report saved: ${filePath}`);
      return filePath;
    } catch (error) {
      throw new ReportError(`Failed to save report ${fileName}`, error);
    }
  }
}
