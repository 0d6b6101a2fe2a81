import { pathToFileURL } from 'url';
import { REPORT, DEVICE, APP_VERSION } from '@shared/constants';
import type { TunerClient } from './device/TunerClient';
import { CaptureTunerClient } from './device/CaptureTunerClient';
import { MockTunerClient } from './demo/MockTunerClient';
import { PlpReportService, reportFileName } from './report/PlpReportService';
import { ReportStorage } from './report/ReportStorage';
import { summarizeTunerStatus, formatTunerStatus } from './status/TunerStatus';
import { UsageError, getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

const USAGE = `atsc3-tuner-inspector ${APP_VERSION}

Usage: npm start -- (--demo | --capture <dir>) [--tuner <n>] [--status] [--save [dir]]

  --demo           use the built-in demo tuner (same as DEMO_MODE=true)
  --capture <dir>  read captured tuner variables from <dir>
  --tuner <n>      tuner index for the l1detail query (default ${DEVICE.DEFAULT_TUNER_INDEX})
  --status         print the tuner status summary before the report
  --save [dir]     also write the report to [dir] (default ./${REPORT.STORAGE_DIR})
`;

export interface CliOptions {
  demo: boolean;
  capturePath?: string;
  tunerIndex: number;
  showStatus: boolean;
  saveDir?: string;
  help: boolean;
}

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const options: CliOptions = {
    demo: env.DEMO_MODE === 'true',
    tunerIndex: DEVICE.DEFAULT_TUNER_INDEX,
    showStatus: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case '--demo':
        options.demo = true;
        break;
      case '--capture':
        if (next === undefined) throw new UsageError('--capture needs a directory');
        options.capturePath = next;
        i++;
        break;
      case '--tuner': {
        if (next === undefined || !/^\d+$/.test(next)) {
          throw new UsageError('--tuner needs a non-negative integer');
        }
        options.tunerIndex = Number(next);
        i++;
        break;
      }
      case '--status':
        options.showStatus = true;
        break;
      case '--save':
        if (next !== undefined && !next.startsWith('--')) {
          options.saveDir = next;
          i++;
        } else {
          options.saveDir = REPORT.STORAGE_DIR;
        }
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!options.help && !options.demo && options.capturePath === undefined) {
    throw new UsageError('Pass --demo or --capture <dir>');
  }
  return options;
}

export function createClient(options: CliOptions): TunerClient {
  if (options.demo) {
    logger.info('=== DEMO MODE ACTIVE ===');
    return new MockTunerClient();
  }
  return new CaptureTunerClient(options.capturePath ?? '.');
}

export async function run(options: CliOptions, write: (line: string) => void): Promise<number> {
  const client = createClient(options);

  if (options.showStatus) {
    const summary = summarizeTunerStatus({
      status: (await client.getStatus()) ?? '',
      streaminfo: (await client.getStreamInfo()) ?? '',
      plpinfo: (await client.getPlpInfo()) ?? '',
    });
    formatTunerStatus(summary).forEach(write);
  }

  const report = await new PlpReportService(client, options.tunerIndex).buildReport();
  if (!report) {
    write('No PLP info available for this tuner');
    return 0;
  }
  report.lines.forEach(write);

  if (options.saveDir !== undefined) {
    const storage = new ReportStorage(options.saveDir);
    const saved = await storage.save(report.lines, reportFileName(report.meta, new Date()));
    write(`Saved details to ${saved}`);
  }
  return 0;
}

async function main(): Promise<void> {
  const write = (line: string): void => {
    process.stdout.write(`${line}\n`);
  };

  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
      process.stdout.write(USAGE);
      return;
    }
    process.exitCode = await run(options, write);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error('Report failed:', error);
      process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    }
    process.exitCode = 1;
  }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
