import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

vi.mock('./utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { parseArgs, createClient, run } from './index';
import { MockTunerClient } from './demo/MockTunerClient';
import { CaptureTunerClient } from './device/CaptureTunerClient';
import { UsageError } from './utils/errors';
import { REPORT } from '@shared/constants';

describe('parseArgs', () => {
  it('selects the demo tuner', () => {
    expect(parseArgs(['--demo'], {})).toEqual({
      demo: true,
      tunerIndex: 0,
      showStatus: false,
      help: false,
    });
  });

  it('honours DEMO_MODE=true', () => {
    expect(parseArgs([], { DEMO_MODE: 'true' }).demo).toBe(true);
  });

  it('reads a capture directory with options', () => {
    expect(parseArgs(['--capture', 'dump', '--tuner', '2', '--status', '--save', 'out'], {})).toEqual({
      demo: false,
      capturePath: 'dump',
      tunerIndex: 2,
      showStatus: true,
      saveDir: 'out',
      help: false,
    });
  });

  it('defaults the save directory', () => {
    expect(parseArgs(['--demo', '--save'], {}).saveDir).toBe(REPORT.STORAGE_DIR);
    expect(parseArgs(['--save', '--demo'], {})).toMatchObject({ demo: true, saveDir: REPORT.STORAGE_DIR });
  });

  it('accepts --help without a source', () => {
    expect(parseArgs(['-h'], {}).help).toBe(true);
  });

  it('requires a source', () => {
    expect(() => parseArgs([], {})).toThrow(UsageError);
    expect(() => parseArgs([], {})).toThrow('Pass --demo or --capture <dir>');
  });

  it('rejects bad arguments', () => {
    expect(() => parseArgs(['--demo', '--bogus'], {})).toThrow('Unknown argument: --bogus');
    expect(() => parseArgs(['--capture'], {})).toThrow('--capture needs a directory');
    expect(() => parseArgs(['--demo', '--tuner', '-1'], {})).toThrow('--tuner needs a non-negative integer');
    expect(() => parseArgs(['--demo', '--tuner'], {})).toThrow(UsageError);
    expect(() => parseArgs(['--demo', '--tuner', ''], {})).toThrow('--tuner needs a non-negative integer');
    expect(() => parseArgs(['--demo', '--tuner', ' '], {})).toThrow('--tuner needs a non-negative integer');
  });
});

describe('createClient', () => {
  it('picks the client for the source', () => {
    expect(createClient(parseArgs(['--demo'], {}))).toBeInstanceOf(MockTunerClient);
    expect(createClient(parseArgs(['--capture', 'dump'], {}))).toBeInstanceOf(CaptureTunerClient);
  });
});

describe('run', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `tuner-test-cli-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('prints the demo report', async () => {
    const out: string[] = [];
    const code = await run(parseArgs(['--demo'], {}), line => out.push(line));

    expect(code).toBe(0);
    expect(out[1]).toBe('L1D BSID: 2587 (0xA1B)');
    expect(out).toContain('--- L1-Basic Signaling ---');
    expect(out[out.length - 1]).toBe('L1D_crc: 0x5e6f7a8b');
  });

  it('prints the status summary first', async () => {
    const out: string[] = [];
    await run(parseArgs(['--demo', '--status'], {}), line => out.push(line));

    expect(out.slice(0, 2)).toEqual(['Channel: atsc3:33  Lock: atsc3:0+1', 'BSID: 2587 (0xA1B)']);
    expect(out[12]).toBe('');
    expect(out[13]).toBe('L1D BSID: 2587 (0xA1B)');
  });

  it('saves the report when asked', async () => {
    const out: string[] = [];
    await run(parseArgs(['--demo', '--save', tempDir], {}), line => out.push(line));

    const files = await fs.readdir(tempDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^rf33-bsid2587-details-\d{8}-\d{6}\.txt$/);
    expect(out[out.length - 1]).toBe(`Saved details to ${join(tempDir, files[0])}`);

    const saved = await fs.readFile(join(tempDir, files[0]), 'utf-8');
    expect(saved).toBe(out.slice(0, -1).map(line => `${line}\n`).join(''));
  });

  it('reports a tuner without PLP info', async () => {
    await fs.mkdir(tempDir, { recursive: true });
    await fs.writeFile(join(tempDir, 'status.txt'), 'ch=8vsb:27 lock=8vsb ss=80');

    const out: string[] = [];
    const code = await run(parseArgs(['--capture', tempDir], {}), line => out.push(line));

    expect(code).toBe(0);
    expect(out).toEqual(['No PLP info available for this tuner']);
  });
});
