import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { closeLogFile, describeError, formatLogLine, logProcess, openLogFile } from '../src/lib/logger';

describe('formatLogLine', () => {
  it('pads the level and prefixes the timestamp', () => {
    expect(formatLogLine('Starting analysis', 'info', '2026-01-01T00:00:00.000Z')).toBe(
      '[2026-01-01T00:00:00.000Z] [INFO   ] Starting analysis'
    );
    expect(formatLogLine('Slow down', 'warning', '2026-01-01T00:00:00.000Z')).toBe(
      '[2026-01-01T00:00:00.000Z] [WARNING] Slow down'
    );
  });

  it('appends metadata as JSON', () => {
    expect(formatLogLine('Done', 'error', 'ts', { failed: 2 })).toBe('[ts] [ERROR  ] Done {"failed":2}');
  });
});

describe('logProcess', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-logger-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    closeLogFile();
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('writes errors to stderr and everything else to stdout', () => {
    logProcess('all good');
    logProcess('broken', 'error');

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/\[ERROR {2}\] broken$/);
  });

  it('mirrors entries into a datestamped log file once opened', async () => {
    const logFile = openLogFile(dir, 'analysis', new Date('2026-03-04T10:00:00Z'));
    expect(logFile).toBe(path.join(dir, 'analysis-2026-03-04.log'));

    logProcess('first');
    logProcess('second', 'warning');

    const lines = (await fs.readFile(logFile, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[INFO {3}\] first$/);
    expect(lines[1]).toMatch(/\[WARNING\] second$/);
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
