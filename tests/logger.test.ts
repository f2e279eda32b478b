import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { processBatch } from '../src/core/bulk-update.js';
import { logger, setLogFile, setVerbose } from '../src/utils/logger.js';
import { buildEngine, fakeBoard } from './helpers/fake-github.js';

describe('logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'projfields-log-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogFile(undefined);
    setVerbose(false);
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should mirror lines into the log file with a timestamp and level', () => {
    const path = join(dir, 'run.log');
    setLogFile(path);

    logger.info('Line 2: Updating I_1 -> Status = Done');
    logger.warn('retrying');

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - INFO: Line 2: Updating I_1 -> Status = Done$/);
    expect(lines[1]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - WARNING: retrying$/);
  });

  it('should turn file logging off when the log file cannot be written', () => {
    const path = join(dir, 'missing', 'run.log');
    setLogFile(path);

    expect(() => logger.info('first')).not.toThrow();
    logger.info('second');

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.warn).mock.calls[0][0]).toContain(`Cannot write log file ${path}, file logging disabled`);
    expect(console.log).toHaveBeenCalledTimes(2);
  });

  it('should let a bulk run finish when the log file cannot be written', async () => {
    setLogFile(join(dir, 'missing', 'run.log'));
    const engine = buildEngine(fakeBoard().transport);

    const report = await processBatch(engine, {
      projectId: 'PVT_1',
      owner: 'acme',
      rows: [
        { line: 1, itemId: 'I_1', fieldName: 'Status', value: 'Done' },
        { line: 2, itemId: 'I_2', fieldName: 'Notes', value: 'ready' },
      ],
      rowDelayMs: 0,
    });

    expect(report.updated).toBe(2);
    expect(report.failed).toBe(0);
  });

  it('should print debug output only when verbose', () => {
    setVerbose(false);
    logger.debug('hidden');
    expect(console.log).not.toHaveBeenCalled();

    setVerbose(true);
    logger.debug('shown');
    expect(console.log).toHaveBeenCalledTimes(1);
  });
});
