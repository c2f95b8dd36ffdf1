import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  closeLogFile,
  currentLogFile,
  debug,
  getLogLevel,
  info,
  passesLevel,
  setLogFile,
  setLogLevel,
  warn,
} from '../src/pipeline/log';
import { ENV } from '../src/pipeline/env';
import { makeTempDir } from './helpers/wav';

describe('log', () => {
  let dir: string;
  const initial = getLogLevel();

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    closeLogFile();
    setLogLevel(initial);
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('starts at the configured level', () => {
    expect(ENV.logLevel).toBe('error');
    expect(initial).toBe('error');
  });

  it('appends JSON entries at or above the current level to the run log', async () => {
    const file = path.join(dir, 'nested', 'run-1.log');
    setLogLevel('info');
    setLogFile(file);
    expect(currentLogFile()).toBe(file);
    debug('hidden');
    info('split.open', { wavPath: 'a.wav' });
    warn('split.aborted', { missing: 1 });
    closeLogFile();
    expect(currentLogFile()).toBeNull();

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n').map((l) => JSON.parse(l));
    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      ['info', 'split.open'],
      ['warn', 'split.aborted'],
    ]);
    expect(lines[0].wavPath).toBe('a.wav');
    expect(console.log).toHaveBeenCalledTimes(2);
  });
});

describe('passesLevel', () => {
  it('filters JSON entries by level', () => {
    expect(passesLevel('{"level":"debug","msg":"x"}', 'info')).toBe(false);
    expect(passesLevel('{"level":"error","msg":"x"}', 'warn')).toBe(true);
  });

  it('lets through lines that are not log entries', () => {
    expect(passesLevel('plain text', 'error')).toBe(true);
    expect(passesLevel('[1,2]', 'error')).toBe(true);
    expect(passesLevel('{"level":"loud"}', 'error')).toBe(true);
  });
});
