import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createFileLogger, errorEvent } from '../game-logger';
import { resolveGamePaths } from '../game-config';

describe('createFileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'harvest-clock-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('appends one timestamped JSON object per line', () => {
    const logDir = join(dir, 'logs');
    const logger = createFileLogger(logDir);

    logger({ event: 'save', lastSave: 10, plots: 2, reason: 'manual' });
    logger({ event: 'load_warning', warning: 'farm is missing, starting with an empty farm' });

    const lines = readFileSync(join(logDir, 'events.jsonl'), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({
      event: 'save',
      lastSave: 10,
      plots: 2,
      reason: 'manual',
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
    });
    expect(JSON.parse(lines[1]).event).toBe('load_warning');
  });

  it('creates the log directory when the logger is created', () => {
    const logDir = join(dir, 'nested', 'logs');
    createFileLogger(logDir);
    expect(existsSync(logDir)).toBe(true);
  });

  it('reports a failed write on the console instead of throwing', () => {
    const notADirectory = join(dir, 'file');
    writeFileSync(notADirectory, '');
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createFileLogger(notADirectory);
    expect(() => logger({ event: 'config_warning', warning: 'test' })).not.toThrow();
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});

describe('errorEvent', () => {
  it('shapes errors and other thrown values', () => {
    const error = new Error('boom');
    expect(errorEvent('save:auto', error)).toEqual({
      event: 'error',
      operation: 'save:auto',
      error: 'boom',
      stack: error.stack,
    });
    expect(errorEvent('load', 'plain string')).toEqual({
      event: 'error',
      operation: 'load',
      error: 'plain string',
      stack: undefined,
    });
  });
});

describe('resolveGamePaths', () => {
  it('defaults to a directory in the home folder', () => {
    expect(resolveGamePaths({}, '/home/tester')).toEqual({
      saveDir: join('/home/tester', '.harvest-clock'),
      logDir: join('/home/tester', '.harvest-clock', 'logs'),
      cropTablePath: null,
    });
  });

  it('honours the environment overrides', () => {
    const env = { HARVEST_CLOCK_HOME: '/srv/farm', HARVEST_CLOCK_CROPS: '/srv/crops.json' };
    expect(resolveGamePaths(env, '/home/tester')).toEqual({
      saveDir: '/srv/farm',
      logDir: join('/srv/farm', 'logs'),
      cropTablePath: '/srv/crops.json',
    });
  });

  it('ignores blank overrides', () => {
    expect(resolveGamePaths({ HARVEST_CLOCK_HOME: '  ' }, '/home/tester').saveDir).toBe(
      join('/home/tester', '.harvest-clock')
    );
  });
});
