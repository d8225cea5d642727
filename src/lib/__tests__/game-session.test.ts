/**
 * Game session lifecycle tests: startup save, auto-save and refresh
 * timers, serialized saves and the final save on stop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GameSession, type GameSessionOptions } from '../game-session';
import { silentLogger } from '../game-logger';
import { createMemorySaveStorage, type SaveStorageAdapter } from '../save-storage';
import type { SaveFile } from '../entities/save-state';
import {
  createTestCatalog,
  createTestLogger,
  createTestSaveFile,
  eventsOfType,
} from './test-helpers';

const catalog = createTestCatalog();

function readSaveFile(contents: string | null): SaveFile {
  if (contents === null) throw new Error('Nothing was saved');
  return JSON.parse(contents);
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('GameSession', () => {
  let now: number;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 1000;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function start(overrides: Partial<GameSessionOptions> = {}) {
    const storage = createMemorySaveStorage();
    const { logger, events } = createTestLogger();
    const sessionPromise = GameSession.start({
      storage,
      catalog,
      logger,
      clock: () => now,
      ...overrides,
    });
    return { sessionPromise, storage, events };
  }

  it('saves once right after loading', async () => {
    const { sessionPromise, storage, events } = start();
    const session = await sessionPromise;

    expect(session.loaded.source).toBe('new');
    expect(storage.writeCount).toBe(1);
    expect(readSaveFile(storage.contents).last_save).toBe(1000);
    expect(eventsOfType(events, 'save').map((e) => e.reason)).toEqual(['load']);

    await session.stop();
  });

  it('banks offline harvests before play starts', async () => {
    const storage = createMemorySaveStorage(
      JSON.stringify(
        createTestSaveFile({
          last_save: 0,
          farm: { width: 4, height: 4, plots: [{ x: 0, y: 0, crop_type: 'RADISH', planted_at: 0 }] },
        })
      )
    );
    now = 100;

    const { sessionPromise } = start({ storage });
    const session = await sessionPromise;

    expect(session.loaded.summary.autoHarvested).toHaveLength(1);
    expect(session.view().player.coins).toBe(110);
    const saved = readSaveFile(storage.contents);
    expect(saved.last_save).toBe(100);
    expect(saved.farm.plots).toEqual([]);
    expect(saved.player.coins).toBe(110);

    await session.stop();
  });

  it('plants and harvests against the session clock', async () => {
    const { sessionPromise } = start();
    const session = await sessionPromise;

    expect(session.plant(0, 0, 'RADISH').ok).toBe(true);
    now = 1015;
    expect(session.view().farm.rows[0][0]).toMatchObject({
      empty: false,
      cropTypeId: 'RADISH',
      stage: 'growing',
      progress: 0.5,
      remainingLabel: '15s',
      isReady: false,
    });

    now = 1030;
    const result = session.harvest(0, 0);
    expect(result.ok).toBe(true);
    expect(session.view().player.coins).toBe(105);

    await session.stop();
  });

  it('auto-saves on the interval', async () => {
    const onAutoSave = vi.fn();
    const { sessionPromise, storage, events } = start({ onAutoSave });
    const session = await sessionPromise;

    session.plant(0, 0, 'RADISH');
    now = 1030;
    await vi.advanceTimersByTimeAsync(30_000);
    await session.idle();

    expect(storage.writeCount).toBe(2);
    expect(readSaveFile(storage.contents).farm.plots).toEqual([
      { x: 0, y: 0, crop_type: 'RADISH', planted_at: 1000 },
    ]);
    expect(onAutoSave).toHaveBeenCalledWith({ ok: true, lastSave: 1030 });
    expect(eventsOfType(events, 'save').map((e) => e.reason)).toEqual(['load', 'auto']);
    expect(session.store.getState().lastSave).toBe(1030);

    await session.stop();
  });

  it('keeps going after a failed auto-save', async () => {
    const memory = createMemorySaveStorage();
    let failWrites = false;
    const storage: SaveStorageAdapter = {
      readSave: () => memory.readSave(),
      writeSave: (contents) =>
        failWrites ? Promise.reject(new Error('disk full')) : memory.writeSave(contents),
      quarantineSave: () => memory.quarantineSave(),
    };
    const onAutoSave = vi.fn();
    const { sessionPromise, events } = start({ storage, onAutoSave });
    const session = await sessionPromise;

    failWrites = true;
    await vi.advanceTimersByTimeAsync(30_000);
    await session.idle();

    expect(onAutoSave).toHaveBeenLastCalledWith({ ok: false, error: expect.any(Error) });
    expect(eventsOfType(events, 'error').map((e) => e.operation)).toEqual(['save:auto']);
    expect(session.store.getState().lastSave).toBe(1000);

    failWrites = false;
    now = 1060;
    await vi.advanceTimersByTimeAsync(30_000);
    await session.idle();

    expect(onAutoSave).toHaveBeenLastCalledWith({ ok: true, lastSave: 1060 });
    expect(memory.writeCount).toBe(2);

    await session.stop();
  });

  it('refreshes the view on its own interval', async () => {
    const onRefresh = vi.fn();
    const { sessionPromise } = start({ onRefresh, refreshIntervalMs: 1000 });
    const session = await sessionPromise;

    await vi.advanceTimersByTimeAsync(3000);

    expect(onRefresh).toHaveBeenCalledTimes(3);
    expect(onRefresh.mock.calls[2][0]).toMatchObject({ now: 1000, player: { coins: 100 } });

    await session.stop();
  });

  it('writes a final save on stop and then stays stopped', async () => {
    const { sessionPromise, storage, events } = start();
    const session = await sessionPromise;
    session.plant(2, 3, 'CARROT');
    now = 1005;

    const stopping = session.stop();
    expect(session.stop()).toBe(stopping);
    await stopping;

    expect(session.isStopped).toBe(true);
    expect(eventsOfType(events, 'save').map((e) => e.reason)).toEqual(['load', 'shutdown']);
    const saved = readSaveFile(storage.contents);
    expect(saved.last_save).toBe(1005);
    expect(saved.farm.plots).toEqual([{ x: 2, y: 3, crop_type: 'CARROT', planted_at: 1000 }]);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(storage.writeCount).toBe(2);
    expect(() => session.plant(0, 0, 'RADISH')).toThrow('Game session has stopped');
  });
});

describe('GameSession save ordering', () => {
  it('never starts a save before the previous one finished', async () => {
    const memory = createMemorySaveStorage();
    const pending: Array<() => void> = [];
    let gated = false;
    const storage: SaveStorageAdapter = {
      readSave: () => memory.readSave(),
      writeSave: (contents) => {
        if (!gated) return memory.writeSave(contents);
        return new Promise<void>((resolve) => {
          pending.push(() => memory.writeSave(contents).then(resolve));
        });
      },
      quarantineSave: () => memory.quarantineSave(),
    };
    const session = await GameSession.start({
      storage,
      catalog,
      logger: silentLogger,
      clock: () => 500,
      autoSaveIntervalMs: 60_000,
    });

    gated = true;
    const first = session.saveNow();
    const second = session.saveNow();
    await nextMacrotask();
    expect(pending).toHaveLength(1);

    pending[0]();
    await first;
    await nextMacrotask();
    expect(pending).toHaveLength(2);

    pending[1]();
    await second;
    expect(memory.writeCount).toBe(3);

    gated = false;
    await session.stop();
  });
});
