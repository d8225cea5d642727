/**
 * Offline reconciliation tests.
 *
 * Covers the per-crop state machine, the reduced offline payout, the
 * 24-hour cap on reported time, and that repeated restarts cannot pay
 * twice.
 */

import { describe, it, expect } from 'vitest';
import { decideCrop, getOfflineCoins, reconcile } from '../reconciliation';
import { getCrop } from '../entities/farm';
import { CARROT, RADISH, createTestCatalog, createTestState } from './test-helpers';

const catalog = createTestCatalog();

describe('getOfflineCoins', () => {
  it.each([
    [15, 10],
    [35, 24],
    [60, 42],
    [1, 0],
  ])('pays floor(70%% of %s) = %s', (sellPrice, coins) => {
    expect(getOfflineCoins(sellPrice)).toBe(coins);
  });

  it('takes another percentage', () => {
    expect(getOfflineCoins(15, 50)).toBe(7);
  });
});

describe('decideCrop', () => {
  const crop = { cropTypeId: 'RADISH', plantedAt: 0 };

  it('does nothing when no time has passed or the clock went back', () => {
    expect(decideCrop(crop, RADISH, 100, 100)).toEqual({ action: 'skip', reason: 'no-elapsed-time' });
    expect(decideCrop(crop, RADISH, 50, 100)).toEqual({ action: 'skip', reason: 'no-elapsed-time' });
  });

  it('harvests a crop that was already ready at save time', () => {
    expect(decideCrop(crop, RADISH, 100, 40)).toEqual({ action: 'auto-harvest', readyBeforeSave: true });
  });

  it('harvests a crop that ripened while away', () => {
    expect(decideCrop(crop, RADISH, 100, 10)).toEqual({ action: 'auto-harvest', readyBeforeSave: false });
  });

  it('leaves a crop that is still growing', () => {
    expect(decideCrop(crop, RADISH, 29, 10)).toEqual({ action: 'skip', reason: 'growing' });
  });
});

describe('reconcile', () => {
  it('auto-harvests a radish after a restart at t=100', () => {
    const state = createTestState({
      lastSave: 0,
      player: { coins: 90 },
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    const summary = reconcile(state, catalog, 100);

    expect(state.player.coins).toBe(100);
    expect(state.player.experience).toBe(10);
    expect(state.player.stats.cropsAutoHarvested).toBe(1);
    expect(getCrop(state.farm, 0, 0)).toBeNull();
    expect(state.lastSave).toBe(100);
    expect(summary).toEqual({
      now: 100,
      lastSave: 0,
      elapsedSeconds: 100,
      offlineSeconds: 100,
      clockRolledBack: false,
      autoHarvested: [
        {
          x: 0,
          y: 0,
          cropTypeId: 'RADISH',
          name: 'Radish',
          glyph: '🔴',
          coins: 10,
          xp: 10,
          readyBeforeSave: false,
          waitedSeconds: 70,
        },
      ],
      totalCoins: 10,
      totalXp: 10,
      levelsGained: 0,
      newlyUnlocked: [],
    });
  });

  it('pays nothing the second time with no time passed', () => {
    const state = createTestState({
      lastSave: 0,
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    reconcile(state, catalog, 100);
    const coins = state.player.coins;
    const second = reconcile(state, catalog, 100);

    expect(second.autoHarvested).toEqual([]);
    expect(second.totalCoins).toBe(0);
    expect(state.player.coins).toBe(coins);
    expect(state.player.experience).toBe(10);
  });

  it('pays the same per crop no matter how far past the cap', () => {
    const t0 = 1000;
    const state = createTestState({
      lastSave: t0,
      player: { coins: 0 },
      plots: [{ x: 2, y: 3, cropTypeId: 'RADISH', plantedAt: t0 }],
    });

    const summary = reconcile(state, catalog, t0 + RADISH.growthSeconds + 1_000_000);

    expect(state.player.coins).toBe(10);
    expect(state.player.experience).toBe(10);
    expect(summary.offlineSeconds).toBe(86_400);
    expect(summary.autoHarvested[0].waitedSeconds).toBe(86_400);
  });

  it('leaves growing crops exactly as they were', () => {
    const state = createTestState({
      lastSave: 100,
      plots: [{ x: 1, y: 1, cropTypeId: 'CARROT', plantedAt: 90 }],
    });

    const summary = reconcile(state, catalog, 120);

    expect(summary.autoHarvested).toEqual([]);
    expect(getCrop(state.farm, 1, 1)).toEqual({ cropTypeId: 'CARROT', plantedAt: 90 });
    expect(state.player.coins).toBe(100);
  });

  it('marks crops that were waiting at save time', () => {
    const state = createTestState({
      lastSave: 50,
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    const [entry] = reconcile(state, catalog, 60).autoHarvested;

    expect(entry.readyBeforeSave).toBe(true);
    expect(entry.waitedSeconds).toBe(30);
  });

  it('does nothing when the clock is behind the last save', () => {
    const state = createTestState({
      lastSave: 500,
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    const summary = reconcile(state, catalog, 400);

    expect(summary.clockRolledBack).toBe(true);
    expect(summary.offlineSeconds).toBe(0);
    expect(summary.autoHarvested).toEqual([]);
    expect(getCrop(state.farm, 0, 0)).not.toBeNull();
    expect(state.lastSave).toBe(500);
  });

  it('handles several crops and reports level-ups and unlocks', () => {
    const state = createTestState({
      lastSave: 0,
      player: { coins: 0, experience: 80 },
      plots: [
        { x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 },
        { x: 1, y: 0, cropTypeId: 'CARROT', plantedAt: 0 },
        { x: 2, y: 0, cropTypeId: 'CARROT', plantedAt: 50 },
      ],
    });

    const summary = reconcile(state, catalog, 100);

    expect(summary.autoHarvested.map((e) => e.cropTypeId)).toEqual(['RADISH', 'CARROT']);
    expect(summary.totalCoins).toBe(10 + getOfflineCoins(CARROT.sellPrice));
    expect(summary.totalXp).toBe(25);
    expect(state.player.experience).toBe(105);
    expect(state.player.level).toBe(2);
    expect(summary.levelsGained).toBe(1);
    expect(summary.newlyUnlocked).toEqual(['WHEAT']);
    expect(getCrop(state.farm, 2, 0)).toEqual({ cropTypeId: 'CARROT', plantedAt: 50 });
  });

  it('applies a custom reward percentage', () => {
    const state = createTestState({
      lastSave: 0,
      player: { coins: 0 },
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    reconcile(state, catalog, 100, { rewardPercent: 50 });

    expect(state.player.coins).toBe(7);
  });
});
