import { describe, it, expect } from 'vitest';
import { buildFarmView, buildPlayerView } from '../farm-view';
import { createTestCatalog, createTestState } from './test-helpers';

const catalog = createTestCatalog();

describe('buildFarmView', () => {
  const state = createTestState({
    plots: [
      { x: 1, y: 0, cropTypeId: 'RADISH', plantedAt: 0 },
      { x: 3, y: 3, cropTypeId: 'CARROT', plantedAt: 0 },
    ],
  });

  it('describes every plot at the given time', () => {
    const view = buildFarmView(state.farm, catalog, 15);

    expect(view.width).toBe(4);
    expect(view.rows).toHaveLength(4);
    expect(view.rows[0][0]).toEqual({ x: 0, y: 0, empty: true });
    expect(view.rows[0][1]).toEqual({
      x: 1,
      y: 0,
      empty: false,
      cropTypeId: 'RADISH',
      name: 'Radish',
      glyph: '🔴',
      stage: 'growing',
      progress: 0.5,
      remainingSeconds: 15,
      remainingLabel: '15s',
      isReady: false,
    });
  });

  it('shows crops as ready once their time is up', () => {
    const view = buildFarmView(state.farm, catalog, 60);
    expect(view.rows[0][1]).toMatchObject({ stage: 'ready', isReady: true, remainingLabel: 'Ready!' });
    expect(view.rows[3][3]).toMatchObject({ stage: 'ready', progress: 1 });
  });

  it('does not change the farm it reads', () => {
    const before = JSON.stringify(state.farm);
    buildFarmView(state.farm, catalog, 1_000_000);
    expect(JSON.stringify(state.farm)).toBe(before);
  });
});

describe('buildPlayerView', () => {
  it('summarizes the player and the farm', () => {
    const state = createTestState({
      player: { coins: 70, experience: 150, level: 2 },
      plots: [{ x: 0, y: 0, cropTypeId: 'RADISH', plantedAt: 0 }],
    });

    const early = buildPlayerView(state.player, catalog, state.farm, 15);
    expect(early).toMatchObject({
      coins: 70,
      experience: 150,
      progress: { level: 2, current: 50, needed: 100, fraction: 0.5 },
      occupiedPlots: 1,
      totalPlots: 16,
      readyCrops: 0,
    });
    expect(early.unlocked.map((c) => c.id)).toEqual(['RADISH', 'CARROT', 'WHEAT']);

    expect(buildPlayerView(state.player, catalog, state.farm, 30).readyCrops).toBe(1);
  });
});
