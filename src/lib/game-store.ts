/**
 * Game Store
 *
 * Zustand store owning one session's Farm + Player.
 * Uses immer for immutable state updates.
 *
 * Each action is a single synchronous immer update with no await inside,
 * so nothing can observe a half-applied plant or harvest. When any check in
 * an update throws, immer discards the draft: a refused action leaves coins,
 * plots and stats exactly as they were.
 *
 * Actions never throw model errors; they return an ActionResult the caller
 * can turn into a notice.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Draft } from 'immer';
import { FarmError, isFarmError } from './farm-errors';
import { cloneCrop, getReadyAt, type Crop } from './entities/crop';
import { getCropType, type CropCatalog, type CropType } from './entities/crop-type';
import { getReadyCrops, harvestCrop, plantCrop, type Farm } from './entities/farm';
import {
  earn,
  getNewlyUnlocked,
  isCropUnlocked,
  spendCoins,
  type Player,
} from './entities/player';

// =============================================================================
// TYPES
// =============================================================================

export interface GameState {
  farm: Farm;
  player: Player;
  /** Seconds since epoch of the last completed save */
  lastSave: number;
}

export interface PlantOutcome {
  x: number;
  y: number;
  cropType: CropType;
  plantedAt: number;
  readyAt: number;
  coinsSpent: number;
}

export interface HarvestOutcome {
  x: number;
  y: number;
  crop: Crop;
  cropType: CropType;
  coins: number;
  xp: number;
  levelsGained: number;
  newlyUnlocked: CropType[];
}

export type ActionResult<T> = { ok: true; value: T } | { ok: false; error: FarmError };

export interface GameActions {
  /** Buy a seed and plant it at (x, y) */
  plant(x: number, y: number, cropTypeId: string, now: number): ActionResult<PlantOutcome>;
  /** Harvest a ready crop at full price */
  harvest(x: number, y: number, now: number): ActionResult<HarvestOutcome>;
  /** Harvest every ready crop in one step */
  harvestAllReady(now: number): HarvestOutcome[];
  markSaved(now: number): void;
}

export type GameStore = GameState & GameActions;

// =============================================================================
// HELPERS
// =============================================================================

/** Run a model operation, turning FarmErrors into a failed result */
function attempt<T>(operation: () => T): ActionResult<T> {
  try {
    return { ok: true, value: operation() };
  } catch (e) {
    if (isFarmError(e)) return { ok: false, error: e };
    throw e;
  }
}

function lookupCropType(catalog: CropCatalog, cropTypeId: string): CropType {
  const cropType = getCropType(catalog, cropTypeId);
  if (!cropType) {
    throw new FarmError('UnknownCropType', `Unknown crop type "${cropTypeId}"`, { cropTypeId });
  }
  return cropType;
}

/** Harvest inside a draft and credit the player */
function harvestInDraft(
  state: Draft<GameState>,
  catalog: CropCatalog,
  x: number,
  y: number,
  now: number
): HarvestOutcome {
  const crop = cloneCrop(harvestCrop(state.farm, x, y, catalog, now));
  const cropType = lookupCropType(catalog, crop.cropTypeId);
  const levelBefore = state.player.level;

  const levelsGained = earn(state.player, cropType.sellPrice, cropType.xpReward);
  state.player.stats.cropsHarvested += 1;

  return {
    x,
    y,
    crop,
    cropType,
    coins: cropType.sellPrice,
    xp: cropType.xpReward,
    levelsGained,
    newlyUnlocked: getNewlyUnlocked(catalog, levelBefore, state.player.level),
  };
}

// =============================================================================
// STORE
// =============================================================================

export function createGameStore(initial: GameState, catalog: CropCatalog) {
  return createStore<GameStore>()(
    immer((set, get) => {
      /** One immer update that hands back what the recipe returned */
      const update = <T>(recipe: (state: Draft<GameStore>) => T): T => {
        const results: T[] = [];
        set((state) => {
          results.push(recipe(state));
        });
        return results[0];
      };

      return {
        // ----- State -----
        farm: initial.farm,
        player: initial.player,
        lastSave: initial.lastSave,

        // ----- Actions -----

        plant(x, y, cropTypeId, now) {
          return attempt(() => {
            const cropType = lookupCropType(catalog, cropTypeId);
            const { level } = get().player;
            if (!isCropUnlocked(cropType, level)) {
              throw new FarmError(
                'CropLocked',
                `${cropType.name} unlocks at level ${cropType.unlockLevel}`,
                { x, y, cropTypeId, unlockLevel: cropType.unlockLevel }
              );
            }

            return update((state) => {
              const crop = plantCrop(state.farm, x, y, cropType, now);
              spendCoins(state.player, cropType.seedCost);
              state.player.stats.cropsPlanted += 1;
              return {
                x,
                y,
                cropType,
                plantedAt: crop.plantedAt,
                readyAt: getReadyAt(crop, cropType),
                coinsSpent: cropType.seedCost,
              };
            });
          });
        },

        harvest(x, y, now) {
          return attempt(() => update((state) => harvestInDraft(state, catalog, x, y, now)));
        },

        harvestAllReady(now) {
          const ready = getReadyCrops(get().farm, catalog, now);
          if (ready.length === 0) return [];
          return update((state) =>
            ready.map(({ x, y }) => harvestInDraft(state, catalog, x, y, now))
          );
        },

        markSaved(now) {
          set((state) => {
            state.lastSave = now;
          });
        },
      };
    })
  );
}

export type GameStoreApi = ReturnType<typeof createGameStore>;
