/**
 * Offline Reconciliation
 *
 * Runs once per load, before any input is handled. Compares the current
 * time with the time of the last save and resolves every planted crop:
 *
 *   now <= lastSave                     -> no effect (no time passed, or the clock went back)
 *   ready at lastSave                   -> auto-harvest (it was left waiting)
 *   not ready at now                    -> no effect (keeps growing from plantedAt)
 *   became ready between lastSave, now  -> auto-harvest
 *
 * An auto-harvest pays floor(sellPrice * OFFLINE_REWARD_PERCENT / 100) coins
 * and the full XP reward, and empties the plot. The payout is per crop and
 * does not shrink with time away; time away only feeds the summary, capped
 * at MAX_OFFLINE_SECONDS.
 *
 * Growth is never fast-forwarded: a crop still growing is left exactly as
 * it was, since its progress is always computed live from plantedAt.
 *
 * Running it again with the same `now` finds nothing left to harvest, so it
 * cannot pay twice.
 */

import { MAX_OFFLINE_SECONDS, OFFLINE_REWARD_PERCENT } from './game-config';
import { getReadyAt, isReady, type Crop } from './entities/crop';
import { getCropType, type CropCatalog, type CropType } from './entities/crop-type';
import { allCrops, removeCrop } from './entities/farm';
import { earn, getNewlyUnlocked } from './entities/player';
import type { SaveState } from './entities/save-state';

// =============================================================================
// TYPES
// =============================================================================

export type CropDecision =
  | { action: 'skip'; reason: 'no-elapsed-time' | 'growing' }
  | { action: 'auto-harvest'; readyBeforeSave: boolean };

export interface AutoHarvestEntry {
  x: number;
  y: number;
  cropTypeId: string;
  name: string;
  glyph: string;
  coins: number;
  xp: number;
  /** The crop was already ready when the game was saved */
  readyBeforeSave: boolean;
  /** How long it sat ready, capped at the offline window */
  waitedSeconds: number;
}

export interface ReconciliationSummary {
  now: number;
  lastSave: number;
  /** now - lastSave, uncapped, may be negative */
  elapsedSeconds: number;
  /** Time away for display: clamped to [0, maxOfflineSeconds] */
  offlineSeconds: number;
  clockRolledBack: boolean;
  autoHarvested: AutoHarvestEntry[];
  totalCoins: number;
  totalXp: number;
  levelsGained: number;
  /** Crop type ids unlocked by the levels gained */
  newlyUnlocked: string[];
}

export interface ReconcileOptions {
  rewardPercent?: number;
  maxOfflineSeconds?: number;
}

// =============================================================================
// PURE RULES
// =============================================================================

/** Coins paid for an auto-harvest; integer arithmetic, floored */
export function getOfflineCoins(
  sellPrice: number,
  rewardPercent: number = OFFLINE_REWARD_PERCENT
): number {
  return Math.floor((sellPrice * rewardPercent) / 100);
}

/**
 * The per-crop state machine. Total: every input lands in exactly one
 * outcome.
 */
export function decideCrop(
  crop: Crop,
  cropType: CropType,
  now: number,
  lastSave: number
): CropDecision {
  if (now - lastSave <= 0) {
    return { action: 'skip', reason: 'no-elapsed-time' };
  }
  if (isReady(crop, cropType, lastSave)) {
    return { action: 'auto-harvest', readyBeforeSave: true };
  }
  if (!isReady(crop, cropType, now)) {
    return { action: 'skip', reason: 'growing' };
  }
  return { action: 'auto-harvest', readyBeforeSave: false };
}

export function createEmptySummary(
  now: number,
  lastSave: number,
  maxOfflineSeconds: number = MAX_OFFLINE_SECONDS
): ReconciliationSummary {
  const elapsedSeconds = now - lastSave;
  return {
    now,
    lastSave,
    elapsedSeconds,
    offlineSeconds: Math.min(Math.max(0, elapsedSeconds), maxOfflineSeconds),
    clockRolledBack: elapsedSeconds < 0,
    autoHarvested: [],
    totalCoins: 0,
    totalXp: 0,
    levelsGained: 0,
    newlyUnlocked: [],
  };
}

// =============================================================================
// ENGINE
// =============================================================================

/**
 * Resolve offline time against `state` in place.
 *
 * Mutates state.farm (auto-harvested plots emptied), state.player (credits)
 * and, when time moved forward, advances state.lastSave to `now`.
 */
export function reconcile(
  state: SaveState,
  catalog: CropCatalog,
  now: number,
  options: ReconcileOptions = {}
): ReconciliationSummary {
  const rewardPercent = options.rewardPercent ?? OFFLINE_REWARD_PERCENT;
  const maxOfflineSeconds = options.maxOfflineSeconds ?? MAX_OFFLINE_SECONDS;
  const summary = createEmptySummary(now, state.lastSave, maxOfflineSeconds);

  if (summary.elapsedSeconds <= 0) {
    return summary;
  }

  const { farm, player } = state;
  const levelBefore = player.level;

  for (const { x, y, crop } of allCrops(farm)) {
    const cropType = getCropType(catalog, crop.cropTypeId);
    if (!cropType) continue;

    const decision = decideCrop(crop, cropType, now, state.lastSave);
    if (decision.action !== 'auto-harvest') continue;

    removeCrop(farm, x, y);
    const coins = getOfflineCoins(cropType.sellPrice, rewardPercent);
    earn(player, coins, cropType.xpReward);
    player.stats.cropsAutoHarvested += 1;

    summary.autoHarvested.push({
      x,
      y,
      cropTypeId: cropType.id,
      name: cropType.name,
      glyph: cropType.glyph,
      coins,
      xp: cropType.xpReward,
      readyBeforeSave: decision.readyBeforeSave,
      waitedSeconds: Math.min(now - getReadyAt(crop, cropType), maxOfflineSeconds),
    });
    summary.totalCoins += coins;
    summary.totalXp += cropType.xpReward;
  }

  summary.levelsGained = player.level - levelBefore;
  summary.newlyUnlocked = getNewlyUnlocked(catalog, levelBefore, player.level).map((c) => c.id);
  state.lastSave = now;

  return summary;
}
