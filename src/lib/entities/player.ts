/**
 * Player Entity
 *
 * Coins, experience and lifetime stats. Level is never tracked as a
 * running counter: it is always derived from total experience, so it
 * cannot drift from the XP it represents.
 */

import { FarmError } from '../farm-errors';
import { STARTING_COINS, XP_PER_LEVEL } from '../game-config';
import { sortCropTypes, type CropCatalog, type CropType } from './crop-type';

// =============================================================================
// TYPES
// =============================================================================

export interface PlayerStats {
  cropsPlanted: number;
  /** Interactive harvests */
  cropsHarvested: number;
  /** Harvests made by offline reconciliation */
  cropsAutoHarvested: number;
  /** Every coin credited, from any source */
  coinsEarned: number;
}

export interface Player {
  /** Integer >= 0 */
  coins: number;
  /** Total accumulated XP, integer >= 0 */
  experience: number;
  /** Always levelForExperience(experience); stored for display and saves */
  level: number;
  stats: PlayerStats;
}

export interface LevelProgress {
  level: number;
  /** XP earned inside the current level */
  current: number;
  /** XP the current level spans */
  needed: number;
  /** current / needed, in [0, 1) */
  fraction: number;
}

// =============================================================================
// CREATION
// =============================================================================

export function createPlayerStats(): PlayerStats {
  return {
    cropsPlanted: 0,
    cropsHarvested: 0,
    cropsAutoHarvested: 0,
    coinsEarned: 0,
  };
}

export function createPlayer(coins: number = STARTING_COINS, experience: number = 0): Player {
  return {
    coins,
    experience,
    level: levelForExperience(experience),
    stats: createPlayerStats(),
  };
}

// =============================================================================
// LEVELS (pure)
// =============================================================================

/** level = floor(xp / XP_PER_LEVEL) + 1 */
export function levelForExperience(experience: number): number {
  return Math.floor(Math.max(0, experience) / XP_PER_LEVEL) + 1;
}

/** Total XP at which `level` begins */
export function experienceForLevel(level: number): number {
  return (Math.max(1, Math.floor(level)) - 1) * XP_PER_LEVEL;
}

export function getLevelProgress(player: Player): LevelProgress {
  const level = levelForExperience(player.experience);
  const current = player.experience - experienceForLevel(level);
  return {
    level,
    current,
    needed: XP_PER_LEVEL,
    fraction: current / XP_PER_LEVEL,
  };
}

// =============================================================================
// UNLOCKS (pure, recomputed on demand)
// =============================================================================

export function isCropUnlocked(cropType: CropType, level: number): boolean {
  return cropType.unlockLevel <= level;
}

export function getUnlockedCropTypes(catalog: CropCatalog, level: number): CropType[] {
  return sortCropTypes(catalog).filter((cropType) => isCropUnlocked(cropType, level));
}

/** Crop types that unlock somewhere in (fromLevel, toLevel] */
export function getNewlyUnlocked(
  catalog: CropCatalog,
  fromLevel: number,
  toLevel: number
): CropType[] {
  return sortCropTypes(catalog).filter(
    (cropType) => cropType.unlockLevel > fromLevel && cropType.unlockLevel <= toLevel
  );
}

// =============================================================================
// ECONOMY
// =============================================================================

function assertAmount(amount: number, label: string): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${amount}`);
  }
}

/**
 * Spend coins. Throws FarmError('InsufficientFunds') and leaves the
 * balance alone when the player cannot cover `amount`.
 */
export function spendCoins(player: Player, amount: number): void {
  assertAmount(amount, 'Spend amount');
  if (player.coins < amount) {
    throw new FarmError('InsufficientFunds', `Need ${amount} coins, have ${player.coins}`, {
      required: amount,
      available: player.coins,
    });
  }
  player.coins -= amount;
}

/**
 * Credit coins and experience, then re-derive level.
 * Returns how many levels were gained (0 or more).
 */
export function earn(player: Player, coins: number, xp: number): number {
  assertAmount(coins, 'Coins');
  assertAmount(xp, 'Experience');

  const before = player.level;
  player.coins += coins;
  player.experience += xp;
  player.stats.coinsEarned += coins;
  player.level = levelForExperience(player.experience);
  return player.level - before;
}
