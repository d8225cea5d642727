/**
 * Game Configuration
 *
 * Balance constants and on-disk locations for the farm.
 * Crop definitions live in data/crop-types.json (see crop-catalog.ts).
 */

import { homedir } from 'os';
import { join } from 'path';

// =============================================================================
// STARTING STATE
// =============================================================================

export const STARTING_COINS = 100;

export const STARTING_FARM_SIZE = { width: 4, height: 4 } as const;

// =============================================================================
// PROGRESSION
// =============================================================================

/** Linear: level 2 at 100 total XP, level 3 at 200, ... */
export const XP_PER_LEVEL = 100;

// =============================================================================
// OFFLINE RECONCILIATION
// =============================================================================

/** Auto-harvested crops pay this percentage of their sell price (floored) */
export const OFFLINE_REWARD_PERCENT = 70;

/** 24 hours */
export const MAX_OFFLINE_SECONDS = 24 * 60 * 60;

// =============================================================================
// TIMING
// =============================================================================

export const AUTO_SAVE_INTERVAL_MS = 30 * 1000;

export const GROWTH_REFRESH_INTERVAL_MS = 1000;

// =============================================================================
// PERSISTENCE
// =============================================================================

export const CURRENT_SAVE_VERSION = 1;

export const SAVE_FILE_NAME = 'savegame.json';

export const LOG_FILE_NAME = 'events.jsonl';

/** Corrupt saves kept aside for inspection before the oldest is deleted */
export const MAX_QUARANTINED_SAVES = 5;

// =============================================================================
// PATHS
// =============================================================================

export interface GamePaths {
  /** Directory holding savegame.json */
  saveDir: string;
  /** Directory holding the JSONL event log */
  logDir: string;
  /** Replacement crop table, when HARVEST_CLOCK_CROPS is set */
  cropTablePath: string | null;
}

/**
 * Resolve where the game keeps its files.
 *
 * HARVEST_CLOCK_HOME overrides the default ~/.harvest-clock directory.
 * HARVEST_CLOCK_CROPS points at a crop table to use instead of the bundled one.
 */
export function resolveGamePaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): GamePaths {
  const root = env.HARVEST_CLOCK_HOME?.trim() || join(home, '.harvest-clock');
  const cropTablePath = env.HARVEST_CLOCK_CROPS?.trim() || null;
  return {
    saveDir: root,
    logDir: join(root, 'logs'),
    cropTablePath,
  };
}
