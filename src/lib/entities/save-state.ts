/**
 * Save State Entity
 *
 * The versioned envelope written to disk: farm, player and the time of the
 * save. The wire format uses snake_case keys:
 *
 *   {
 *     "version": 1,
 *     "last_save": 1700000000.5,
 *     "farm": { "width": 4, "height": 4,
 *               "plots": [{ "x": 0, "y": 0, "crop_type": "RADISH", "planted_at": 1699999990 }] },
 *     "player": { "coins": 90, "experience": 10, "level": 1, "stats": { ... } }
 *   }
 *
 * Reading is lenient: missing or malformed fields fall back to defaults and
 * bad plots are dropped with a warning. Only a root that is not an object
 * counts as corrupt.
 */

import {
  CURRENT_SAVE_VERSION,
  STARTING_COINS,
  STARTING_FARM_SIZE,
  XP_PER_LEVEL,
} from '../game-config';
import { allCrops, createFarm, type Farm } from './farm';
import {
  createPlayer,
  experienceForLevel,
  levelForExperience,
  type Player,
} from './player';
import { getCropType, type CropCatalog } from './crop-type';

// =============================================================================
// TYPES
// =============================================================================

export interface SaveState {
  version: number;
  /** Seconds since epoch when this state was last written */
  lastSave: number;
  farm: Farm;
  player: Player;
}

export interface PlotRecord {
  x: number;
  y: number;
  crop_type: string;
  planted_at: number;
}

export interface SaveFile {
  version: number;
  last_save: number;
  farm: {
    width: number;
    height: number;
    plots: PlotRecord[];
  };
  player: {
    coins: number;
    experience: number;
    level: number;
    stats: {
      crops_planted: number;
      crops_harvested: number;
      crops_auto_harvested: number;
      coins_earned: number;
    };
  };
}

export interface DeserializeResult {
  state: SaveState;
  /** Everything that was defaulted or dropped */
  warnings: string[];
}

/**
 * Thrown when a save cannot be read at all.
 * loadGame() recovers from this; it never reaches the player as a crash.
 */
export class SaveCorruptError extends Error {
  constructor(
    message: string,
    public readonly details: { reason: string }
  ) {
    super(message);
    this.name = 'SaveCorruptError';
  }
}

// =============================================================================
// DEFAULTS
// =============================================================================

export function createDefaultSaveState(now: number): SaveState {
  return {
    version: CURRENT_SAVE_VERSION,
    lastSave: now,
    farm: createFarm(STARTING_FARM_SIZE.width, STARTING_FARM_SIZE.height),
    player: createPlayer(STARTING_COINS),
  };
}

// =============================================================================
// SERIALIZE
// =============================================================================

export function serializeSaveState(
  farm: Farm,
  player: Player,
  lastSave: number
): SaveFile {
  const plots: PlotRecord[] = [];
  for (const { x, y, crop } of allCrops(farm)) {
    plots.push({ x, y, crop_type: crop.cropTypeId, planted_at: crop.plantedAt });
  }

  return {
    version: CURRENT_SAVE_VERSION,
    last_save: lastSave,
    farm: {
      width: farm.width,
      height: farm.height,
      plots,
    },
    player: {
      coins: player.coins,
      experience: player.experience,
      level: player.level,
      stats: {
        crops_planted: player.stats.cropsPlanted,
        crops_harvested: player.stats.cropsHarvested,
        crops_auto_harvested: player.stats.cropsAutoHarvested,
        coins_earned: player.stats.coinsEarned,
      },
    },
  };
}

// =============================================================================
// DESERIALIZE
// =============================================================================

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isTimestamp(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/** Read a non-negative integer, recording a warning when it has to default */
function readCount(
  source: RawObject,
  key: string,
  fallback: number,
  label: string,
  warnings: string[]
): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (isCount(value)) return value;
  warnings.push(`${label}.${key} is invalid (${JSON.stringify(value)}), using ${fallback}`);
  return fallback;
}

/** Largest farm a save may declare */
const MAX_FARM_SIDE = 64;

function readFarmSize(raw: RawObject, key: 'width' | 'height', warnings: string[]): number {
  const fallback = STARTING_FARM_SIZE[key];
  const value = raw[key];
  if (value === undefined) return fallback;
  if (isCount(value) && value > 0 && value <= MAX_FARM_SIDE) return value;
  warnings.push(`farm.${key} is invalid (${JSON.stringify(value)}), using ${fallback}`);
  return fallback;
}

/**
 * Normalize plots to a list of raw records.
 * Accepts the array form and the older object form keyed by "x,y".
 */
function readPlotRecords(plots: unknown, warnings: string[]): RawObject[] {
  if (plots === undefined) return [];

  if (Array.isArray(plots)) {
    return plots.filter((entry, index) => {
      if (isRecord(entry)) return true;
      if (entry !== null) warnings.push(`farm.plots[${index}] is not an object, dropped`);
      return false;
    });
  }

  if (isRecord(plots)) {
    const records: RawObject[] = [];
    for (const [key, entry] of Object.entries(plots)) {
      if (entry === null) continue;
      const match = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(key);
      if (!match || !isRecord(entry)) {
        warnings.push(`farm.plots["${key}"] is not a valid plot, dropped`);
        continue;
      }
      records.push({ ...entry, x: Number(match[1]), y: Number(match[2]) });
    }
    return records;
  }

  warnings.push('farm.plots is not a list, no crops restored');
  return [];
}

function readFarm(raw: unknown, catalog: CropCatalog, warnings: string[]): Farm {
  if (raw === undefined) {
    warnings.push('farm is missing, starting with an empty farm');
  } else if (!isRecord(raw)) {
    warnings.push('farm is not an object, starting with an empty farm');
  }
  const source: RawObject = isRecord(raw) ? raw : {};

  const farm = createFarm(readFarmSize(source, 'width', warnings), readFarmSize(source, 'height', warnings));

  for (const record of readPlotRecords(source.plots, warnings)) {
    const { x, y } = record;
    const cropTypeId = record.crop_type;
    const plantedAt = record.planted_at;
    const where = `plot (${String(x)}, ${String(y)})`;

    if (!isCount(x) || !isCount(y) || x >= farm.width || y >= farm.height) {
      warnings.push(`${where} is outside the ${farm.width}x${farm.height} farm, dropped`);
      continue;
    }
    if (typeof cropTypeId !== 'string' || !getCropType(catalog, cropTypeId)) {
      warnings.push(`${where} has unknown crop type ${JSON.stringify(cropTypeId)}, dropped`);
      continue;
    }
    if (!isTimestamp(plantedAt)) {
      warnings.push(`${where} has invalid planted_at ${JSON.stringify(plantedAt)}, dropped`);
      continue;
    }
    if (farm.plots[y][x]) {
      warnings.push(`${where} appears more than once, keeping the first`);
      continue;
    }
    farm.plots[y][x] = { cropTypeId, plantedAt };
  }

  return farm;
}

function readPlayer(raw: unknown, warnings: string[]): Player {
  if (raw === undefined) {
    warnings.push('player is missing, starting with a new player');
  } else if (!isRecord(raw)) {
    warnings.push('player is not an object, starting with a new player');
  }
  const source: RawObject = isRecord(raw) ? raw : {};

  const coins = readCount(source, 'coins', STARTING_COINS, 'player', warnings);
  let experience = readCount(source, 'experience', 0, 'player', warnings);

  // Level is derived from total XP. A stored level above the derived one
  // comes from saves that kept per-level remainder XP; lift XP to match.
  const storedLevel = source.level;
  if (isCount(storedLevel) && storedLevel > levelForExperience(experience)) {
    warnings.push(
      `player.level ${storedLevel} is above what ${experience} XP gives, raising experience`
    );
    experience = experienceForLevel(storedLevel) + Math.min(experience, XP_PER_LEVEL - 1);
  }

  const player = createPlayer(coins, experience);

  const stats: RawObject = isRecord(source.stats) ? source.stats : {};
  player.stats = {
    cropsPlanted: readCount(
      stats,
      'crops_planted',
      readCount(source, 'total_crops_planted', 0, 'player', warnings),
      'player.stats',
      warnings
    ),
    cropsHarvested: readCount(
      stats,
      'crops_harvested',
      readCount(source, 'total_crops_harvested', 0, 'player', warnings),
      'player.stats',
      warnings
    ),
    cropsAutoHarvested: readCount(stats, 'crops_auto_harvested', 0, 'player.stats', warnings),
    coinsEarned: readCount(stats, 'coins_earned', 0, 'player.stats', warnings),
  };

  return player;
}

/**
 * Rebuild a SaveState from parsed JSON.
 *
 * @param raw - Parsed save file contents
 * @param catalog - Crop types plots may reference
 * @param now - Used when last_save is missing, so nothing is auto-harvested
 * @throws SaveCorruptError when `raw` is not an object
 */
export function deserializeSaveState(
  raw: unknown,
  catalog: CropCatalog,
  now: number
): DeserializeResult {
  if (!isRecord(raw)) {
    throw new SaveCorruptError('Save file root is not an object', {
      reason: raw === null ? 'null root' : `root is ${Array.isArray(raw) ? 'array' : typeof raw}`,
    });
  }

  const warnings: string[] = [];

  let version = CURRENT_SAVE_VERSION;
  if (isCount(raw.version) && raw.version > 0) {
    version = raw.version;
    if (version > CURRENT_SAVE_VERSION) {
      warnings.push(
        `save version ${version} is newer than ${CURRENT_SAVE_VERSION}, unknown fields are ignored`
      );
    }
  } else {
    warnings.push(`version is missing or invalid, assuming ${CURRENT_SAVE_VERSION}`);
  }

  let lastSave = now;
  if (isTimestamp(raw.last_save)) {
    lastSave = raw.last_save;
  } else {
    warnings.push('last_save is missing or invalid, treating the save as just written');
  }

  return {
    state: {
      version,
      lastSave,
      farm: readFarm(raw.farm, catalog, warnings),
      player: readPlayer(raw.player, warnings),
    },
    warnings,
  };
}
