/**
 * Farm View
 *
 * Read model for whatever draws the farm. Every value is recomputed from
 * timestamps at `now`; building a view never touches the state it reads.
 */

import {
  formatRemaining,
  getGrowthStage,
  getProgress,
  getRemainingSeconds,
  isReady,
  type GrowthStage,
} from './entities/crop';
import { getCropType, type CropCatalog, type CropType } from './entities/crop-type';
import { countOccupied, getReadyCrops, type Farm } from './entities/farm';
import {
  getLevelProgress,
  getUnlockedCropTypes,
  type LevelProgress,
  type Player,
  type PlayerStats,
} from './entities/player';

// =============================================================================
// TYPES
// =============================================================================

export interface EmptyPlotView {
  x: number;
  y: number;
  empty: true;
}

export interface PlantedPlotView {
  x: number;
  y: number;
  empty: false;
  cropTypeId: string;
  name: string;
  glyph: string;
  stage: GrowthStage;
  progress: number;
  remainingSeconds: number;
  remainingLabel: string;
  isReady: boolean;
}

export type PlotView = EmptyPlotView | PlantedPlotView;

export interface FarmView {
  width: number;
  height: number;
  /** rows[y][x] */
  rows: PlotView[][];
}

export interface PlayerView {
  coins: number;
  experience: number;
  progress: LevelProgress;
  unlocked: CropType[];
  occupiedPlots: number;
  totalPlots: number;
  readyCrops: number;
  stats: PlayerStats;
}

// =============================================================================
// BUILDERS
// =============================================================================

function buildPlotView(farm: Farm, catalog: CropCatalog, x: number, y: number, now: number): PlotView {
  const crop = farm.plots[y][x];
  const cropType = crop ? getCropType(catalog, crop.cropTypeId) : undefined;
  if (!crop || !cropType) {
    return { x, y, empty: true };
  }

  const remainingSeconds = getRemainingSeconds(crop, cropType, now);
  return {
    x,
    y,
    empty: false,
    cropTypeId: cropType.id,
    name: cropType.name,
    glyph: cropType.glyph,
    stage: getGrowthStage(crop, cropType, now),
    progress: getProgress(crop, cropType, now),
    remainingSeconds,
    remainingLabel: formatRemaining(remainingSeconds),
    isReady: isReady(crop, cropType, now),
  };
}

export function buildFarmView(farm: Farm, catalog: CropCatalog, now: number): FarmView {
  const rows: PlotView[][] = [];
  for (let y = 0; y < farm.height; y++) {
    const row: PlotView[] = [];
    for (let x = 0; x < farm.width; x++) {
      row.push(buildPlotView(farm, catalog, x, y, now));
    }
    rows.push(row);
  }
  return { width: farm.width, height: farm.height, rows };
}

export function buildPlayerView(
  player: Player,
  catalog: CropCatalog,
  farm: Farm,
  now: number
): PlayerView {
  return {
    coins: player.coins,
    experience: player.experience,
    progress: getLevelProgress(player),
    unlocked: getUnlockedCropTypes(catalog, player.level),
    occupiedPlots: countOccupied(farm),
    totalPlots: farm.width * farm.height,
    readyCrops: getReadyCrops(farm, catalog, now).length,
    stats: { ...player.stats },
  };
}
