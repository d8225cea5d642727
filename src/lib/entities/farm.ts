/**
 * Farm Entity
 *
 * A fixed grid of plots, each holding at most one Crop. The farm owns its
 * crops outright: a plot goes empty -> occupied only through plantCrop and
 * occupied -> empty only through harvestCrop / removeCrop.
 *
 * Operations mutate the farm in place so they can run inside an immer
 * producer (see game-store.ts) as well as on freshly loaded plain objects
 * (see reconciliation.ts).
 */

import { FarmError } from '../farm-errors';
import {
  createCrop,
  cloneCrop,
  isReady,
  getRemainingSeconds,
  type Crop,
} from './crop';
import { getCropType, type CropCatalog, type CropType } from './crop-type';

// =============================================================================
// TYPES
// =============================================================================

export interface Farm {
  width: number;
  height: number;
  /** plots[y][x]; null = empty */
  plots: (Crop | null)[][];
}

export interface PlotCoord {
  x: number;
  y: number;
}

/** An occupied plot */
export interface PlotEntry extends PlotCoord {
  crop: Crop;
}

// =============================================================================
// CREATION
// =============================================================================

export function createFarm(width: number, height: number): Farm {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Farm size must be positive integers, got ${width}x${height}`);
  }
  const plots: (Crop | null)[][] = [];
  for (let y = 0; y < height; y++) {
    plots.push(new Array<Crop | null>(width).fill(null));
  }
  return { width, height, plots };
}

export function cloneFarm(farm: Farm): Farm {
  return {
    width: farm.width,
    height: farm.height,
    plots: farm.plots.map((row) => row.map((crop) => (crop ? cloneCrop(crop) : null))),
  };
}

// =============================================================================
// QUERIES
// =============================================================================

export function isInBounds(farm: Farm, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    y >= 0 &&
    x < farm.width &&
    y < farm.height
  );
}

/** Crop at (x, y), or null when empty or outside the grid */
export function getCrop(farm: Farm, x: number, y: number): Crop | null {
  if (!isInBounds(farm, x, y)) return null;
  return farm.plots[y][x];
}

/**
 * Iterate occupied plots, row by row.
 * The set of plots is captured when this is called, so planting or
 * harvesting while iterating does not change what is yielded.
 */
export function allCrops(farm: Farm): IterableIterator<PlotEntry> {
  const entries: PlotEntry[] = [];
  for (let y = 0; y < farm.height; y++) {
    for (let x = 0; x < farm.width; x++) {
      const crop = farm.plots[y][x];
      if (crop) entries.push({ x, y, crop });
    }
  }
  return entries.values();
}

export function getReadyCrops(farm: Farm, catalog: CropCatalog, now: number): PlotEntry[] {
  return [...allCrops(farm)].filter(({ crop }) => {
    const cropType = getCropType(catalog, crop.cropTypeId);
    return cropType !== undefined && isReady(crop, cropType, now);
  });
}

export function countOccupied(farm: Farm): number {
  return [...allCrops(farm)].length;
}

// =============================================================================
// MUTATIONS
// =============================================================================

function assertInBounds(farm: Farm, x: number, y: number): void {
  if (!isInBounds(farm, x, y)) {
    throw new FarmError(
      'OutOfBounds',
      `Plot (${x}, ${y}) is outside the ${farm.width}x${farm.height} farm`,
      { x, y }
    );
  }
}

function takeCrop(farm: Farm, x: number, y: number): Crop {
  assertInBounds(farm, x, y);
  const crop = farm.plots[y][x];
  if (!crop) {
    throw new FarmError('EmptySlot', `Nothing is planted at (${x}, ${y})`, { x, y });
  }
  return crop;
}

/**
 * Plant a new crop at (x, y).
 * Throws OutOfBounds, SlotOccupied, or InvalidTimestamp.
 */
export function plantCrop(
  farm: Farm,
  x: number,
  y: number,
  cropType: CropType,
  now: number
): Crop {
  assertInBounds(farm, x, y);
  if (farm.plots[y][x]) {
    throw new FarmError('SlotOccupied', `Plot (${x}, ${y}) is already planted`, {
      x,
      y,
      cropTypeId: cropType.id,
    });
  }
  const crop = createCrop(cropType, now);
  farm.plots[y][x] = crop;
  return crop;
}

/**
 * Interactive harvest: only ready crops come out.
 * Throws OutOfBounds, EmptySlot, UnknownCropType, or CropNotReady.
 * Economic effects are the caller's job.
 */
export function harvestCrop(
  farm: Farm,
  x: number,
  y: number,
  catalog: CropCatalog,
  now: number
): Crop {
  const crop = takeCrop(farm, x, y);
  const cropType = getCropType(catalog, crop.cropTypeId);
  if (!cropType) {
    throw new FarmError('UnknownCropType', `Unknown crop type "${crop.cropTypeId}"`, {
      x,
      y,
      cropTypeId: crop.cropTypeId,
    });
  }
  if (!isReady(crop, cropType, now)) {
    const remainingSeconds = getRemainingSeconds(crop, cropType, now);
    throw new FarmError('CropNotReady', `${cropType.name} at (${x}, ${y}) is not ready yet`, {
      x,
      y,
      cropTypeId: cropType.id,
      remainingSeconds,
    });
  }
  farm.plots[y][x] = null;
  return crop;
}

/**
 * Forced removal without a readiness check (offline auto-harvest).
 * Throws OutOfBounds or EmptySlot.
 */
export function removeCrop(farm: Farm, x: number, y: number): Crop {
  const crop = takeCrop(farm, x, y);
  farm.plots[y][x] = null;
  return crop;
}
