/**
 * Crop Entity
 *
 * A seed planted in one plot. Only the planting time is stored; everything
 * else (progress, readiness, time left) is derived from it and the crop
 * type on demand, so a crop never needs a tick to grow.
 *
 * All timestamps are seconds since the Unix epoch.
 */

import { FarmError } from '../farm-errors';
import type { CropType } from './crop-type';

// =============================================================================
// TYPES
// =============================================================================

export interface Crop {
  /** Reference to CropType.id */
  cropTypeId: string;
  /** When the seed went in (seconds since epoch, >= 0) */
  plantedAt: number;
}

export type GrowthStage = 'planted' | 'sprouting' | 'growing' | 'flowering' | 'ready';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Progress below which each stage applies; anything short of ready is flowering */
const STAGE_THRESHOLDS: ReadonlyArray<[number, GrowthStage]> = [
  [0.2, 'planted'],
  [0.4, 'sprouting'],
  [0.6, 'growing'],
];

export const PROGRESS_BAR_WIDTH = 8;

// =============================================================================
// CREATION
// =============================================================================

/**
 * Plant a crop at `now`.
 * Throws FarmError('InvalidTimestamp') for negative or non-finite times.
 */
export function createCrop(cropType: CropType, now: number): Crop {
  if (!Number.isFinite(now) || now < 0) {
    throw new FarmError('InvalidTimestamp', `Invalid planting time: ${now}`, {
      timestamp: now,
      cropTypeId: cropType.id,
    });
  }
  return {
    cropTypeId: cropType.id,
    plantedAt: now,
  };
}

export function cloneCrop(crop: Crop): Crop {
  return { ...crop };
}

// =============================================================================
// TEMPORAL STATE (pure)
// =============================================================================

/** Seconds since planting. Negative if the clock was wound back. */
export function getElapsedSeconds(crop: Crop, now: number): number {
  return now - crop.plantedAt;
}

/** When this crop becomes ready */
export function getReadyAt(crop: Crop, cropType: CropType): number {
  return crop.plantedAt + cropType.growthSeconds;
}

/** Growth fraction in [0, 1], non-decreasing in `now` */
export function getProgress(crop: Crop, cropType: CropType, now: number): number {
  const elapsed = getElapsedSeconds(crop, now);
  return Math.min(1, Math.max(0, elapsed / cropType.growthSeconds));
}

/** Once true for some `now`, true for every later `now` */
export function isReady(crop: Crop, cropType: CropType, now: number): boolean {
  return getElapsedSeconds(crop, now) >= cropType.growthSeconds;
}

export function getRemainingSeconds(crop: Crop, cropType: CropType, now: number): number {
  const remaining = cropType.growthSeconds - getElapsedSeconds(crop, now);
  return Math.min(cropType.growthSeconds, Math.max(0, remaining));
}

export function getGrowthStage(crop: Crop, cropType: CropType, now: number): GrowthStage {
  if (isReady(crop, cropType, now)) return 'ready';
  const progress = getProgress(crop, cropType, now);
  for (const [limit, stage] of STAGE_THRESHOLDS) {
    if (progress < limit) return stage;
  }
  return 'flowering';
}

// =============================================================================
// DISPLAY
// =============================================================================

/**
 * Compact time-left label: "Ready!", "45s", "2m 15s", "2m", "1h 5m", "1h".
 * Fractional seconds round up so a crop never reads "0s" while still growing.
 */
export function formatRemaining(remainingSeconds: number): string {
  if (remainingSeconds <= 0) return 'Ready!';

  const total = Math.ceil(remainingSeconds);
  if (total < 60) return `${total}s`;

  if (total < 3600) {
    const minutes = Math.floor(total / 60);
    const seconds = total % 60;
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}

/** e.g. "███░░░░░" for 0.4 */
export function renderProgressBar(progress: number, width: number = PROGRESS_BAR_WIDTH): string {
  const clamped = Math.min(1, Math.max(0, progress));
  const filled = Math.floor(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
