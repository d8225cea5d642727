/**
 * Entities Module
 *
 * Canonical types for the farm model.
 * One entity = one file = one type.
 *
 * Import from here:
 *   import { type Farm, plantCrop, earn } from '@/lib/entities';
 */

// Crop type entity (static config)
export type { CropType, CropCatalog, CropCatalogValidation } from './crop-type';
export {
  ConfigInvalidError,
  validateCropCatalog,
  getCropType,
  getProfit,
  sortCropTypes,
} from './crop-type';

// Crop entity
export type { Crop, GrowthStage } from './crop';
export {
  PROGRESS_BAR_WIDTH,
  createCrop,
  cloneCrop,
  getElapsedSeconds,
  getReadyAt,
  getProgress,
  isReady,
  getRemainingSeconds,
  getGrowthStage,
  formatRemaining,
  renderProgressBar,
} from './crop';

// Farm entity
export type { Farm, PlotCoord, PlotEntry } from './farm';
export {
  createFarm,
  cloneFarm,
  isInBounds,
  getCrop,
  allCrops,
  getReadyCrops,
  countOccupied,
  plantCrop,
  harvestCrop,
  removeCrop,
} from './farm';

// Player entity
export type { Player, PlayerStats, LevelProgress } from './player';
export {
  createPlayer,
  createPlayerStats,
  levelForExperience,
  experienceForLevel,
  getLevelProgress,
  isCropUnlocked,
  getUnlockedCropTypes,
  getNewlyUnlocked,
  spendCoins,
  earn,
} from './player';

// Save state entity
export type { SaveState, SaveFile, PlotRecord, DeserializeResult } from './save-state';
export {
  SaveCorruptError,
  createDefaultSaveState,
  serializeSaveState,
  deserializeSaveState,
} from './save-state';
