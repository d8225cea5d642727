/**
 * Crop Catalog
 *
 * Loads the crop table and validates it. The bundled table lives in
 * data/crop-types.json; a replacement file can be supplied through
 * HARVEST_CLOCK_CROPS (see game-config.ts).
 *
 * Any rule violation throws ConfigInvalidError. Callers must treat that as
 * fatal and refuse to start.
 */

import { readFileSync } from 'fs';
import cropTypesData from '@/data/crop-types.json';
import {
  ConfigInvalidError,
  validateCropCatalog,
  type CropCatalogValidation,
} from './entities/crop-type';

/** Validate the bundled crop table */
export function loadBundledCropCatalog(): CropCatalogValidation {
  return validateCropCatalog(cropTypesData);
}

/** Read and validate a crop table from a JSON file */
export function loadCropCatalogFile(path: string): CropCatalogValidation {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigInvalidError(
      `Could not read crop table ${path}: ${e instanceof Error ? e.message : String(e)}`,
      { rule: 'table-readable' }
    );
  }
  return validateCropCatalog(raw);
}

/** Pick the configured table: a file when one is set, otherwise the bundled one */
export function loadCropCatalog(cropTablePath: string | null): CropCatalogValidation {
  return cropTablePath ? loadCropCatalogFile(cropTablePath) : loadBundledCropCatalog();
}
