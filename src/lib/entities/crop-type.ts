/**
 * Crop Type Entity
 *
 * Static definition of a plantable crop: how long it grows, what it costs
 * and what it pays. Loaded once at startup from the crop table and never
 * mutated at runtime.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface CropType {
  /** Stable key referenced by saves (e.g., "RADISH") */
  id: string;

  /** Display name (e.g., "Radish") */
  name: string;

  /** Single glyph shown in a plot */
  glyph: string;

  /** Seconds from planting until ready. Always > 0. */
  growthSeconds: number;

  /** Coins spent to plant */
  seedCost: number;

  /** Coins paid for an interactive harvest */
  sellPrice: number;

  /** Experience granted per harvest, interactive or offline */
  xpReward: number;

  /** Minimum player level to plant */
  unlockLevel: number;
}

/** Crop types keyed by id */
export type CropCatalog = Record<string, CropType>;

export interface CropCatalogValidation {
  catalog: CropCatalog;
  /** Soft problems (e.g., a crop that sells below its seed cost) */
  warnings: string[];
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Thrown when the crop table breaks a rule.
 * Fatal at startup: the game refuses to launch and reports `rule`.
 */
export class ConfigInvalidError extends Error {
  constructor(
    message: string,
    public readonly details: {
      rule: string;
      cropTypeId?: string;
      index?: number;
    }
  ) {
    super(message);
    this.name = 'ConfigInvalidError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function invalidEntry(id: string, index: number, rule: string, message: string): never {
  throw new ConfigInvalidError(`Crop "${id}": ${message}`, { rule, cropTypeId: id, index });
}

/**
 * Validate a raw crop table (parsed JSON) and build the catalog.
 *
 * Throws ConfigInvalidError on the first broken rule. Never patches
 * values: a bad table means the game does not start.
 */
export function validateCropCatalog(raw: unknown): CropCatalogValidation {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigInvalidError('Crop table must be a non-empty array', {
      rule: 'table-non-empty',
    });
  }

  const entries = new Map<string, CropType>();
  const warnings: string[] = [];

  raw.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new ConfigInvalidError(`Crop table entry ${index} is not an object`, {
        rule: 'entry-object',
        index,
      });
    }

    const { id, name, glyph, growthSeconds, seedCost, sellPrice, xpReward, unlockLevel } = entry;

    if (!isNonEmptyString(id)) {
      throw new ConfigInvalidError(`Crop table entry ${index} has no id`, {
        rule: 'id-required',
        index,
      });
    }
    if (entries.has(id)) invalidEntry(id, index, 'id-unique', 'duplicate id');
    if (!isNonEmptyString(name)) invalidEntry(id, index, 'name-required', 'name must be a non-empty string');
    if (!isNonEmptyString(glyph)) invalidEntry(id, index, 'glyph-required', 'glyph must be a non-empty string');
    if (typeof growthSeconds !== 'number' || !Number.isFinite(growthSeconds) || growthSeconds <= 0) {
      invalidEntry(id, index, 'growth-positive', 'growthSeconds must be a positive number');
    }
    if (!isPositiveInteger(seedCost)) {
      invalidEntry(id, index, 'seed-cost-positive', 'seedCost must be a positive integer');
    }
    if (!isPositiveInteger(sellPrice)) {
      invalidEntry(id, index, 'sell-price-positive', 'sellPrice must be a positive integer');
    }
    if (typeof xpReward !== 'number' || !Number.isInteger(xpReward) || xpReward < 0) {
      invalidEntry(id, index, 'xp-non-negative', 'xpReward must be a non-negative integer');
    }
    if (!isPositiveInteger(unlockLevel)) {
      invalidEntry(id, index, 'unlock-level-min', 'unlockLevel must be an integer >= 1');
    }

    const cropType: CropType = {
      id,
      name,
      glyph,
      growthSeconds,
      seedCost,
      sellPrice,
      xpReward,
      unlockLevel,
    };

    if (cropType.sellPrice < cropType.seedCost) {
      warnings.push(
        `Crop "${id}" sells for ${cropType.sellPrice} but costs ${cropType.seedCost} to plant`
      );
    }

    entries.set(id, cropType);
  });

  if (![...entries.values()].some((c) => c.unlockLevel === 1)) {
    throw new ConfigInvalidError('No crop is plantable at level 1', {
      rule: 'starter-crop',
    });
  }

  return { catalog: Object.fromEntries(entries), warnings };
}

// =============================================================================
// HELPERS
// =============================================================================

/** Own entries only: ids such as "toString" or "__proto__" are not crop types */
export function getCropType(catalog: CropCatalog, id: string): CropType | undefined {
  return Object.hasOwn(catalog, id) ? catalog[id] : undefined;
}

export function getProfit(cropType: CropType): number {
  return cropType.sellPrice - cropType.seedCost;
}

/** Crop types ordered by unlock level, then growth time (shop order) */
export function sortCropTypes(catalog: CropCatalog): CropType[] {
  return Object.values(catalog).sort(
    (a, b) => a.unlockLevel - b.unlockLevel || a.growthSeconds - b.growthSeconds
  );
}
