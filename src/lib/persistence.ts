/**
 * Persistence Engine
 *
 * load: read save -> rebuild Farm + Player -> reconcile offline time.
 * save: snapshot Farm + Player + now -> full overwrite through the adapter.
 *
 * A save that cannot be read is set aside and replaced by a fresh game;
 * loading never fails because of the save file.
 */

import type { CropCatalog } from './entities/crop-type';
import { countOccupied, type Farm } from './entities/farm';
import type { Player } from './entities/player';
import {
  SaveCorruptError,
  createDefaultSaveState,
  deserializeSaveState,
  serializeSaveState,
  type SaveState,
} from './entities/save-state';
import { errorEvent, type GameLogger, type LogEvent } from './game-logger';
import { reconcile, type ReconcileOptions, type ReconciliationSummary } from './reconciliation';
import type { SaveStorageAdapter } from './save-storage';

// =============================================================================
// TYPES
// =============================================================================

export type LoadSource = 'new' | 'save' | 'recovered';

export interface LoadResult {
  /** Reconciled state; state.lastSave equals `now` unless the clock went back */
  state: SaveState;
  summary: ReconciliationSummary;
  source: LoadSource;
  /** Fields that were defaulted or plots that were dropped */
  warnings: string[];
}

export type SaveReason = Extract<LogEvent, { event: 'save' }>['reason'];

// =============================================================================
// LOAD
// =============================================================================

interface ParsedSave {
  state: SaveState;
  warnings: string[];
}

function parseSave(contents: string, catalog: CropCatalog, now: number): ParsedSave {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (e) {
    throw new SaveCorruptError('Save file is not valid JSON', {
      reason: describe(e),
    });
  }
  return deserializeSaveState(raw, catalog, now);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** An unreadable file is as good as a corrupt one */
async function readSaveContents(storage: SaveStorageAdapter): Promise<string | null> {
  try {
    return await storage.readSave();
  } catch (e) {
    throw new SaveCorruptError('Save file could not be read', { reason: describe(e) });
  }
}

/** Set the bad save aside; failing to do so is logged, not fatal */
async function quarantine(storage: SaveStorageAdapter, logger: GameLogger): Promise<string | null> {
  try {
    return await storage.quarantineSave();
  } catch (e) {
    logger(errorEvent('quarantine', e));
    return null;
  }
}

/**
 * Load the game and resolve time spent away.
 *
 * @param now - Seconds since epoch
 */
export async function loadGame(
  storage: SaveStorageAdapter,
  catalog: CropCatalog,
  now: number,
  logger: GameLogger,
  options: ReconcileOptions = {}
): Promise<LoadResult> {
  const start = Date.now();
  let source: LoadSource = 'new';
  let parsed: ParsedSave = { state: createDefaultSaveState(now), warnings: [] };

  try {
    const contents = await readSaveContents(storage);
    if (contents !== null) {
      parsed = parseSave(contents, catalog, now);
      source = 'save';
    }
  } catch (e) {
    if (!(e instanceof SaveCorruptError)) throw e;
    const quarantinedTo = await quarantine(storage, logger);
    logger({ event: 'save_corrupt', reason: e.details.reason, quarantinedTo });
    source = 'recovered';
  }

  for (const warning of parsed.warnings) {
    logger({ event: 'load_warning', warning });
  }

  const { state } = parsed;
  const summary = reconcile(state, catalog, now, options);

  logger({
    event: 'load',
    source,
    lastSave: summary.lastSave,
    plots: countOccupied(state.farm),
    durationMs: Date.now() - start,
  });
  logger({
    event: 'reconciliation',
    elapsedSeconds: summary.elapsedSeconds,
    offlineSeconds: summary.offlineSeconds,
    autoHarvested: summary.autoHarvested.length,
    coins: summary.totalCoins,
    xp: summary.totalXp,
    clockRolledBack: summary.clockRolledBack,
  });

  return { state, summary, source, warnings: parsed.warnings };
}

// =============================================================================
// SAVE
// =============================================================================

/**
 * Write Farm + Player with `now` as last_save.
 *
 * The state is serialized before anything is awaited, so what lands on disk
 * is exactly the state at call time. Write failures are logged and
 * re-thrown.
 */
export async function saveGame(
  storage: SaveStorageAdapter,
  snapshot: { farm: Farm; player: Player },
  now: number,
  logger: GameLogger,
  reason: SaveReason = 'manual'
): Promise<void> {
  const saveFile = serializeSaveState(snapshot.farm, snapshot.player, now);
  const contents = JSON.stringify(saveFile, null, 2) + '\n';
  const plots = countOccupied(snapshot.farm);

  try {
    await storage.writeSave(contents);
  } catch (e) {
    logger(errorEvent(`save:${reason}`, e));
    throw e;
  }

  logger({ event: 'save', lastSave: now, plots, reason });
}
