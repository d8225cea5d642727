/**
 * Save Storage
 *
 * Abstracts where the save file lives behind an adapter, so the
 * persistence engine never touches paths.
 *
 * File layout:
 *   <saveDir>/
 *     savegame.json                  - Current save
 *     savegame.json.tmp              - In-flight write (renamed over savegame.json)
 *     savegame.corrupt-<ms>.json     - Unreadable saves set aside on load
 *
 * A save is a full overwrite. The new contents go to the temp file first
 * and replace the old file with a single rename, so an interrupted write
 * leaves the previous save intact.
 */

import {
  readFileSync,
  writeFileSync,
  renameSync,
  existsSync,
  mkdirSync,
  readdirSync,
  unlinkSync,
} from 'fs';
import { join } from 'path';
import { MAX_QUARANTINED_SAVES, SAVE_FILE_NAME } from './game-config';

// ============================================
// Types
// ============================================

export interface SaveStorageAdapter {
  /** Raw save contents, or null when there is no save yet */
  readSave(): Promise<string | null>;
  /** Replace the save atomically */
  writeSave(contents: string): Promise<void>;
  /**
   * Move the current save out of the way after it failed to load.
   * Returns where it went, or null if there was nothing to move.
   */
  quarantineSave(): Promise<string | null>;
}

// ============================================
// File Storage Implementation
// ============================================

const QUARANTINE_PATTERN = /^savegame\.corrupt-(\d+)\.json$/;

/**
 * Keep only the newest MAX_QUARANTINED_SAVES corrupt saves.
 */
function pruneQuarantine(saveDir: string): void {
  const quarantined = readdirSync(saveDir)
    .map((name) => {
      const match = QUARANTINE_PATTERN.exec(name);
      return match ? { name, at: Number(match[1]) } : null;
    })
    .filter((entry): entry is { name: string; at: number } => entry !== null)
    .sort((a, b) => b.at - a.at);

  for (const stale of quarantined.slice(MAX_QUARANTINED_SAVES)) {
    unlinkSync(join(saveDir, stale.name));
  }
}

export function createFileSaveStorage(saveDir: string): SaveStorageAdapter {
  const savePath = join(saveDir, SAVE_FILE_NAME);
  const tempPath = `${savePath}.tmp`;

  function ensureDir(): void {
    if (!existsSync(saveDir)) {
      mkdirSync(saveDir, { recursive: true });
    }
  }

  return {
    async readSave(): Promise<string | null> {
      if (!existsSync(savePath)) return null;
      return readFileSync(savePath, 'utf-8');
    },

    async writeSave(contents: string): Promise<void> {
      ensureDir();
      writeFileSync(tempPath, contents);
      renameSync(tempPath, savePath);
    },

    async quarantineSave(): Promise<string | null> {
      if (!existsSync(savePath)) return null;
      let target = join(saveDir, `savegame.corrupt-${Date.now()}.json`);
      // Two quarantines in the same millisecond must not overwrite each other
      for (let n = 1; existsSync(target); n++) {
        target = join(saveDir, `savegame.corrupt-${Date.now() + n}.json`);
      }
      renameSync(savePath, target);
      pruneQuarantine(saveDir);
      return target;
    },
  };
}

// ============================================
// In-Memory Implementation
// ============================================

export interface MemorySaveStorage extends SaveStorageAdapter {
  /** Current contents, for inspection */
  readonly contents: string | null;
  /** Contents set aside by quarantineSave */
  readonly quarantined: string[];
  /** Number of completed writes */
  readonly writeCount: number;
}

/**
 * Save storage held in memory. Used for dry runs and tests.
 */
export function createMemorySaveStorage(initial: string | null = null): MemorySaveStorage {
  let contents = initial;
  let writeCount = 0;
  const quarantined: string[] = [];

  return {
    get contents() {
      return contents;
    },
    get quarantined() {
      return quarantined;
    },
    get writeCount() {
      return writeCount;
    },

    async readSave() {
      return contents;
    },

    async writeSave(next: string) {
      contents = next;
      writeCount++;
    },

    async quarantineSave() {
      if (contents === null) return null;
      quarantined.push(contents);
      contents = null;
      return `memory:quarantine/${quarantined.length}`;
    },
  };
}
