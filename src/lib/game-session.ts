/**
 * Game Session
 *
 * Lifecycle of one play session:
 *   start: load + reconcile -> bank the result with an immediate save -> timers
 *   play:  plant / harvest through the store, view() for rendering
 *   stop:  clear timers -> final save
 *
 * Saves never overlap: each one waits for the previous to settle, and each
 * reads the store when it runs, so it always writes one consistent state.
 * Timers only read the store or queue a save; mutations happen in the
 * caller's own turn of the event loop.
 */

import { AUTO_SAVE_INTERVAL_MS, GROWTH_REFRESH_INTERVAL_MS } from './game-config';
import type { CropCatalog } from './entities/crop-type';
import { buildFarmView, buildPlayerView, type FarmView, type PlayerView } from './farm-view';
import { errorEvent, type GameLogger } from './game-logger';
import {
  createGameStore,
  type ActionResult,
  type GameStoreApi,
  type HarvestOutcome,
  type PlantOutcome,
} from './game-store';
import { loadGame, saveGame, type LoadResult, type SaveReason } from './persistence';
import type { ReconcileOptions } from './reconciliation';
import type { SaveStorageAdapter } from './save-storage';

// =============================================================================
// TYPES
// =============================================================================

/** Seconds since epoch */
export type GameClock = () => number;

export interface SessionView {
  now: number;
  farm: FarmView;
  player: PlayerView;
}

export type AutoSaveResult = { ok: true; lastSave: number } | { ok: false; error: unknown };

export interface GameSessionOptions {
  storage: SaveStorageAdapter;
  catalog: CropCatalog;
  logger: GameLogger;
  clock?: GameClock;
  autoSaveIntervalMs?: number;
  refreshIntervalMs?: number;
  /** Called on every refresh tick with a fresh view */
  onRefresh?: (view: SessionView) => void;
  /** Called after every auto-save attempt */
  onAutoSave?: (result: AutoSaveResult) => void;
  reconcile?: ReconcileOptions;
}

export const systemClock: GameClock = () => Date.now() / 1000;

// =============================================================================
// SESSION
// =============================================================================

export class GameSession {
  private saveQueue: Promise<void> = Promise.resolve();
  private timers: ReturnType<typeof setInterval>[] = [];
  private stopping: Promise<void> | null = null;

  private constructor(
    readonly store: GameStoreApi,
    readonly loaded: LoadResult,
    private readonly options: GameSessionOptions,
    private readonly clock: GameClock
  ) {}

  /**
   * Load the game, reconcile offline time, save, and start the timers.
   * Rejects if the first save cannot be written.
   */
  static async start(options: GameSessionOptions): Promise<GameSession> {
    const clock = options.clock ?? systemClock;
    const loaded = await loadGame(
      options.storage,
      options.catalog,
      clock(),
      options.logger,
      options.reconcile
    );

    const session = new GameSession(
      createGameStore(loaded.state, options.catalog),
      loaded,
      options,
      clock
    );
    await session.save('load');
    session.startTimers();
    return session;
  }

  get isStopped(): boolean {
    return this.stopping !== null;
  }

  // ----- Play -----

  plant(x: number, y: number, cropTypeId: string): ActionResult<PlantOutcome> {
    this.assertRunning();
    return this.store.getState().plant(x, y, cropTypeId, this.clock());
  }

  harvest(x: number, y: number): ActionResult<HarvestOutcome> {
    this.assertRunning();
    return this.store.getState().harvest(x, y, this.clock());
  }

  harvestAllReady(): HarvestOutcome[] {
    this.assertRunning();
    return this.store.getState().harvestAllReady(this.clock());
  }

  view(): SessionView {
    const now = this.clock();
    const { farm, player } = this.store.getState();
    return {
      now,
      farm: buildFarmView(farm, this.options.catalog, now),
      player: buildPlayerView(player, this.options.catalog, farm, now),
    };
  }

  // ----- Saving -----

  saveNow(): Promise<void> {
    this.assertRunning();
    return this.save('manual');
  }

  /** Resolves once every queued save has settled */
  idle(): Promise<void> {
    return this.saveQueue;
  }

  /**
   * Stop the timers and write the final save. Safe to call more than once;
   * later calls return the same promise.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.stopping = this.save('shutdown');
    return this.stopping;
  }

  // ----- Internals -----

  private assertRunning(): void {
    if (this.stopping) {
      throw new Error('Game session has stopped');
    }
  }

  private save(reason: SaveReason): Promise<void> {
    const run = async (): Promise<void> => {
      const now = this.clock();
      const { farm, player } = this.store.getState();
      await saveGame(this.options.storage, { farm, player }, now, this.options.logger, reason);
      this.store.getState().markSaved(now);
    };

    const next = this.saveQueue.then(run);
    // The caller gets the failure through `next`; the queue itself keeps going
    this.saveQueue = next.catch(() => undefined);
    return next;
  }

  private autoSave(): void {
    const { onAutoSave } = this.options;
    this.save('auto')
      .then(
        () => onAutoSave?.({ ok: true, lastSave: this.store.getState().lastSave }),
        // saveGame has already logged the failure
        (error: unknown) => onAutoSave?.({ ok: false, error })
      )
      .catch((e: unknown) => this.options.logger(errorEvent('onAutoSave', e)));
  }

  private startTimers(): void {
    const autoSaveMs = this.options.autoSaveIntervalMs ?? AUTO_SAVE_INTERVAL_MS;
    this.timers.push(setInterval(() => this.autoSave(), autoSaveMs));

    const { onRefresh } = this.options;
    if (onRefresh) {
      const refreshMs = this.options.refreshIntervalMs ?? GROWTH_REFRESH_INTERVAL_MS;
      this.timers.push(setInterval(() => onRefresh(this.view()), refreshMs));
    }
  }
}
