/**
 * Game event logging for load, reconciliation and save operations.
 *
 * Logs to <logDir>/events.jsonl in JSONL format (one JSON object per line),
 * so a session can be reconstructed with nothing more than `jq`.
 */

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { LOG_FILE_NAME } from './game-config';

/**
 * Log event types for game operations.
 */
export type LogEvent =
  | {
      event: 'load';
      source: 'new' | 'save' | 'recovered';
      lastSave: number;
      plots: number;
      durationMs: number;
    }
  | {
      event: 'load_warning';
      warning: string;
    }
  | {
      event: 'config_warning';
      warning: string;
    }
  | {
      event: 'reconciliation';
      elapsedSeconds: number;
      offlineSeconds: number;
      autoHarvested: number;
      coins: number;
      xp: number;
      clockRolledBack: boolean;
    }
  | {
      event: 'save';
      lastSave: number;
      plots: number;
      reason: 'auto' | 'manual' | 'shutdown' | 'load';
    }
  | {
      event: 'save_corrupt';
      reason: string;
      quarantinedTo: string | null;
    }
  | {
      event: 'error';
      operation: string;
      error: string;
      stack?: string;
    };

/** Receives every event; components take one of these instead of writing files */
export type GameLogger = (event: LogEvent) => void;

/**
 * Create a logger appending to <logDir>/events.jsonl. The directory is
 * created up front; a logger that cannot write reports to the console.
 */
export function createFileLogger(logDir: string): GameLogger {
  const logFile = join(logDir, LOG_FILE_NAME);
  const reportFailure = (e: unknown) => console.error('[game-logger] Failed to write log:', e);

  try {
    if (!existsSync(logDir)) mkdirSync(logDir, { recursive: true });
  } catch (e) {
    reportFailure(e);
  }

  return (event) => {
    const line = JSON.stringify({ ...event, timestamp: new Date().toISOString() });
    try {
      appendFileSync(logFile, line + '\n');
    } catch (e) {
      reportFailure(e);
    }
  };
}

/** Discards everything (dry runs, tests that don't inspect logs) */
export const silentLogger: GameLogger = () => {};

/** Shape an unknown thrown value into an `error` event */
export function errorEvent(operation: string, error: unknown): LogEvent {
  return {
    event: 'error',
    operation,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
