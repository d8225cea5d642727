/**
 * Duration Formatting
 *
 * Human-readable text for the welcome-back summary shown after offline
 * reconciliation. Short crop timers use formatRemaining (entities/crop.ts);
 * this module covers the longer "you were away for ..." spans.
 */

import { formatDuration, secondsToHours, secondsToMinutes, type Duration } from 'date-fns';
import { getCropType, type CropCatalog } from './entities/crop-type';
import type { ReconciliationSummary } from './reconciliation';

// =============================================================================
// DURATIONS
// =============================================================================

/**
 * "1 hour 5 minutes", "2 minutes 30 seconds", "45 seconds".
 * Seconds are dropped once the span reaches an hour.
 */
export function formatAwayDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  if (seconds === 0) {
    return formatDuration({ seconds: 0 }, { zero: true });
  }

  const hours = secondsToHours(seconds);
  const minutes = secondsToMinutes(seconds) - hours * 60;
  const remainder = seconds - secondsToMinutes(seconds) * 60;

  const duration: Duration = hours > 0 ? { hours, minutes } : { minutes, seconds: remainder };
  return formatDuration(duration);
}

// =============================================================================
// WELCOME BACK
// =============================================================================

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Lines describing what happened while the player was away.
 * Empty when no time passed and nothing was harvested.
 */
export function formatWelcomeBack(summary: ReconciliationSummary, catalog: CropCatalog): string[] {
  if (summary.clockRolledBack) {
    return ['The clock is behind your last save; nothing was harvested while you were away.'];
  }
  if (summary.offlineSeconds === 0 && summary.autoHarvested.length === 0) {
    return [];
  }

  const away = formatAwayDuration(summary.offlineSeconds);
  if (summary.autoHarvested.length === 0) {
    return [`Welcome back! You were away for ${away}. Nothing was ready to harvest.`];
  }

  const lines = [
    `Welcome back! You were away for ${away}.`,
    `Auto-harvested ${plural(summary.autoHarvested.length, 'crop')} for ${summary.totalCoins} coins and ${summary.totalXp} XP:`,
  ];

  const counts = new Map<string, { glyph: string; name: string; count: number; coins: number }>();
  for (const entry of summary.autoHarvested) {
    const group = counts.get(entry.cropTypeId);
    if (group) {
      group.count += 1;
      group.coins += entry.coins;
    } else {
      counts.set(entry.cropTypeId, {
        glyph: entry.glyph,
        name: entry.name,
        count: 1,
        coins: entry.coins,
      });
    }
  }
  for (const group of counts.values()) {
    lines.push(`  ${group.glyph} ${group.name} x${group.count} (+${group.coins} coins)`);
  }

  if (summary.levelsGained > 0) {
    lines.push(`Level up! +${plural(summary.levelsGained, 'level')}`);
  }
  if (summary.newlyUnlocked.length > 0) {
    const names = summary.newlyUnlocked.map((id) => getCropType(catalog, id)?.name ?? id);
    lines.push(`New seeds unlocked: ${names.join(', ')}`);
  }

  return lines;
}
