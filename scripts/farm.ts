/**
 * Play the farm in a terminal.
 *
 *   npm run farm
 *
 * Saves to $HARVEST_CLOCK_HOME (default ~/.harvest-clock).
 */

import { createInterface } from 'readline';
import { resolveGamePaths } from '../src/lib/game-config';
import { loadCropCatalog } from '../src/lib/crop-catalog';
import {
  ConfigInvalidError,
  formatRemaining,
  renderProgressBar,
  sortCropTypes,
  type CropCatalog,
} from '../src/lib/entities';
import { formatWelcomeBack } from '../src/lib/duration-format';
import { HELP_LINES, parseFarmCommand, type FarmCommand } from '../src/lib/farm-commands';
import type { FarmView, PlantedPlotView, PlotView } from '../src/lib/farm-view';
import { createFileLogger, errorEvent, type GameLogger } from '../src/lib/game-logger';
import { GameSession } from '../src/lib/game-session';
import type { HarvestOutcome } from '../src/lib/game-store';
import { createFileSaveStorage } from '../src/lib/save-storage';

const EMPTY_PLOT = '🟫';
const SEEDLING = '🌱';
const LEAFY = '🌿';

function loadCatalogOrExit(cropTablePath: string | null, logger: GameLogger): CropCatalog {
  try {
    const { catalog, warnings } = loadCropCatalog(cropTablePath);
    for (const warning of warnings) {
      logger({ event: 'config_warning', warning });
      console.warn(`Warning: ${warning}`);
    }
    return catalog;
  } catch (e) {
    if (e instanceof ConfigInvalidError) {
      console.error(`Crop table is invalid [${e.details.rule}]: ${e.message}`);
      process.exit(1);
    }
    throw e;
  }
}

function plotGlyph(plot: PlotView): string {
  if (plot.empty) return EMPTY_PLOT;
  if (plot.isReady) return plot.glyph;
  return plot.stage === 'planted' || plot.stage === 'sprouting' ? SEEDLING : LEAFY;
}

function renderFarm(farm: FarmView): string[] {
  const header = '   ' + Array.from({ length: farm.width }, (_, x) => String(x).padEnd(3)).join('');
  const lines = [header];
  for (const [y, row] of farm.rows.entries()) {
    lines.push(`${String(y).padEnd(3)}${row.map((plot) => `${plotGlyph(plot)} `).join('')}`);
  }

  const planted = farm.rows.flat().filter((plot): plot is PlantedPlotView => !plot.empty);
  for (const plot of planted) {
    lines.push(
      `  (${plot.x}, ${plot.y}) ${plot.name.padEnd(8)} ${renderProgressBar(plot.progress)} ${plot.remainingLabel}`
    );
  }
  return lines;
}

function describeHarvest(outcome: HarvestOutcome): string[] {
  const lines = [
    `Harvested ${outcome.cropType.glyph} ${outcome.cropType.name} at (${outcome.x}, ${outcome.y}): +${outcome.coins} coins, +${outcome.xp} XP`,
  ];
  if (outcome.levelsGained > 0) {
    lines.push(`Level up! +${outcome.levelsGained}`);
  }
  if (outcome.newlyUnlocked.length > 0) {
    lines.push(`New seeds unlocked: ${outcome.newlyUnlocked.map((c) => c.name).join(', ')}`);
  }
  return lines;
}

async function runCommand(
  session: GameSession,
  catalog: CropCatalog,
  command: FarmCommand
): Promise<string[]> {
  switch (command.type) {
    case 'empty':
      return [];
    case 'help':
      return [...HELP_LINES];
    case 'look':
      return renderFarm(session.view().farm);
    case 'seeds': {
      const { player } = session.view();
      return sortCropTypes(catalog).map((cropType) => {
        const locked = cropType.unlockLevel > player.progress.level;
        const status = locked ? `unlocks at level ${cropType.unlockLevel}` : 'available';
        return `${cropType.glyph} ${cropType.id.padEnd(8)} cost ${cropType.seedCost}, sells ${cropType.sellPrice}, ${formatRemaining(cropType.growthSeconds)} (${status})`;
      });
    }
    case 'stats': {
      const { player } = session.view();
      return [
        `Coins: ${player.coins}`,
        `Level ${player.progress.level} (${player.progress.current}/${player.progress.needed} XP)`,
        `Plots: ${player.occupiedPlots}/${player.totalPlots} planted, ${player.readyCrops} ready`,
        `Planted ${player.stats.cropsPlanted}, harvested ${player.stats.cropsHarvested}, auto-harvested ${player.stats.cropsAutoHarvested}`,
        `Coins earned: ${player.stats.coinsEarned}`,
      ];
    }
    case 'plant': {
      const result = session.plant(command.x, command.y, command.cropTypeId);
      if (!result.ok) return [result.error.message];
      const { cropType, x, y, coinsSpent } = result.value;
      return [
        `Planted ${cropType.glyph} ${cropType.name} at (${x}, ${y}) for ${coinsSpent} coins, ready in ${formatRemaining(cropType.growthSeconds)}`,
      ];
    }
    case 'harvest': {
      const result = session.harvest(command.x, command.y);
      if (!result.ok) {
        const { remainingSeconds } = result.error.details;
        return remainingSeconds === undefined
          ? [result.error.message]
          : [`${result.error.message} (${formatRemaining(remainingSeconds)} left)`];
      }
      return describeHarvest(result.value);
    }
    case 'harvest-all': {
      const outcomes = session.harvestAllReady();
      return outcomes.length === 0 ? ['Nothing is ready yet.'] : outcomes.flatMap(describeHarvest);
    }
    case 'save':
      await session.saveNow();
      return ['Saved.'];
    case 'quit':
      return [];
  }
}

async function main(): Promise<void> {
  const paths = resolveGamePaths();
  const logger = createFileLogger(paths.logDir);
  const catalog = loadCatalogOrExit(paths.cropTablePath, logger);

  const session = await GameSession.start({
    storage: createFileSaveStorage(paths.saveDir),
    catalog,
    logger,
    onAutoSave: (result) => {
      if (!result.ok) console.error('Auto-save failed; see the event log.');
    },
  });

  for (const line of formatWelcomeBack(session.loaded.summary, catalog)) {
    console.log(line);
  }
  if (session.loaded.source === 'recovered') {
    console.log('Your save could not be read and was set aside. Starting a new farm.');
  }
  console.log('Type "help" for commands.');

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  // Ctrl-C ends the input loop; the final save runs below
  rl.on('SIGINT', () => rl.close());
  process.on('SIGINT', () => rl.close());

  rl.prompt();
  for await (const line of rl) {
    const parsed = parseFarmCommand(line);
    if (!parsed.ok) {
      console.log(parsed.message);
    } else if (parsed.command.type === 'quit') {
      break;
    } else {
      try {
        for (const output of await runCommand(session, catalog, parsed.command)) {
          console.log(output);
        }
      } catch (e) {
        logger(errorEvent(parsed.command.type, e));
        console.error('Error:', e instanceof Error ? e.message : e);
      }
    }
    rl.prompt();
  }

  rl.close();
  await session.stop();
  console.log('Saved. See you soon!');
}

main().catch((e: unknown) => {
  console.error('Fatal error:', e);
  process.exit(1);
});
