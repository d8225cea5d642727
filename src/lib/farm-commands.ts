/**
 * Farm Commands
 *
 * Parses one line of terminal input into a command. Only the shape of the
 * input is checked here; whether a plot or crop exists is the game's call.
 */

export type FarmCommand =
  | { type: 'look' }
  | { type: 'seeds' }
  | { type: 'stats' }
  | { type: 'save' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'plant'; x: number; y: number; cropTypeId: string }
  | { type: 'harvest'; x: number; y: number }
  | { type: 'harvest-all' }
  | { type: 'empty' };

export type ParseCommandResult =
  | { ok: true; command: FarmCommand }
  | { ok: false; message: string };

export const HELP_LINES: readonly string[] = [
  'look                     Show the farm',
  'seeds                    List crops you can plant',
  'plant <x> <y> <crop>     Plant a crop, e.g. "plant 0 0 radish"',
  'harvest <x> <y>          Harvest a ready crop',
  'harvest all              Harvest every ready crop',
  'stats                    Show coins, level and totals',
  'save                     Save now',
  'help                     Show this list',
  'quit                     Save and exit',
];

/** Single-word commands and their aliases */
const SIMPLE_COMMANDS = new Map<string, FarmCommand>([
  ['look', { type: 'look' }],
  ['l', { type: 'look' }],
  ['seeds', { type: 'seeds' }],
  ['stats', { type: 'stats' }],
  ['save', { type: 'save' }],
  ['help', { type: 'help' }],
  ['?', { type: 'help' }],
  ['quit', { type: 'quit' }],
  ['exit', { type: 'quit' }],
  ['q', { type: 'quit' }],
]);

const COORDINATE_PATTERN = /^\d+$/;

function parseCoordinates(
  rawX: string,
  rawY: string
): { ok: true; x: number; y: number } | { ok: false; message: string } {
  for (const raw of [rawX, rawY]) {
    if (!COORDINATE_PATTERN.test(raw)) {
      return { ok: false, message: `Coordinates must be whole numbers, got "${raw}"` };
    }
  }
  return { ok: true, x: Number(rawX), y: Number(rawY) };
}

export function parseFarmCommand(line: string): ParseCommandResult {
  const words = line.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return { ok: true, command: { type: 'empty' } };
  }

  const [verb, ...args] = words;
  const name = verb.toLowerCase();

  if (name === 'plant') {
    if (args.length !== 3) {
      return { ok: false, message: 'Usage: plant <x> <y> <crop>' };
    }
    const coords = parseCoordinates(args[0], args[1]);
    if (!coords.ok) return coords;
    return {
      ok: true,
      command: { type: 'plant', x: coords.x, y: coords.y, cropTypeId: args[2].toUpperCase() },
    };
  }

  if (name === 'harvest') {
    if (args.length === 1 && args[0].toLowerCase() === 'all') {
      return { ok: true, command: { type: 'harvest-all' } };
    }
    if (args.length !== 2) {
      return { ok: false, message: 'Usage: harvest <x> <y> | harvest all' };
    }
    const coords = parseCoordinates(args[0], args[1]);
    if (!coords.ok) return coords;
    return { ok: true, command: { type: 'harvest', x: coords.x, y: coords.y } };
  }

  const simple = SIMPLE_COMMANDS.get(name);
  if (simple && args.length === 0) {
    return { ok: true, command: simple };
  }

  return { ok: false, message: `Unknown command "${line.trim()}". Type "help" for the list.` };
}
