/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { analysisProfileSchema } from './config/validation.js';
import { InputError } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Analysis profile:
    quick    - 50ms per position
    standard - 100ms per position [default]
    deep     - depth 22, up to 1s per position`;

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Options shared by every command
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('-e, --engine <path>', 'UCI engine executable (default: stockfish)')
    .option('--no-engine', 'Play without engine analysis')
    .option('-d, --depth <plies>', 'Search depth per position', parsePositiveInt)
    .option('-t, --movetime <ms>', 'Search time per position in milliseconds', parsePositiveInt)
    .option('-p, --profile <profile>', PROFILE_HELP)
    .option('--verbose', 'Show interim engine output and warnings')
    .option('--debug', 'Show the UCI traffic')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('chesslens')
    .description('Interactive chess position analyzer backed by a UCI engine')
    .version(VERSION);

  // Play command (default)
  addCommonOptions(
    program
      .command('play', { isDefault: true })
      .description('Play moves on a board while the engine evaluates every position')
      .option('-f, --fen <fen>', 'Starting position (default: standard)')
      .option('-m, --mate-hunt', 'Mark forced mates for the side to move')
      .option('-b, --black', "View the board from Black's side"),
  ).action(async (options: Record<string, unknown>) => {
    const { playCommand } = await import('./commands/play.js');
    await playCommand(options);
  });

  // Analyze command
  addCommonOptions(
    program
      .command('analyze')
      .description('Evaluate one position and print the best move')
      .argument('[fen]', 'Position to analyse (default: standard)')
      .option('-m, --mate-hunt', 'Mark forced mates for the side to move')
      .option('-b, --black', "View the board from Black's side"),
  ).action(async (fen: string | undefined, options: Record<string, unknown>) => {
    const { analyzeCommand } = await import('./commands/analyze.js');
    await analyzeCommand({ ...options, fen });
  });

  // Perft command
  program
    .command('perft')
    .description('Count leaf nodes of the legal move tree')
    .argument('<depth>', 'Depth in plies', parsePositiveInt)
    .option('-f, --fen <fen>', 'Starting position (default: standard)')
    .option('--divide', 'Break the count down by first move')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (depth: number, options: Record<string, unknown>) => {
      const { perftCommand } = await import('./commands/perft.js');
      perftCommand(depth, options);
    });

  return program;
}

function stringOption(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse and validate CLI options
 */
export function parseCliOptions(raw: Record<string, unknown>): CliOptions {
  const options: CliOptions = {};

  const config = stringOption(raw, 'config');
  if (config !== undefined) options.config = config;
  if (raw['showConfig'] === true) options.showConfig = true;

  const fen = stringOption(raw, 'fen');
  if (fen !== undefined) options.fen = fen;

  // --engine <path> and --no-engine share one key
  const engine = raw['engine'];
  if (typeof engine === 'string') {
    options.engine = engine;
  } else if (engine === false) {
    options.engineEnabled = false;
  }

  const depth = numberOption(raw, 'depth');
  if (depth !== undefined) options.depth = depth;
  const movetime = numberOption(raw, 'movetime');
  if (movetime !== undefined) options.movetime = movetime;

  const profile = raw['profile'];
  if (profile !== undefined) {
    const parsed = analysisProfileSchema.safeParse(profile);
    if (!parsed.success) {
      throw new InputError(
        `Invalid profile: ${String(profile)}`,
        'Valid profiles: quick, standard, deep',
      );
    }
    options.profile = parsed.data;
  }

  if (raw['mateHunt'] === true) options.mateHunt = true;
  if (raw['black'] === true) options.black = true;

  const color = booleanOption(raw, 'color');
  if (color === false) options.color = false;
  if (raw['verbose'] === true) options.verbose = true;
  if (raw['debug'] === true) options.debug = true;

  return options;
}
