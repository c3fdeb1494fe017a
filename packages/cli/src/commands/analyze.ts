/**
 * Analyze command implementation: one position, one final evaluation
 */

import { type EngineBridge, type EvaluationResult, scoreToPawns, suggestMove } from '@chesslens/engine';
import { Game, toSan } from '@chesslens/rules';

import { VERSION, parseCliOptions } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import { ConfigError, InputError, createEngineError } from '../errors/index.js';
import {
  formatEvalBar,
  formatEvaluation,
  formatPv,
  formatSuggestion,
} from '../progress/eval-formatter.js';
import { formatConfigDisplay, formatDuration } from '../progress/formatters.js';
import { createCliReporter } from '../progress/reporter.js';
import { renderBoard } from '../render/board-renderer.js';
import { createEngineBridge, waitForFinalResult } from '../services/engine-service.js';

import { statusLine } from './play-controller.js';

/**
 * Request the position and wait for the engine's bestmove
 */
function analyse(bridge: EngineBridge, game: Game): Promise<EvaluationResult> {
  const done = waitForFinalResult(bridge, game.positionId);
  bridge.requestAnalysis({ positionId: game.positionId, board: game.board });
  return done;
}

/**
 * Main analyze command handler
 */
export async function analyzeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const config = await loadConfig(options);

  if (options.showConfig) {
    console.log(formatConfigDisplay(config));
    console.log('');
    console.log('Raw configuration:');
    console.log(formatConfig(config));
    return;
  }

  const created = Game.create(options.fen);
  if (created.isErr) {
    throw new InputError(created.error.message, 'Pass a complete six-field FEN');
  }
  const game = created.value;

  const reporter = createCliReporter(options, config.display.color);
  const bridge = createEngineBridge(config, reporter);
  if (!bridge) {
    throw new ConfigError('Engine analysis is disabled', 'Drop --no-engine to analyse a position');
  }

  reporter.printHeader(VERSION);

  try {
    reporter.startSpinner(`Starting ${config.engine.path}`);
    try {
      await bridge.start();
    } catch (error) {
      reporter.failSpinner('Engine failed to start');
      throw createEngineError(config.engine.path, error instanceof Error ? error : undefined);
    }

    const startedAt = Date.now();
    reporter.startSpinner('Analysing');
    const result = await analyse(bridge, game).catch((error: unknown) => {
      reporter.failSpinner('Analysis failed');
      throw createEngineError(config.engine.path, error instanceof Error ? error : undefined);
    });
    reporter.succeedSpinner(`Analysed in ${formatDuration(Date.now() - startedAt)}`);

    const c = reporter.colors;
    const { board } = game;
    const suggestion = suggestMove(result, board.turn, config.analysis.mateHunt);

    reporter.printMessage('');
    reporter.printMessage(
      renderBoard(board, {
        perspective: config.display.orientation,
        unicode: config.display.unicode,
        suggestion,
        colors: c,
      }),
    );
    reporter.printMessage(statusLine(game.snapshot()));
    reporter.printMessage('');
    reporter.printMessage(`Eval: ${formatEvaluation(result.score, c)}  ${formatEvalBar(scoreToPawns(result.score))}`);
    reporter.printMessage(`Depth: ${result.depth}`);
    if (suggestion) {
      reporter.printMessage(`${formatSuggestion(suggestion, c)} (${toSan(board, suggestion.move)})`);
    }
    const pv = formatPv(result.pv);
    if (pv) {
      reporter.printMessage(c.dim(`PV: ${pv}`));
    }
  } finally {
    reporter.stop();
    await bridge.close();
  }
}
