/**
 * Play command implementation: an interactive board on stdin/stdout
 */

import { createInterface } from 'node:readline';

import { VERSION, parseCliOptions } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import { InputError } from '../errors/index.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { createCliReporter } from '../progress/reporter.js';
import { createEngineBridge } from '../services/engine-service.js';
import { AnalyzerSession } from '../session/analyzer-session.js';

import { PlayController } from './play-controller.js';

/**
 * Main play command handler
 */
export async function playCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const config = await loadConfig(options);

  // Show config and exit if requested
  if (options.showConfig) {
    console.log(formatConfigDisplay(config));
    console.log('');
    console.log('Raw configuration:');
    console.log(formatConfig(config));
    return;
  }

  const reporter = createCliReporter(options, config.display.color);
  reporter.printHeader(VERSION);

  const bridge = createEngineBridge(config, reporter);
  if (!bridge) {
    reporter.printWarning('Engine analysis disabled');
  }

  const created = AnalyzerSession.create({
    fen: options.fen,
    bridge,
    orientation: config.display.orientation,
    mateHunt: config.analysis.mateHunt,
  });
  if (created.isErr) {
    await bridge?.close();
    throw new InputError(created.error.message, 'Pass a complete six-field FEN with --fen');
  }

  const controller = new PlayController(created.value, {
    reporter,
    unicode: config.display.unicode,
    throttleMs: config.analysis.throttleMs,
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'chesslens> ' });
  const unsubscribe = bridge?.onUpdate((event) => {
    if (controller.handleBridgeEvent(event)) {
      rl.prompt(true);
    }
  });

  controller.renderPosition();
  reporter.printMessage(reporter.colors.dim('Type help for commands'));
  rl.prompt();

  try {
    await new Promise<void>((resolve) => {
      rl.on('line', (line) => {
        if (controller.handle(line) === 'quit') {
          rl.close();
        } else {
          rl.prompt();
        }
      });
      rl.on('close', resolve);
    });
  } finally {
    unsubscribe?.();
    await bridge?.close();
  }
}
