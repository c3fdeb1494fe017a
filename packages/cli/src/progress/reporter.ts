/**
 * Terminal reporter with ora spinners
 */

import type { EngineLogger } from '@chesslens/engine';
import ora, { type Color, type Ora } from 'ora';

import type { CliOptions } from '../config/schema.js';

import { createColorFns } from './colors.js';
import type { ColorFunctions, ReporterOptions } from './types.js';

export type { ReporterOptions } from './types.js';

/**
 * Reporter for CLI output
 */
export class Reporter {
  private spinner: Ora | null = null;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly debug: boolean;
  private readonly write: (line: string) => void;

  // Color functions
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.debug = options.debug ?? false;
    // debug implies verbose
    this.verbose = options.verbose ?? this.debug;
    this.write = options.write ?? ((line: string) => console.log(line));
    this.c = createColorFns(this.useColor);
  }

  get colors(): ColorFunctions {
    return this.c;
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    this.emit(this.c.bold(`chesslens v${version}`));
    this.emit('');
  }

  /**
   * Show a spinner until `succeedSpinner` or `failSpinner`
   */
  startSpinner(text: string): void {
    if (this.silent) return;
    this.spinner?.stop();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  succeedSpinner(text: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      this.printSuccess(text);
    }
  }

  failSpinner(text: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    } else {
      this.printError(text);
    }
  }

  /**
   * Print a message (respects color and silent settings)
   */
  printMessage(message: string): void {
    this.emit(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    this.emit(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    this.emit(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    this.emit(this.c.red(`✗ ${message}`));
  }

  /**
   * Print only under --verbose
   */
  printVerbose(message: string): void {
    if (!this.verbose) return;
    this.emit(this.c.dim(message));
  }

  /**
   * Print only under --debug
   */
  printDebug(message: string): void {
    if (!this.debug) return;
    this.emit(this.c.dim(`[debug] ${message}`));
  }

  /**
   * Logger for the engine bridge: traffic under --debug, warnings under
   * --verbose
   */
  engineLogger(): EngineLogger {
    return {
      debug: (message) => this.printDebug(message),
      warn: (message) => {
        if (this.verbose) this.printWarning(message);
      },
    };
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  isDebug(): boolean {
    return this.debug;
  }

  /**
   * Check if colors are enabled
   */
  hasColors(): boolean {
    return this.useColor;
  }

  /**
   * Write one line, pausing the spinner around it so the two do not interleave
   */
  private emit(line: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      this.write(line);
      this.spinner.start(currentText);
    } else {
      this.write(line);
    }
  }
}

/**
 * Reporter for a command run. An unset --verbose follows --debug.
 */
export function createCliReporter(
  options: Pick<CliOptions, 'verbose' | 'debug'>,
  color: boolean,
): Reporter {
  return new Reporter({ color, verbose: options.verbose, debug: options.debug });
}
