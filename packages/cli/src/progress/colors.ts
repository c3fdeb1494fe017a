/**
 * Conditional colorization
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

/**
 * Build color functions, or pass-through functions when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
      blue: (text: string) => chalk.blue(text),
      highlight: (text: string) => chalk.bgYellow.black(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
    blue: identity,
    highlight: identity,
  };
}
