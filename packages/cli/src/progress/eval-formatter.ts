/**
 * Chess evaluation formatting utilities
 */

import { type EngineScore, type Suggestion, DISPLAY_LIMIT_PAWNS, formatScore } from '@chesslens/engine';
import { COLOR_NAMES, toCoordinate } from '@chesslens/rules';

import type { ColorFn } from './types.js';

/**
 * Format evaluation in chess-friendly format: pawns + verbal
 * e.g., "+4.28 (White winning)" or "#5 (White mates in 5)"
 */
export function formatEvaluation(score: EngineScore, c: { bold: ColorFn; dim: ColorFn }): string {
  if (score.kind === 'mate') {
    const side = COLOR_NAMES[score.winner];
    const verbal = score.moves === 0 ? `${side} has mated` : `${side} mates in ${score.moves}`;
    return `${c.bold(formatScore(score))} ${c.dim(`(${verbal})`)}`;
  }
  return `${formatScore(score)} ${c.dim(`(${getEvalVerbal(score.value)})`)}`;
}

/**
 * Get verbal description of evaluation
 */
export function getEvalVerbal(cp: number): string {
  const absCp = Math.abs(cp);
  const side = cp >= 0 ? 'White' : 'Black';

  if (absCp < 25) return 'Equal';
  if (absCp < 75) return `Slight edge ${side}`;
  if (absCp < 150) return `${side} better`;
  if (absCp < 300) return `${side} much better`;
  if (absCp < 500) return `${side} winning`;
  return `${side} winning decisively`;
}

/**
 * Horizontal evaluation bar: White's share on the left
 * @param pawns White-relative evaluation, clamped to the bar range
 * @param width Width of the bar in characters (default: 20)
 */
export function formatEvalBar(pawns: number, width: number = 20): string {
  const clamped = Math.max(-DISPLAY_LIMIT_PAWNS, Math.min(DISPLAY_LIMIT_PAWNS, pawns));
  const ratio = (clamped + DISPLAY_LIMIT_PAWNS) / (2 * DISPLAY_LIMIT_PAWNS);
  const filled = Math.round(ratio * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}]`;
}

/**
 * Format a principal variation for display
 * Shows the first moves to keep it readable
 */
export function formatPv(pv: readonly string[], limit: number = 6): string {
  if (pv.length === 0) return '';
  const shown = pv.slice(0, limit).join(' ');
  return pv.length > limit ? `${shown} ...` : shown;
}

/**
 * Format the highlighted engine move
 */
export function formatSuggestion(suggestion: Suggestion, c: { red: ColorFn; blue: ColorFn }): string {
  const move = toCoordinate(suggestion.move);
  return suggestion.kind === 'mate' ? c.blue(`Mating move: ${move}`) : c.red(`Best move: ${move}`);
}
