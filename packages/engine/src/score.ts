/**
 * Score conversion and formatting
 */

import { type Color, type Move, opposite } from '@chesslens/rules';

import type { EngineScore, EvaluationResult } from './types.js';
import type { UciScore } from './uci/protocol.js';

/**
 * Centipawn value standing in for a forced mate
 */
export const MATE_SCORE = 10000;

/**
 * Evaluation bar range in pawns
 */
export const DISPLAY_LIMIT_PAWNS = 10;

/**
 * Turn a side-to-move score into White's point of view
 */
export function normalizeScore(score: UciScore, turn: Color): EngineScore {
  if (score.kind === 'cp') {
    return { kind: 'cp', value: turn === 'w' ? score.value : 0 - score.value };
  }
  // "mate 0" means the side to move is already mated
  const moverMates = score.moves > 0;
  return {
    kind: 'mate',
    moves: Math.abs(score.moves),
    winner: moverMates ? turn : opposite(turn),
  };
}

/**
 * Score in centipawns, with mates mapped just inside ±mateScore so that a
 * shorter mate scores higher
 */
export function scoreToCentipawns(score: EngineScore, mateScore = MATE_SCORE): number {
  if (score.kind === 'cp') return score.value;
  const magnitude = mateScore - score.moves;
  return score.winner === 'w' ? magnitude : -magnitude;
}

/**
 * Score in pawns, clamped to the evaluation bar range
 */
export function scoreToPawns(score: EngineScore, limit = DISPLAY_LIMIT_PAWNS): number {
  const pawns = scoreToCentipawns(score) / 100;
  return Math.max(-limit, Math.min(limit, pawns));
}

/**
 * Short text form: "+0.35", "-1.20", "#3", "#-2"
 */
export function formatScore(score: EngineScore): string {
  if (score.kind === 'mate') {
    return score.winner === 'w' ? `#${score.moves}` : `#-${score.moves}`;
  }
  const pawns = score.value / 100;
  return `${pawns >= 0 ? '+' : ''}${pawns.toFixed(2)}`;
}

/**
 * A move to show the player, and why
 */
export interface Suggestion {
  move: Move;
  kind: 'mate' | 'best';
}

/**
 * Pick the move to highlight. With mate hunting on, a forced mate for the
 * side to move is marked as such.
 */
export function suggestMove(
  result: EvaluationResult,
  turn: Color,
  mateHunt: boolean,
): Suggestion | null {
  if (!result.bestMove) return null;
  const forcedMate = result.score.kind === 'mate' && result.score.winner === turn;
  return { move: result.bestMove, kind: mateHunt && forcedMate ? 'mate' : 'best' };
}
