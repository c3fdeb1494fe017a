/**
 * Terminal-state detection: position signatures, material and outcome
 */

import { isInCheck } from './attacks.js';
import type { Board } from './board.js';
import { castlingToFen, placementToFen } from './fen.js';
import { hasLegalEnPassant, hasLegalMove } from './movegen.js';
import { isLightSquare, squareFromIndex, squareName } from './square.js';
import { type Outcome, COLOR_NAMES, opposite } from './types.js';

/**
 * Halfmove clock value at which the fifty-move rule applies
 */
export const FIFTY_MOVE_PLIES = 100;

/**
 * Number of occurrences of one position that draws the game
 */
export const REPETITION_LIMIT = 3;

export const IN_PROGRESS: Outcome = Object.freeze({ kind: 'in_progress' });

/**
 * Signature used for repetition counting: placement, side to move, castling
 * rights and en-passant target. Move counters are excluded. The en-passant
 * target only counts while a capture on it is actually available.
 */
export function positionSignature(board: Board): string {
  const ep = board.enPassant && hasLegalEnPassant(board) ? squareName(board.enPassant) : '-';
  return `${placementToFen(board)} ${board.turn} ${castlingToFen(board.castling)} ${ep}`;
}

/**
 * Check whether neither side can possibly deliver mate: bare kings, a single
 * minor piece, or only bishops that all stand on one square color
 */
export function isInsufficientMaterial(board: Board): boolean {
  let minors = 0;
  let knights = 0;
  const bishopShades = new Set<boolean>();

  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    if (!p) continue;
    switch (p.kind) {
      case 'p':
      case 'r':
      case 'q':
        return false;
      case 'n':
        minors++;
        knights++;
        break;
      case 'b':
        minors++;
        bishopShades.add(isLightSquare(squareFromIndex(i)));
        break;
      case 'k':
        break;
    }
  }

  if (minors <= 1) return true;
  return knights === 0 && bishopShades.size === 1;
}

/**
 * Compute the outcome for a board, checking in this order: checkmate,
 * stalemate, fifty-move rule, repetition, insufficient material.
 *
 * @param repetitions - occurrence count for every signature seen so far
 */
export function computeOutcome(board: Board, repetitions: ReadonlyMap<string, number>): Outcome {
  if (!hasLegalMove(board)) {
    if (isInCheck(board, board.turn)) {
      return { kind: 'checkmate', winner: opposite(board.turn) };
    }
    return { kind: 'stalemate' };
  }
  if (board.halfmoveClock >= FIFTY_MOVE_PLIES) {
    return { kind: 'draw', reason: 'fifty_move' };
  }
  for (const count of repetitions.values()) {
    if (count >= REPETITION_LIMIT) {
      return { kind: 'draw', reason: 'repetition' };
    }
  }
  if (isInsufficientMaterial(board)) {
    return { kind: 'draw', reason: 'insufficient_material' };
  }
  return IN_PROGRESS;
}

/**
 * Describe an outcome for display
 */
export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'in_progress':
      return 'in progress';
    case 'checkmate':
      return `checkmate, ${COLOR_NAMES[outcome.winner]} wins`;
    case 'stalemate':
      return 'stalemate';
    case 'draw':
      switch (outcome.reason) {
        case 'fifty_move':
          return 'draw by the fifty-move rule';
        case 'repetition':
          return 'draw by threefold repetition';
        case 'insufficient_material':
          return 'draw by insufficient material';
      }
  }
}

/**
 * Result string in PGN form ("1-0", "0-1", "1/2-1/2", "*")
 */
export function outcomeResult(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'in_progress':
      return '*';
    case 'checkmate':
      return outcome.winner === 'w' ? '1-0' : '0-1';
    case 'stalemate':
    case 'draw':
      return '1/2-1/2';
  }
}
