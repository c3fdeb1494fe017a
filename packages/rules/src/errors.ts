/**
 * Error classes for rules-engine failures.
 *
 * These are returned inside Result values, not thrown, by the move
 * submission and promotion operations.
 */

import type { PieceKind } from './types.js';

/**
 * Base error class for rules-engine errors
 */
export class RulesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RulesError';
  }
}

/**
 * Error returned when a FEN string cannot be parsed
 */
export class InvalidFenError extends RulesError {
  constructor(
    public readonly fen: string,
    public readonly reason: string,
  ) {
    super(`Invalid FEN "${fen}": ${reason}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error returned when a move is not in the legal move set
 */
export class IllegalMoveError extends RulesError {
  constructor(
    public readonly move: string,
    public readonly detail: string,
  ) {
    super(`Illegal move "${move}": ${detail}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error returned when a promotion is missing, or given on a move that
 * does not promote
 */
export class InvalidPromotionError extends RulesError {
  constructor(
    public readonly move: string,
    reason: string,
  ) {
    super(`Invalid promotion on "${move}": ${reason}`);
    this.name = 'InvalidPromotionError';
  }
}

/**
 * Error returned when a promotion choice names a king or pawn
 */
export class InvalidPromotionKindError extends RulesError {
  constructor(public readonly kind: PieceKind) {
    super(`Cannot promote to "${kind}"; choose one of q, r, b, n`);
    this.name = 'InvalidPromotionKindError';
  }
}

/**
 * Error returned when a promotion choice arrives with no pending promotion
 */
export class NoPendingPromotionError extends RulesError {
  constructor() {
    super('No promotion is pending');
    this.name = 'NoPendingPromotionError';
  }
}

/**
 * Error returned when a move is submitted after the game has ended
 */
export class GameOverError extends RulesError {
  constructor(public readonly outcome: string) {
    super(`Game is over (${outcome}); start a new game or undo`);
    this.name = 'GameOverError';
  }
}

/**
 * Union of errors move submission can return
 */
export type MoveError = IllegalMoveError | InvalidPromotionError | GameOverError;
