/**
 * Promotion Resolver
 *
 * Holds a last-rank pawn move while the player picks a piece, then submits
 * the completed move to the game.
 */

import { Result } from '@badrap/result';

import { type Board, pieceAt, promotionRank } from './board.js';
import {
  InvalidPromotionKindError,
  type MoveError,
  NoPendingPromotionError,
} from './errors.js';
import type { Game, GameSnapshot } from './game.js';
import { sameSquare } from './square.js';
import {
  type PieceKind,
  type PromotionKind,
  type Square,
  PROMOTION_KINDS,
  isPromotionKind,
} from './types.js';

/**
 * Promotion pieces in the order a picker shows them
 */
export const PROMOTION_CHOICES: readonly PromotionKind[] = PROMOTION_KINDS;

/**
 * A move waiting for its promotion piece
 */
export interface PendingPromotion {
  readonly from: Square;
  readonly to: Square;
  /** positionId of the game when the move was requested */
  readonly positionId: number;
}

export type PromotionRequest =
  | { readonly status: 'promotion_required'; readonly pending: PendingPromotion }
  | { readonly status: 'applied'; readonly snapshot: GameSnapshot };

export type ChooseError = MoveError | InvalidPromotionKindError | NoPendingPromotionError;

/**
 * Check whether a move is a pawn of the side to move stepping onto its last
 * rank
 */
export function requiresPromotion(board: Board, from: Square, to: Square): boolean {
  const mover = pieceAt(board, from);
  return (
    mover !== null &&
    mover.kind === 'p' &&
    mover.color === board.turn &&
    to.rank === promotionRank(mover.color)
  );
}

export class PromotionResolver {
  private pendingMove: PendingPromotion | null = null;

  constructor(private readonly game: Game) {}

  get pending(): PendingPromotion | null {
    return this.pendingMove;
  }

  /**
   * Submit a from/to pair. A legal promoting move is held until `choose`;
   * everything else goes straight to the game.
   */
  request(from: Square, to: Square): Result<PromotionRequest, MoveError> {
    this.pendingMove = null;

    if (requiresPromotion(this.game.board, from, to)) {
      const legal = this.game
        .legalMoves()
        .some((move) => sameSquare(move.from, from) && sameSquare(move.to, to));
      if (legal) {
        this.pendingMove = { from, to, positionId: this.game.positionId };
        return Result.ok({ status: 'promotion_required', pending: this.pendingMove });
      }
    }

    return this.game
      .submitMove({ from, to })
      .map((snapshot): PromotionRequest => ({ status: 'applied', snapshot }));
  }

  /**
   * Complete the pending move with a piece. A king or pawn is refused and the
   * pending move is kept.
   */
  choose(kind: PieceKind): Result<GameSnapshot, ChooseError> {
    const pending = this.pendingMove;
    if (!pending || pending.positionId !== this.game.positionId) {
      this.pendingMove = null;
      return Result.err(new NoPendingPromotionError());
    }
    if (!isPromotionKind(kind)) {
      return Result.err(new InvalidPromotionKindError(kind));
    }

    this.pendingMove = null;
    return this.game.submitMove({ from: pending.from, to: pending.to, promotion: kind });
  }

  /**
   * Drop the pending move, leaving the game untouched
   */
  cancel(): boolean {
    const had = this.pendingMove !== null;
    this.pendingMove = null;
    return had;
  }
}
