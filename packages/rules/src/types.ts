/**
 * Core value types for the rules engine
 */

/**
 * Side color: white or black
 */
export type Color = 'w' | 'b';

/**
 * Piece kind tag. Move generation switches over this tag.
 */
export type PieceKind = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * Piece kinds a pawn may promote to
 */
export type PromotionKind = 'q' | 'r' | 'b' | 'n';

/**
 * A board coordinate. file and rank are both 0-7 (a1 = file 0, rank 0).
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

/**
 * An immutable piece value
 */
export interface Piece {
  readonly color: Color;
  readonly kind: PieceKind;
}

/**
 * Four independent castling flags. Once false, a flag never becomes true again
 * within a game.
 */
export interface CastlingRights {
  readonly whiteKingside: boolean;
  readonly whiteQueenside: boolean;
  readonly blackKingside: boolean;
  readonly blackQueenside: boolean;
}

/**
 * A move request as submitted by a caller, before legality is known
 */
export interface MoveRequest {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PieceKind;
}

/**
 * A fully described move. Flags are filled in by move generation.
 */
export interface Move extends MoveRequest {
  readonly isCastle: boolean;
  readonly isEnPassant: boolean;
}

/**
 * Reasons a game can end drawn
 */
export type DrawReason = 'fifty_move' | 'repetition' | 'insufficient_material';

/**
 * Game outcome
 */
export type Outcome =
  | { readonly kind: 'in_progress' }
  | { readonly kind: 'checkmate'; readonly winner: Color }
  | { readonly kind: 'stalemate' }
  | { readonly kind: 'draw'; readonly reason: DrawReason };

/**
 * Get the opposing color
 */
export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

export const PROMOTION_KINDS: readonly PromotionKind[] = ['q', 'r', 'b', 'n'];

/**
 * Check whether a piece kind is a legal promotion target
 */
export function isPromotionKind(kind: PieceKind): kind is PromotionKind {
  return kind === 'q' || kind === 'r' || kind === 'b' || kind === 'n';
}

/**
 * Human-readable piece names
 */
export const PIECE_NAMES: Record<PieceKind, string> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

export const COLOR_NAMES: Record<Color, string> = {
  w: 'White',
  b: 'Black',
};
