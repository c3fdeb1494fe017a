/**
 * Attack maps, check and pin detection.
 *
 * Sliding attacks stop at the first occupied square, which is itself
 * attacked. Pawns attack diagonally only.
 */

import { type Board, findKing } from './board.js';
import { squareAt, squareIndex } from './square.js';
import { type Color, type Piece, type Square, opposite } from './types.js';

/**
 * File/rank step
 */
export type Vector = readonly [number, number];

export const ROOK_DIRECTIONS: readonly Vector[] = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
];

export const BISHOP_DIRECTIONS: readonly Vector[] = [
  [1, 1],
  [-1, 1],
  [1, -1],
  [-1, -1],
];

export const QUEEN_DIRECTIONS: readonly Vector[] = [...ROOK_DIRECTIONS, ...BISHOP_DIRECTIONS];

export const KNIGHT_OFFSETS: readonly Vector[] = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2],
];

export const KING_OFFSETS: readonly Vector[] = QUEEN_DIRECTIONS;

/**
 * Rank direction pawns of a color advance in
 */
export function pawnDirection(color: Color): number {
  return color === 'w' ? 1 : -1;
}

/**
 * Squares reached by single steps along each offset
 */
function stepTargets(from: Square, offsets: readonly Vector[]): Square[] {
  const result: Square[] = [];
  for (const [df, dr] of offsets) {
    const sq = squareAt(from.file + df, from.rank + dr);
    if (sq) result.push(sq);
  }
  return result;
}

/**
 * Squares along each direction up to and including the first occupied one
 */
export function slideTargets(board: Board, from: Square, directions: readonly Vector[]): Square[] {
  const result: Square[] = [];
  for (const [df, dr] of directions) {
    let sq = squareAt(from.file + df, from.rank + dr);
    while (sq) {
      result.push(sq);
      if (board.squares[squareIndex(sq)]) break;
      sq = squareAt(sq.file + df, sq.rank + dr);
    }
  }
  return result;
}

/**
 * Squares attacked by a single piece standing on `from`
 */
export function attacksFrom(board: Board, from: Square, attacker: Piece): Square[] {
  switch (attacker.kind) {
    case 'p': {
      const dr = pawnDirection(attacker.color);
      return stepTargets(from, [
        [-1, dr],
        [1, dr],
      ]);
    }
    case 'n':
      return stepTargets(from, KNIGHT_OFFSETS);
    case 'b':
      return slideTargets(board, from, BISHOP_DIRECTIONS);
    case 'r':
      return slideTargets(board, from, ROOK_DIRECTIONS);
    case 'q':
      return slideTargets(board, from, QUEEN_DIRECTIONS);
    case 'k':
      return stepTargets(from, KING_OFFSETS);
  }
}

/**
 * Every square attacked by `byColor`, as a set of 0-63 indices
 */
export function attackedSquares(board: Board, byColor: Color): Set<number> {
  const attacked = new Set<number>();
  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    const from = squareAt(i % 8, Math.floor(i / 8));
    if (!p || !from || p.color !== byColor) continue;
    for (const target of attacksFrom(board, from, p)) {
      attacked.add(squareIndex(target));
    }
  }
  return attacked;
}

/**
 * Find the first piece along a ray, starting next to `from`
 */
function firstPieceOnRay(
  board: Board,
  from: Square,
  [df, dr]: Vector,
): { square: Square; piece: Piece } | null {
  let sq = squareAt(from.file + df, from.rank + dr);
  while (sq) {
    const p = board.squares[squareIndex(sq)];
    if (p) return { square: sq, piece: p };
    sq = squareAt(sq.file + df, sq.rank + dr);
  }
  return null;
}

/**
 * Squares holding pieces of `byColor` that attack `square`
 */
export function attackersOf(board: Board, square: Square, byColor: Color): Square[] {
  const result: Square[] = [];
  const holds = (sq: Square, kinds: string): boolean => {
    const p = board.squares[squareIndex(sq)];
    return p !== null && p !== undefined && p.color === byColor && kinds.includes(p.kind);
  };

  for (const sq of stepTargets(square, KNIGHT_OFFSETS)) {
    if (holds(sq, 'n')) result.push(sq);
  }
  for (const sq of stepTargets(square, KING_OFFSETS)) {
    if (holds(sq, 'k')) result.push(sq);
  }
  // A pawn of byColor attacks `square` from one rank behind it
  const dr = -pawnDirection(byColor);
  for (const sq of stepTargets(square, [
    [-1, dr],
    [1, dr],
  ])) {
    if (holds(sq, 'p')) result.push(sq);
  }
  for (const dir of ROOK_DIRECTIONS) {
    const hit = firstPieceOnRay(board, square, dir);
    if (hit && holds(hit.square, 'rq')) result.push(hit.square);
  }
  for (const dir of BISHOP_DIRECTIONS) {
    const hit = firstPieceOnRay(board, square, dir);
    if (hit && holds(hit.square, 'bq')) result.push(hit.square);
  }
  return result;
}

/**
 * Check if `square` is attacked by any piece of `byColor`
 */
export function isSquareAttacked(board: Board, square: Square, byColor: Color): boolean {
  return attackersOf(board, square, byColor).length > 0;
}

/**
 * Check if the king of `color` is attacked
 */
export function isInCheck(board: Board, color: Color): boolean {
  const king = findKing(board, color);
  if (!king) return false;
  return isSquareAttacked(board, king, opposite(color));
}

/**
 * Squares of the pieces giving check to `color`
 */
export function checkers(board: Board, color: Color): Square[] {
  const king = findKing(board, color);
  if (!king) return [];
  return attackersOf(board, king, opposite(color));
}

/**
 * A piece pinned against its own king
 */
export interface Pin {
  /** The pinned piece's square */
  pinned: Square;
  /** The enemy slider doing the pinning */
  pinner: Square;
  /** Step from the king towards the pinner */
  direction: Vector;
}

/**
 * Find every piece of `color` that is absolutely pinned to its king.
 *
 * Legality never relies on this; move generation still simulates every
 * candidate.
 */
export function findPins(board: Board, color: Color): Pin[] {
  const king = findKing(board, color);
  if (!king) return [];

  const pins: Pin[] = [];
  const scan = (directions: readonly Vector[], sliders: string): void => {
    for (const dir of directions) {
      const first = firstPieceOnRay(board, king, dir);
      if (!first || first.piece.color !== color) continue;
      const second = firstPieceOnRay(board, first.square, dir);
      if (second && second.piece.color !== color && sliders.includes(second.piece.kind)) {
        pins.push({ pinned: first.square, pinner: second.square, direction: dir });
      }
    }
  };

  scan(ROOK_DIRECTIONS, 'rq');
  scan(BISHOP_DIRECTIONS, 'bq');
  return pins;
}
