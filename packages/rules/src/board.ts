/**
 * Board Model
 *
 * An immutable-per-ply position: piece placement, side to move, castling
 * rights, en-passant target and move counters. `apply` produces the next
 * board and never touches the previous one.
 */

import { Result } from '@badrap/result';

import { IllegalMoveError, InvalidPromotionError } from './errors.js';
import { squareAt, squareIndex, squareName } from './square.js';
import {
  type CastlingRights,
  type Color,
  type MoveRequest,
  type Piece,
  type PieceKind,
  type Square,
  isPromotionKind,
  opposite,
} from './types.js';

/**
 * Board Model value. `squares` has 64 entries indexed a1 = 0 ... h8 = 63.
 */
export interface Board {
  readonly squares: readonly (Piece | null)[];
  readonly turn: Color;
  readonly castling: CastlingRights;
  readonly enPassant: Square | null;
  readonly halfmoveClock: number;
  readonly fullmoveNumber: number;
}

/**
 * Errors `apply` can return
 */
export type ApplyError = InvalidPromotionError | IllegalMoveError;

const PIECE_TABLE: Record<Color, Record<PieceKind, Piece>> = {
  w: buildPieceRow('w'),
  b: buildPieceRow('b'),
};

function buildPieceRow(color: Color): Record<PieceKind, Piece> {
  return {
    p: Object.freeze({ color, kind: 'p' }),
    n: Object.freeze({ color, kind: 'n' }),
    b: Object.freeze({ color, kind: 'b' }),
    r: Object.freeze({ color, kind: 'r' }),
    q: Object.freeze({ color, kind: 'q' }),
    k: Object.freeze({ color, kind: 'k' }),
  };
}

/**
 * Get the shared frozen piece value for a color and kind
 */
export function piece(color: Color, kind: PieceKind): Piece {
  return PIECE_TABLE[color][kind];
}

export const ALL_CASTLING: CastlingRights = Object.freeze({
  whiteKingside: true,
  whiteQueenside: true,
  blackKingside: true,
  blackQueenside: true,
});

export const NO_CASTLING: CastlingRights = Object.freeze({
  whiteKingside: false,
  whiteQueenside: false,
  blackKingside: false,
  blackQueenside: false,
});

const BACK_RANK: readonly PieceKind[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

/**
 * Create the standard starting position
 */
export function createInitialBoard(): Board {
  const squares: (Piece | null)[] = new Array<Piece | null>(64).fill(null);
  BACK_RANK.forEach((kind, file) => {
    squares[file] = piece('w', kind);
    squares[8 + file] = piece('w', 'p');
    squares[48 + file] = piece('b', 'p');
    squares[56 + file] = piece('b', kind);
  });
  return {
    squares,
    turn: 'w',
    castling: ALL_CASTLING,
    enPassant: null,
    halfmoveClock: 0,
    fullmoveNumber: 1,
  };
}

/**
 * Get the piece on a square
 */
export function pieceAt(board: Board, square: Square): Piece | null {
  return board.squares[squareIndex(square)] ?? null;
}

/**
 * Find the king of a color. Returns null only for malformed boards.
 */
export function findKing(board: Board, color: Color): Square | null {
  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    if (p && p.kind === 'k' && p.color === color) {
      return squareAt(i % 8, Math.floor(i / 8));
    }
  }
  return null;
}

/**
 * List all pieces of a color along with their squares
 */
export function piecesOf(board: Board, color: Color): Array<{ square: Square; piece: Piece }> {
  const result: Array<{ square: Square; piece: Piece }> = [];
  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    const sq = squareAt(i % 8, Math.floor(i / 8));
    if (p && sq && p.color === color) {
      result.push({ square: sq, piece: p });
    }
  }
  return result;
}

/**
 * Rank a pawn of this color promotes on
 */
export function promotionRank(color: Color): number {
  return color === 'w' ? 7 : 0;
}

/**
 * Format a move request in coordinate notation (e2e4, e7e8q)
 */
export function formatMoveRequest(move: MoveRequest): string {
  return `${squareName(move.from)}${squareName(move.to)}${move.promotion ?? ''}`;
}

/**
 * Home corner of each castling rook, used to revoke rights on rook moves and
 * captures
 */
const ROOK_CORNERS: ReadonlyArray<{ index: number; flag: keyof CastlingRights }> = [
  { index: 0, flag: 'whiteQueenside' },
  { index: 7, flag: 'whiteKingside' },
  { index: 56, flag: 'blackQueenside' },
  { index: 63, flag: 'blackKingside' },
];

function revokeCastling(
  rights: CastlingRights,
  mover: Piece,
  fromIndex: number,
  toIndex: number,
): CastlingRights {
  let next: CastlingRights = rights;
  if (mover.kind === 'k') {
    next =
      mover.color === 'w'
        ? { ...next, whiteKingside: false, whiteQueenside: false }
        : { ...next, blackKingside: false, blackQueenside: false };
  }
  for (const corner of ROOK_CORNERS) {
    if ((corner.index === fromIndex || corner.index === toIndex) && next[corner.flag]) {
      next = { ...next, [corner.flag]: false };
    }
  }
  return next === rights ? rights : Object.freeze(next);
}

/**
 * Apply a pre-validated move and return the resulting board.
 *
 * No legality checking happens here; castling and en passant are recognised
 * from the geometry of the move (king moving two files, pawn moving
 * diagonally onto the en-passant target).
 */
export function apply(board: Board, move: MoveRequest): Result<Board, ApplyError> {
  const label = formatMoveRequest(move);
  const fromIndex = squareIndex(move.from);
  const toIndex = squareIndex(move.to);
  const mover = board.squares[fromIndex];

  if (!mover) {
    return Result.err(new IllegalMoveError(label, `no piece on ${squareName(move.from)}`));
  }

  const reachesLastRank = mover.kind === 'p' && move.to.rank === promotionRank(mover.color);
  if (reachesLastRank && move.promotion === undefined) {
    return Result.err(new InvalidPromotionError(label, 'pawn reaching the last rank needs a piece'));
  }
  if (!reachesLastRank && move.promotion !== undefined) {
    return Result.err(new InvalidPromotionError(label, 'move does not promote'));
  }
  if (move.promotion !== undefined && !isPromotionKind(move.promotion)) {
    return Result.err(new InvalidPromotionError(label, `cannot promote to "${move.promotion}"`));
  }

  const squares = board.squares.slice();
  let captured = squares[toIndex] ?? null;

  const isEnPassant =
    mover.kind === 'p' &&
    move.from.file !== move.to.file &&
    captured === null &&
    board.enPassant !== null &&
    squareIndex(board.enPassant) === toIndex;

  if (isEnPassant) {
    const victimIndex = move.from.rank * 8 + move.to.file;
    captured = squares[victimIndex] ?? null;
    squares[victimIndex] = null;
  }

  const isCastle = mover.kind === 'k' && Math.abs(move.to.file - move.from.file) === 2;
  if (isCastle) {
    const rank = move.from.rank;
    const kingside = move.to.file > move.from.file;
    const rookFrom = rank * 8 + (kingside ? 7 : 0);
    const rookTo = rank * 8 + (kingside ? 5 : 3);
    squares[rookTo] = squares[rookFrom] ?? null;
    squares[rookFrom] = null;
  }

  squares[fromIndex] = null;
  squares[toIndex] =
    move.promotion !== undefined && isPromotionKind(move.promotion)
      ? piece(mover.color, move.promotion)
      : mover;

  const doublePush = mover.kind === 'p' && Math.abs(move.to.rank - move.from.rank) === 2;
  const enPassant = doublePush
    ? squareAt(move.from.file, (move.from.rank + move.to.rank) / 2)
    : null;

  const resetsClock = mover.kind === 'p' || captured !== null;

  return Result.ok({
    squares,
    turn: opposite(board.turn),
    castling: revokeCastling(board.castling, mover, fromIndex, toIndex),
    enPassant,
    halfmoveClock: resetsClock ? 0 : board.halfmoveClock + 1,
    fullmoveNumber: board.turn === 'b' ? board.fullmoveNumber + 1 : board.fullmoveNumber,
  });
}

/**
 * Get the piece a move would capture, including en passant victims
 */
export function capturedPiece(board: Board, move: MoveRequest): Piece | null {
  const target = pieceAt(board, move.to);
  if (target) return target;
  const mover = pieceAt(board, move.from);
  if (
    mover?.kind === 'p' &&
    move.from.file !== move.to.file &&
    board.enPassant !== null &&
    squareIndex(board.enPassant) === squareIndex(move.to)
  ) {
    return board.squares[move.from.rank * 8 + move.to.file] ?? null;
  }
  return null;
}
