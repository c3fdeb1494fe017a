/**
 * Pseudo-legal and legal move generation
 */

import {
  BISHOP_DIRECTIONS,
  KING_OFFSETS,
  KNIGHT_OFFSETS,
  QUEEN_DIRECTIONS,
  ROOK_DIRECTIONS,
  type Vector,
  isInCheck,
  isSquareAttacked,
  pawnDirection,
} from './attacks.js';
import { type Board, apply, formatMoveRequest, pieceAt, promotionRank } from './board.js';
import { sameSquare, squareAt } from './square.js';
import {
  type CastlingRights,
  type Color,
  type Move,
  type MoveRequest,
  type Piece,
  PROMOTION_KINDS,
  type Square,
  opposite,
} from './types.js';

function quiet(from: Square, to: Square): Move {
  return { from, to, isCastle: false, isEnPassant: false };
}

function pushPawnMoves(moves: Move[], from: Square, to: Square, color: Color): void {
  if (to.rank === promotionRank(color)) {
    for (const promotion of PROMOTION_KINDS) {
      moves.push({ from, to, promotion, isCastle: false, isEnPassant: false });
    }
  } else {
    moves.push(quiet(from, to));
  }
}

function generatePawnMoves(board: Board, from: Square, color: Color, moves: Move[]): void {
  const dr = pawnDirection(color);
  const startRank = color === 'w' ? 1 : 6;

  const one = squareAt(from.file, from.rank + dr);
  if (one && !pieceAt(board, one)) {
    pushPawnMoves(moves, from, one, color);
    const two = squareAt(from.file, from.rank + 2 * dr);
    if (from.rank === startRank && two && !pieceAt(board, two)) {
      moves.push(quiet(from, two));
    }
  }

  for (const df of [-1, 1]) {
    const target = squareAt(from.file + df, from.rank + dr);
    if (!target) continue;
    const occupant = pieceAt(board, target);
    if (occupant && occupant.color !== color) {
      pushPawnMoves(moves, from, target, color);
    } else if (!occupant && board.enPassant && sameSquare(board.enPassant, target)) {
      moves.push({ from, to: target, isCastle: false, isEnPassant: true });
    }
  }
}

function generateStepMoves(
  board: Board,
  from: Square,
  color: Color,
  offsets: readonly Vector[],
  moves: Move[],
): void {
  for (const [df, dr] of offsets) {
    const to = squareAt(from.file + df, from.rank + dr);
    if (!to) continue;
    const occupant = pieceAt(board, to);
    if (!occupant || occupant.color !== color) {
      moves.push(quiet(from, to));
    }
  }
}

function generateSlideMoves(
  board: Board,
  from: Square,
  color: Color,
  directions: readonly Vector[],
  moves: Move[],
): void {
  for (const [df, dr] of directions) {
    let to = squareAt(from.file + df, from.rank + dr);
    while (to) {
      const occupant = pieceAt(board, to);
      if (occupant) {
        if (occupant.color !== color) moves.push(quiet(from, to));
        break;
      }
      moves.push(quiet(from, to));
      to = squareAt(to.file + df, to.rank + dr);
    }
  }
}

interface CastleSpec {
  flag: keyof CastlingRights;
  rookFile: number;
  kingTo: number;
  /** Files that must be empty */
  between: readonly number[];
  /** Files the king crosses or lands on, which must not be attacked */
  transit: readonly number[];
}

const CASTLES: Record<Color, readonly CastleSpec[]> = {
  w: [
    { flag: 'whiteKingside', rookFile: 7, kingTo: 6, between: [5, 6], transit: [5, 6] },
    { flag: 'whiteQueenside', rookFile: 0, kingTo: 2, between: [1, 2, 3], transit: [3, 2] },
  ],
  b: [
    { flag: 'blackKingside', rookFile: 7, kingTo: 6, between: [5, 6], transit: [5, 6] },
    { flag: 'blackQueenside', rookFile: 0, kingTo: 2, between: [1, 2, 3], transit: [3, 2] },
  ],
};

function generateCastles(board: Board, from: Square, color: Color, moves: Move[]): void {
  const rank = color === 'w' ? 0 : 7;
  if (from.rank !== rank || from.file !== 4) return;

  const enemy = opposite(color);
  if (isSquareAttacked(board, from, enemy)) return;

  for (const side of CASTLES[color]) {
    if (!board.castling[side.flag]) continue;

    const rookSquare = squareAt(side.rookFile, rank);
    const rook = rookSquare ? pieceAt(board, rookSquare) : null;
    if (!rook || rook.kind !== 'r' || rook.color !== color) continue;

    const clear = side.between.every((file) => {
      const sq = squareAt(file, rank);
      return sq !== null && !pieceAt(board, sq);
    });
    if (!clear) continue;

    const safe = side.transit.every((file) => {
      const sq = squareAt(file, rank);
      return sq !== null && !isSquareAttacked(board, sq, enemy);
    });
    if (!safe) continue;

    const to = squareAt(side.kingTo, rank);
    if (to) moves.push({ from, to, isCastle: true, isEnPassant: false });
  }
}

function generatePieceMoves(board: Board, from: Square, p: Piece, moves: Move[]): void {
  switch (p.kind) {
    case 'p':
      generatePawnMoves(board, from, p.color, moves);
      break;
    case 'n':
      generateStepMoves(board, from, p.color, KNIGHT_OFFSETS, moves);
      break;
    case 'b':
      generateSlideMoves(board, from, p.color, BISHOP_DIRECTIONS, moves);
      break;
    case 'r':
      generateSlideMoves(board, from, p.color, ROOK_DIRECTIONS, moves);
      break;
    case 'q':
      generateSlideMoves(board, from, p.color, QUEEN_DIRECTIONS, moves);
      break;
    case 'k':
      generateStepMoves(board, from, p.color, KING_OFFSETS, moves);
      generateCastles(board, from, p.color, moves);
      break;
  }
}

/**
 * Every geometrically valid move for the side to move, ignoring whether the
 * mover's own king is left in check
 */
export function pseudoLegalMoves(board: Board): Move[] {
  const moves: Move[] = [];
  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    const from = squareAt(i % 8, Math.floor(i / 8));
    if (p && from && p.color === board.turn) {
      generatePieceMoves(board, from, p, moves);
    }
  }
  return moves;
}

/**
 * Check whether a move leaves the mover's king safe, by playing it out
 */
export function isSelfCheckFree(board: Board, move: Move): boolean {
  const next = apply(board, move);
  if (next.isErr) return false;
  return !isInCheck(next.value, board.turn);
}

/**
 * All legal moves for the side to move.
 *
 * Each pseudo-legal candidate is simulated and dropped if it leaves the
 * mover in check.
 */
export function legalMoves(board: Board): Move[] {
  return pseudoLegalMoves(board).filter((move) => isSelfCheckFree(board, move));
}

/**
 * Legal moves starting on one square, for highlighting a selected piece
 */
export function legalMovesFrom(board: Board, from: Square): Move[] {
  const p = pieceAt(board, from);
  if (!p || p.color !== board.turn) return [];
  const moves: Move[] = [];
  generatePieceMoves(board, from, p, moves);
  return moves.filter((move) => isSelfCheckFree(board, move));
}

/**
 * Check whether the side to move has any legal move
 */
export function hasLegalMove(board: Board): boolean {
  for (let i = 0; i < 64; i++) {
    const p = board.squares[i];
    const from = squareAt(i % 8, Math.floor(i / 8));
    if (!p || !from || p.color !== board.turn) continue;
    const moves: Move[] = [];
    generatePieceMoves(board, from, p, moves);
    if (moves.some((move) => isSelfCheckFree(board, move))) return true;
  }
  return false;
}

/**
 * Check whether an en passant capture is actually available (legal) for
 * the side to move
 */
export function hasLegalEnPassant(board: Board): boolean {
  const target = board.enPassant;
  if (!target) return false;
  const dr = pawnDirection(board.turn);
  for (const df of [-1, 1]) {
    const from = squareAt(target.file + df, target.rank - dr);
    if (!from) continue;
    const p = pieceAt(board, from);
    if (p?.kind === 'p' && p.color === board.turn) {
      const move: Move = { from, to: target, isCastle: false, isEnPassant: true };
      if (isSelfCheckFree(board, move)) return true;
    }
  }
  return false;
}

/**
 * Find the legal move a request refers to. A request without a promotion
 * matches nothing when only promoting moves exist between its squares.
 */
export function findLegalMove(moves: readonly Move[], request: MoveRequest): Move | null {
  return (
    moves.find(
      (move) =>
        sameSquare(move.from, request.from) &&
        sameSquare(move.to, request.to) &&
        move.promotion === request.promotion,
    ) ?? null
  );
}

/**
 * Count leaf nodes of the legal move tree to `depth`
 */
export function perft(board: Board, depth: number): number {
  if (depth <= 0) return 1;
  const moves = legalMoves(board);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) {
    const next = apply(board, move);
    if (next.isOk) {
      nodes += perft(next.value, depth - 1);
    }
  }
  return nodes;
}

/**
 * Per-move perft breakdown keyed by coordinate notation
 */
export function perftDivide(board: Board, depth: number): Map<string, number> {
  const result = new Map<string, number>();
  for (const move of legalMoves(board)) {
    const next = apply(board, move);
    if (next.isErr) continue;
    result.set(formatMoveRequest(move), perft(next.value, depth - 1));
  }
  return result;
}
