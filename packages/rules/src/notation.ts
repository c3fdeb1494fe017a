/**
 * Move notation: coordinate (UCI-style) and Standard Algebraic Notation
 */

import { isInCheck } from './attacks.js';
import { type Board, apply, capturedPiece, formatMoveRequest, pieceAt } from './board.js';
import { hasLegalMove, legalMoves } from './movegen.js';
import { parseSquare, sameSquare, squareName } from './square.js';
import type { Move, MoveRequest, PieceKind } from './types.js';

const PROMOTION_LETTERS: Record<string, PieceKind> = {
  q: 'q',
  r: 'r',
  b: 'b',
  n: 'n',
  k: 'k',
  p: 'p',
};

/**
 * Parse coordinate notation ("e2e4", "e7e8q", "e2 e4"). Returns null for
 * anything that does not name two squares and an optional piece letter.
 *
 * King and pawn letters are accepted here so the promotion check can report
 * them properly.
 */
export function parseCoordinateMove(text: string): MoveRequest | null {
  const cleaned = text.trim().toLowerCase().replace(/[\s-]/g, '');
  const match = /^([a-h][1-8])([a-h][1-8])([qrbnkp])?$/.exec(cleaned);
  if (!match) return null;

  const from = parseSquare(match[1] ?? '');
  const to = parseSquare(match[2] ?? '');
  if (!from || !to) return null;

  const letter = match[3];
  const promotion = letter ? PROMOTION_LETTERS[letter] : undefined;
  return promotion ? { from, to, promotion } : { from, to };
}

/**
 * Coordinate notation for a move (alias kept for the engine protocol)
 */
export function toCoordinate(move: MoveRequest): string {
  return formatMoveRequest(move);
}

/**
 * Render a legal move in Standard Algebraic Notation, with "+" or "#"
 */
export function toSan(board: Board, move: Move): string {
  const mover = pieceAt(board, move.from);
  if (!mover) return formatMoveRequest(move);

  let san: string;
  if (move.isCastle) {
    san = move.to.file > move.from.file ? 'O-O' : 'O-O-O';
  } else {
    const capture = capturedPiece(board, move) !== null;
    const dest = squareName(move.to);

    if (mover.kind === 'p') {
      const fileLetter = squareName(move.from)[0] ?? '';
      san = capture ? `${fileLetter}x${dest}` : dest;
      if (move.promotion) san += `=${move.promotion.toUpperCase()}`;
    } else {
      san = mover.kind.toUpperCase() + disambiguation(board, move, mover.kind);
      san += capture ? `x${dest}` : dest;
    }
  }

  const next = apply(board, move);
  if (next.isOk && isInCheck(next.value, next.value.turn)) {
    san += hasLegalMove(next.value) ? '+' : '#';
  }
  return san;
}

function disambiguation(board: Board, move: Move, kind: PieceKind): string {
  const rivals = legalMoves(board).filter(
    (other) =>
      sameSquare(other.to, move.to) &&
      !sameSquare(other.from, move.from) &&
      pieceAt(board, other.from)?.kind === kind,
  );
  if (rivals.length === 0) return '';

  const name = squareName(move.from);
  const sameFile = rivals.some((other) => other.from.file === move.from.file);
  const sameRank = rivals.some((other) => other.from.rank === move.from.rank);
  if (!sameFile) return name[0] ?? '';
  if (!sameRank) return name[1] ?? '';
  return name;
}
