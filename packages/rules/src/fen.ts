/**
 * FEN parsing and serialisation
 */

import { Result } from '@badrap/result';

import { isInCheck } from './attacks.js';
import { type Board, NO_CASTLING, piece } from './board.js';
import { InvalidFenError } from './errors.js';
import { parseSquare, squareIndex, squareName } from './square.js';
import {
  type CastlingRights,
  type Color,
  type Piece,
  type PieceKind,
  type Square,
  opposite,
} from './types.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const FEN_PIECES: Record<string, Piece> = {
  P: piece('w', 'p'),
  N: piece('w', 'n'),
  B: piece('w', 'b'),
  R: piece('w', 'r'),
  Q: piece('w', 'q'),
  K: piece('w', 'k'),
  p: piece('b', 'p'),
  n: piece('b', 'n'),
  b: piece('b', 'b'),
  r: piece('b', 'r'),
  q: piece('b', 'q'),
  k: piece('b', 'k'),
};

/**
 * FEN letter for a piece (uppercase for White)
 */
export function pieceToChar(p: Piece): string {
  return p.color === 'w' ? p.kind.toUpperCase() : p.kind;
}

function parsePlacement(field: string): (Piece | null)[] | string {
  const rows = field.split('/');
  if (rows.length !== 8) {
    return `expected 8 ranks, got ${rows.length}`;
  }

  const squares = new Array<Piece | null>(64).fill(null);
  for (let r = 0; r < 8; r++) {
    const rank = 7 - r;
    let file = 0;
    for (const char of rows[r] ?? '') {
      if (char >= '1' && char <= '8') {
        file += Number.parseInt(char, 10);
        continue;
      }
      const p = FEN_PIECES[char];
      if (!p) {
        return `unknown piece "${char}"`;
      }
      if (file > 7) {
        return `rank ${rank + 1} has more than 8 files`;
      }
      squares[rank * 8 + file] = p;
      file++;
    }
    if (file !== 8) {
      return `rank ${rank + 1} has ${file} files`;
    }
  }
  return squares;
}

function parseCastling(field: string): CastlingRights | string {
  if (field === '-') return NO_CASTLING;
  if (!/^[KQkq]+$/.test(field)) {
    return `bad castling field "${field}"`;
  }
  return {
    whiteKingside: field.includes('K'),
    whiteQueenside: field.includes('Q'),
    blackKingside: field.includes('k'),
    blackQueenside: field.includes('q'),
  };
}

/**
 * Drop castling flags whose king or rook is not on its home square
 */
function sanitizeCastling(squares: readonly (Piece | null)[], rights: CastlingRights): CastlingRights {
  const holds = (index: number, color: Color, kind: PieceKind): boolean => {
    const p = squares[index];
    return p?.color === color && p.kind === kind;
  };
  const whiteKing = holds(4, 'w', 'k');
  const blackKing = holds(60, 'b', 'k');
  return {
    whiteKingside: rights.whiteKingside && whiteKing && holds(7, 'w', 'r'),
    whiteQueenside: rights.whiteQueenside && whiteKing && holds(0, 'w', 'r'),
    blackKingside: rights.blackKingside && blackKing && holds(63, 'b', 'r'),
    blackQueenside: rights.blackQueenside && blackKing && holds(56, 'b', 'r'),
  };
}

function countKings(squares: readonly (Piece | null)[], color: Color): number {
  return squares.filter((p) => p?.kind === 'k' && p.color === color).length;
}

/**
 * Parse a FEN string into a Board.
 *
 * Missing halfmove/fullmove fields default to 0 and 1.
 */
export function parseFen(fen: string): Result<Board, InvalidFenError> {
  const fields = fen.trim().split(/\s+/);
  const fail = (reason: string): Result<Board, InvalidFenError> =>
    Result.err(new InvalidFenError(fen, reason));

  if (fields.length < 4 || fields.length > 6) {
    return fail(`expected 4 to 6 fields, got ${fields.length}`);
  }
  const [placementField = '', turnField = '', castlingField = '', epField = ''] = fields;

  const squares = parsePlacement(placementField);
  if (typeof squares === 'string') return fail(squares);

  if (turnField !== 'w' && turnField !== 'b') {
    return fail(`bad side to move "${turnField}"`);
  }
  const turn: Color = turnField;

  const castling = parseCastling(castlingField);
  if (typeof castling === 'string') return fail(castling);

  let enPassant: Square | null = null;
  if (epField !== '-') {
    enPassant = parseSquare(epField);
    const expectedRank = turn === 'w' ? 5 : 2;
    if (!enPassant || enPassant.rank !== expectedRank) {
      return fail(`bad en passant square "${epField}"`);
    }
  }

  const halfmoveClock = Number.parseInt(fields[4] ?? '0', 10);
  const fullmoveNumber = Number.parseInt(fields[5] ?? '1', 10);
  if (Number.isNaN(halfmoveClock) || halfmoveClock < 0) {
    return fail(`bad halfmove clock "${fields[4] ?? ''}"`);
  }
  if (Number.isNaN(fullmoveNumber) || fullmoveNumber < 1) {
    return fail(`bad fullmove number "${fields[5] ?? ''}"`);
  }

  if (countKings(squares, 'w') !== 1 || countKings(squares, 'b') !== 1) {
    return fail('each side needs exactly one king');
  }
  const backRankPawn = squares.some((p, i) => p?.kind === 'p' && (i < 8 || i >= 56));
  if (backRankPawn) {
    return fail('pawns cannot stand on the first or last rank');
  }
  if (enPassant) {
    // The pawn that just double-pushed stands one rank past the target
    const pushed = squares[squareIndex(enPassant) + (turn === 'w' ? -8 : 8)];
    if (pushed?.kind !== 'p' || pushed.color === turn) {
      return fail(`no pawn to capture en passant on ${epField}`);
    }
  }

  const board: Board = {
    squares,
    turn,
    castling: sanitizeCastling(squares, castling),
    enPassant,
    halfmoveClock,
    fullmoveNumber,
  };
  if (isInCheck(board, opposite(turn))) {
    return fail('side not to move is in check');
  }
  return Result.ok(board);
}

/**
 * Piece placement field of a FEN
 */
export function placementToFen(board: Board): string {
  const rows: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < 8; file++) {
      const p = board.squares[rank * 8 + file];
      if (p) {
        if (empty > 0) row += String(empty);
        empty = 0;
        row += pieceToChar(p);
      } else {
        empty++;
      }
    }
    if (empty > 0) row += String(empty);
    rows.push(row);
  }
  return rows.join('/');
}

/**
 * Castling field of a FEN
 */
export function castlingToFen(rights: CastlingRights): string {
  const field =
    (rights.whiteKingside ? 'K' : '') +
    (rights.whiteQueenside ? 'Q' : '') +
    (rights.blackKingside ? 'k' : '') +
    (rights.blackQueenside ? 'q' : '');
  return field || '-';
}

/**
 * Serialise a board to FEN
 */
export function toFen(board: Board): string {
  return [
    placementToFen(board),
    board.turn,
    castlingToFen(board.castling),
    board.enPassant ? squareName(board.enPassant) : '-',
    String(board.halfmoveClock),
    String(board.fullmoveNumber),
  ].join(' ');
}
