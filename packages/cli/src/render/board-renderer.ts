/**
 * Board rendering for the terminal
 *
 * Uses brackets to distinguish pieces from empty squares.
 */

import type { Suggestion } from '@chesslens/engine';
import {
  type Board,
  type MoveRequest,
  type Piece,
  type PieceKind,
  type Square,
  FILE_NAMES,
  pieceAt,
  pieceToChar,
  sameSquare,
  squareAt,
} from '@chesslens/rules';

import type { BoardOrientation } from '../config/schema.js';
import { createColorFns } from '../progress/colors.js';
import type { ColorFunctions } from '../progress/types.js';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: BoardOrientation;
  /** Chess glyphs instead of FEN letters */
  unicode?: boolean;
  /** Selected piece, drawn as <P> */
  selected?: Square | null;
  /** Legal destinations of the selected piece: * when empty, (p) on captures */
  targets?: readonly Square[];
  /** Highlight the last move played */
  lastMove?: MoveRequest | null;
  /** Engine move to mark */
  suggestion?: Suggestion | null;
  colors?: ColorFunctions;
}

const GLYPHS: Record<PieceKind, { w: string; b: string }> = {
  k: { w: '♔', b: '♚' },
  q: { w: '♕', b: '♛' },
  r: { w: '♖', b: '♜' },
  b: { w: '♗', b: '♝' },
  n: { w: '♘', b: '♞' },
  p: { w: '♙', b: '♟' },
};

function symbolOf(p: Piece, unicode: boolean): string {
  return unicode ? GLYPHS[p.kind][p.color] : pieceToChar(p);
}

function touches(move: MoveRequest | null | undefined, square: Square): boolean {
  return !!move && (sameSquare(move.from, square) || sameSquare(move.to, square));
}

/**
 * Render a position as a text board
 *
 * Example output:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  [P]  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P]  .  [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 */
export function renderBoard(board: Board, options: BoardRenderOptions = {}): string {
  const perspective = options.perspective ?? 'white';
  const unicode = options.unicode ?? false;
  const c = options.colors ?? createColorFns(false);
  const targets = options.targets ?? [];

  const fileOrder = perspective === 'white' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];
  const rankOrder = perspective === 'white' ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];
  const fileLabels = `   ${fileOrder.map((file) => FILE_NAMES[file] ?? '?').join('   ')}`;

  const lines: string[] = [fileLabels];

  for (const rank of rankOrder) {
    const cells: string[] = [];
    for (const file of fileOrder) {
      const square = squareAt(file, rank);
      if (!square) continue;

      const occupant = pieceAt(board, square);
      const isTarget = targets.some((target) => sameSquare(target, square));
      const isSelected = !!options.selected && sameSquare(options.selected, square);

      let cell: string;
      if (occupant) {
        const symbol = symbolOf(occupant, unicode);
        cell = isSelected ? `<${symbol}>` : isTarget ? `(${symbol})` : `[${symbol}]`;
      } else {
        cell = isTarget ? ' * ' : ' . ';
      }

      if (touches(options.suggestion?.move, square)) {
        cell = options.suggestion?.kind === 'mate' ? c.blue(cell) : c.red(cell);
      } else if (touches(options.lastMove, square)) {
        cell = c.highlight(cell);
      }
      cells.push(cell);
    }
    const label = String(rank + 1);
    lines.push(`${label} ${cells.join(' ')}  ${label}`);
  }

  lines.push(fileLabels);
  return lines.join('\n');
}
