/**
 * Parsing of REPL input lines for the play command
 */

import {
  type PieceKind,
  type Square,
  parseCoordinateMove,
  parseSquare,
} from '@chesslens/rules';

export type PlayInput =
  | { kind: 'move'; from: Square; to: Square; promotion?: PieceKind }
  | { kind: 'promote'; piece: PieceKind }
  | { kind: 'cancel' }
  | { kind: 'moves'; square: Square | null }
  | { kind: 'undo' }
  | { kind: 'new'; fen?: string }
  | { kind: 'flip' }
  | { kind: 'board' }
  | { kind: 'mate' }
  | { kind: 'eval' }
  | { kind: 'fen' }
  | { kind: 'pgn' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'unknown'; text: string };

const PIECE_LETTERS: Record<string, PieceKind> = {
  q: 'q',
  r: 'r',
  b: 'b',
  n: 'n',
  k: 'k',
  p: 'p',
};

export const PLAY_HELP = `Commands:
  e2e4, e2 e4, e7e8q   move a piece (promotion piece optional)
  q | r | b | n        choose the piece for a pending promotion
  cancel               drop a pending promotion
  moves [square]       list legal moves, or the targets of one piece
  undo                 take back the last move
  new [fen]            start over, optionally from a FEN
  flip                 turn the board around
  board                redraw the board with the engine move
  mate                 toggle mate hunting
  eval                 show the engine evaluation
  fen                  print the position as FEN
  pgn                  print the moves so far
  help                 show this help
  quit                 leave`;

/**
 * Classify one line typed at the play prompt
 */
export function parsePlayInput(line: string): PlayInput {
  const text = line.trim();
  if (text === '') return { kind: 'empty' };

  const [head = '', ...rest] = text.split(/\s+/);
  const command = head.toLowerCase();

  const piece = rest.length === 0 ? PIECE_LETTERS[command] : undefined;
  if (piece) return { kind: 'promote', piece };

  switch (command) {
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'cancel':
    case 'c':
      return { kind: 'cancel' };
    case 'undo':
      return { kind: 'undo' };
    case 'flip':
      return { kind: 'flip' };
    case 'board':
      return { kind: 'board' };
    case 'mate':
      return { kind: 'mate' };
    case 'eval':
      return { kind: 'eval' };
    case 'fen':
      return { kind: 'fen' };
    case 'pgn':
      return { kind: 'pgn' };
    case 'new': {
      const fen = rest.join(' ');
      return fen ? { kind: 'new', fen } : { kind: 'new' };
    }
    case 'moves': {
      const [name] = rest;
      if (name === undefined) return { kind: 'moves', square: null };
      const square = parseSquare(name.toLowerCase());
      return square ? { kind: 'moves', square } : { kind: 'unknown', text };
    }
    default:
      break;
  }

  const move = parseCoordinateMove(text);
  if (move) {
    return move.promotion
      ? { kind: 'move', from: move.from, to: move.to, promotion: move.promotion }
      : { kind: 'move', from: move.from, to: move.to };
  }
  return { kind: 'unknown', text };
}
