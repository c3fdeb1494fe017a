/**
 * Shared helpers for rules tests
 */

import type { Result } from '@badrap/result';

import type { Board } from '../board.js';
import { parseFen } from '../fen.js';
import type { Game } from '../game.js';
import { parseCoordinateMove } from '../notation.js';
import { parseSquare } from '../square.js';
import type { MoveRequest, Square } from '../types.js';

export function sq(name: string): Square {
  const square = parseSquare(name);
  if (!square) throw new Error(`bad square in test: ${name}`);
  return square;
}

export function req(text: string): MoveRequest {
  const request = parseCoordinateMove(text);
  if (!request) throw new Error(`bad move in test: ${text}`);
  return request;
}

export function boardOf(fen: string): Board {
  return parseFen(fen).unwrap();
}

/**
 * Play coordinate moves, failing the test on the first rejection
 */
export function play(game: Game, ...moves: string[]): void {
  for (const text of moves) {
    game.submitMove(req(text)).unwrap();
  }
}

export function errorOf<T, E extends Error>(result: Result<T, E>): E {
  if (result.isOk) throw new Error('expected an error result');
  return result.error;
}
