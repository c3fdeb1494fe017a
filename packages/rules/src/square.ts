/**
 * Square Utilities
 *
 * Helper functions for working with squares, indices and algebraic names.
 */

import type { Square } from './types.js';

/**
 * File letters a-h mapped to indices 0-7
 */
const FILE_TO_INDEX: Record<string, number> = {
  a: 0,
  b: 1,
  c: 2,
  d: 3,
  e: 4,
  f: 5,
  g: 6,
  h: 7,
};

/**
 * Index 0-7 mapped to file letters
 */
export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/**
 * All 64 squares, indexed a1 = 0 ... h8 = 63. Entries are frozen and shared,
 * so every square value handed out by this module is one of these.
 */
export const SQUARES: readonly Square[] = Array.from({ length: 64 }, (_, i) =>
  Object.freeze({ file: i % 8, rank: Math.floor(i / 8) }),
);

/**
 * Check that file and rank indices are on the board
 */
export function onBoard(file: number, rank: number): boolean {
  return file >= 0 && file <= 7 && rank >= 0 && rank <= 7;
}

/**
 * Get the square at file/rank indices, or null when off the board
 */
export function squareAt(file: number, rank: number): Square | null {
  if (!onBoard(file, rank)) {
    return null;
  }
  return SQUARES[rank * 8 + file] ?? null;
}

/**
 * Get the 0-63 index of a square
 */
export function squareIndex(square: Square): number {
  return square.rank * 8 + square.file;
}

/**
 * Get the square for a 0-63 index
 * @throws RangeError when the index is outside 0-63
 */
export function squareFromIndex(index: number): Square {
  const square = SQUARES[index];
  if (!square) {
    throw new RangeError(`Square index out of range: ${index}`);
  }
  return square;
}

/**
 * Get algebraic name ("e4") of a square
 */
export function squareName(square: Square): string {
  return `${FILE_NAMES[square.file]}${square.rank + 1}`;
}

/**
 * Parse an algebraic square name. Returns null for anything that is not a-h1-8.
 */
export function parseSquare(name: string): Square | null {
  if (name.length !== 2) return null;
  const file = FILE_TO_INDEX[name[0]?.toLowerCase() ?? ''];
  const rank = Number.parseInt(name[1] ?? '', 10) - 1;
  if (file === undefined || Number.isNaN(rank)) return null;
  return squareAt(file, rank);
}

/**
 * Check two squares for equality
 */
export function sameSquare(a: Square, b: Square): boolean {
  return a.file === b.file && a.rank === b.rank;
}

/**
 * Check if a square is a light square
 */
export function isLightSquare(square: Square): boolean {
  return (square.file + square.rank) % 2 === 1;
}
