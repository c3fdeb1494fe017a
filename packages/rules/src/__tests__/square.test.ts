import { describe, it, expect } from 'vitest';

import {
  SQUARES,
  isLightSquare,
  parseSquare,
  sameSquare,
  squareAt,
  squareFromIndex,
  squareIndex,
  squareName,
} from '../square.js';

describe('square utilities', () => {
  describe('parseSquare', () => {
    it('parses algebraic names', () => {
      expect(parseSquare('e4')).toEqual({ file: 4, rank: 3 });
      expect(parseSquare('a1')).toEqual({ file: 0, rank: 0 });
      expect(parseSquare('h8')).toEqual({ file: 7, rank: 7 });
    });

    it('accepts uppercase files', () => {
      expect(parseSquare('E4')).toEqual({ file: 4, rank: 3 });
    });

    it('rejects anything off the board', () => {
      expect(parseSquare('i1')).toBeNull();
      expect(parseSquare('a9')).toBeNull();
      expect(parseSquare('a0')).toBeNull();
      expect(parseSquare('e')).toBeNull();
      expect(parseSquare('e44')).toBeNull();
    });
  });

  describe('squareAt', () => {
    it('returns null off the board', () => {
      expect(squareAt(-1, 0)).toBeNull();
      expect(squareAt(8, 0)).toBeNull();
      expect(squareAt(0, 8)).toBeNull();
    });

    it('hands out the shared square values', () => {
      expect(squareAt(0, 0)).toBe(SQUARES[0]);
      expect(squareAt(7, 7)).toBe(SQUARES[63]);
    });
  });

  it('converts between indices and names', () => {
    expect(squareIndex({ file: 7, rank: 7 })).toBe(63);
    expect(squareName(squareFromIndex(12))).toBe('e2');
    expect(() => squareFromIndex(64)).toThrow(RangeError);
  });

  it('compares squares by value', () => {
    expect(sameSquare({ file: 3, rank: 4 }, { file: 3, rank: 4 })).toBe(true);
    expect(sameSquare({ file: 3, rank: 4 }, { file: 4, rank: 3 })).toBe(false);
  });

  it('knows square colors', () => {
    expect(isLightSquare({ file: 0, rank: 0 })).toBe(false);
    expect(isLightSquare({ file: 7, rank: 0 })).toBe(true);
    expect(isLightSquare({ file: 3, rank: 0 })).toBe(true);
  });
});
