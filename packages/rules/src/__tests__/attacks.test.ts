import { describe, it, expect } from 'vitest';

import { attackedSquares, attackersOf, checkers, findPins, isInCheck } from '../attacks.js';
import { createInitialBoard } from '../board.js';
import { legalMovesFrom } from '../movegen.js';
import { squareIndex } from '../square.js';

import { boardOf, sq } from './helpers.js';

describe('attacks', () => {
  it('maps the squares White attacks from the initial position', () => {
    const attacked = attackedSquares(createInitialBoard(), 'w');
    expect(attacked.has(squareIndex(sq('f3')))).toBe(true);
    expect(attacked.has(squareIndex(sq('d2')))).toBe(true);
    expect(attacked.has(squareIndex(sq('e4')))).toBe(false);
    expect(attacked.has(squareIndex(sq('a1')))).toBe(false);
  });

  it('stops sliders at the first occupied square', () => {
    const attacked = attackedSquares(boardOf('k7/8/8/8/8/8/8/R2n3K b - - 0 1'), 'w');
    expect(attacked.has(squareIndex(sq('d1')))).toBe(true);
    expect(attacked.has(squareIndex(sq('e1')))).toBe(false);
    expect(attacked.has(squareIndex(sq('a8')))).toBe(true);
  });

  it('lets pawns attack diagonally only', () => {
    const attacked = attackedSquares(boardOf('4k3/8/8/8/8/8/4P3/4K3 w - - 0 1'), 'w');
    expect(attacked.has(squareIndex(sq('d3')))).toBe(true);
    expect(attacked.has(squareIndex(sq('f3')))).toBe(true);
    expect(attacked.has(squareIndex(sq('e3')))).toBe(false);
  });

  it('detects check and the checking pieces', () => {
    const board = boardOf('k7/8/8/8/8/8/8/R6K b - - 0 1');
    expect(isInCheck(board, 'b')).toBe(true);
    expect(isInCheck(board, 'w')).toBe(false);
    expect(checkers(board, 'b')).toEqual([sq('a1')]);
  });

  it('finds every attacker of a square', () => {
    const board = boardOf('4k3/8/8/8/8/2N5/1P6/R3K3 w - - 0 1');
    const attackers = attackersOf(board, sq('a3'), 'w');
    expect(attackers).toHaveLength(2);
    expect(attackers).toContainEqual(sq('b2'));
    expect(attackers).toContainEqual(sq('a1'));
  });

  it('finds pins against the king', () => {
    const board = boardOf('3k4/4r3/8/8/8/8/4N3/4K3 w - - 0 1');
    expect(findPins(board, 'w')).toEqual([
      { pinned: sq('e2'), pinner: sq('e7'), direction: [0, 1] },
    ]);
    expect(legalMovesFrom(board, sq('e2'))).toEqual([]);
  });
});
