import { describe, it, expect } from 'vitest';

import { parseSquare } from '@chesslens/rules';

import { parsePlayInput } from '../commands/play-input.js';

function sq(name: string) {
  const square = parseSquare(name);
  if (!square) throw new Error(`bad square ${name}`);
  return square;
}

describe('parsePlayInput', () => {
  it('should parse coordinate moves', () => {
    expect(parsePlayInput('e2e4')).toEqual({ kind: 'move', from: sq('e2'), to: sq('e4') });
  });

  it('should parse a move with a promotion piece', () => {
    expect(parsePlayInput('e7e8q')).toEqual({
      kind: 'move',
      from: sq('e7'),
      to: sq('e8'),
      promotion: 'q',
    });
  });

  it('should read single piece letters as promotion choices', () => {
    expect(parsePlayInput('n')).toEqual({ kind: 'promote', piece: 'n' });
    expect(parsePlayInput(' Q ')).toEqual({ kind: 'promote', piece: 'q' });
  });

  it('should parse commands case-insensitively', () => {
    expect(parsePlayInput('UNDO')).toEqual({ kind: 'undo' });
    expect(parsePlayInput('exit')).toEqual({ kind: 'quit' });
    expect(parsePlayInput('?')).toEqual({ kind: 'help' });
    expect(parsePlayInput('c')).toEqual({ kind: 'cancel' });
    expect(parsePlayInput('board')).toEqual({ kind: 'board' });
  });

  it('should keep the FEN after new', () => {
    expect(parsePlayInput('new 7k/8/8/8/8/8/8/4K3 w - - 0 1')).toEqual({
      kind: 'new',
      fen: '7k/8/8/8/8/8/8/4K3 w - - 0 1',
    });
    expect(parsePlayInput('new')).toEqual({ kind: 'new' });
  });

  it('should parse moves with and without a square', () => {
    expect(parsePlayInput('moves')).toEqual({ kind: 'moves', square: null });
    expect(parsePlayInput('moves G1')).toEqual({ kind: 'moves', square: sq('g1') });
    expect(parsePlayInput('moves z9')).toEqual({ kind: 'unknown', text: 'moves z9' });
  });

  it('should report blank and unknown lines', () => {
    expect(parsePlayInput('   ')).toEqual({ kind: 'empty' });
    expect(parsePlayInput('castle')).toEqual({ kind: 'unknown', text: 'castle' });
  });
});
