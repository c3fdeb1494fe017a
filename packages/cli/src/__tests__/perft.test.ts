import { describe, it, expect } from 'vitest';

import { STARTING_FEN } from '@chesslens/rules';
import { fenOf } from '@chesslens/test-utils';

import { formatPerftReport, runPerft } from '../commands/perft.js';
import { InputError } from '../errors/index.js';

function clock(...times: number[]): () => number {
  return () => times.shift() ?? 0;
}

describe('runPerft', () => {
  it('should count the start position to depth 2', () => {
    const report = runPerft(STARTING_FEN, 2, false, clock(0, 250));

    expect(report.nodes).toBe(400);
    expect(report.divide).toBeNull();
    expect(report.elapsedMs).toBe(250);
  });

  it('should sum the divided counts', () => {
    const report = runPerft(STARTING_FEN, 1, true, clock());

    expect(report.nodes).toBe(20);
    expect(report.divide?.size).toBe(20);
    expect(report.divide?.get('g1f3')).toBe(1);
  });

  it('should reject a bad FEN', () => {
    expect(() => runPerft('8/8 w - - 0 1', 1, false)).toThrow(InputError);
  });
});

describe('formatPerftReport', () => {
  it('should print the total and the rate', () => {
    const report = runPerft(STARTING_FEN, 2, false, clock(0, 250));

    expect(formatPerftReport(report)).toEqual(['Depth 2: 400 nodes', 'Time: 250ms (2k/s)']);
  });

  it('should list divided moves in order', () => {
    const report = runPerft(fenOf('kingsOnly'), 1, true, clock(0, 0));

    expect(formatPerftReport(report)).toEqual([
      'e1d1: 1',
      'e1d2: 1',
      'e1e2: 1',
      'e1f1: 1',
      'e1f2: 1',
      '',
      'Depth 1: 5 nodes',
      'Time: 0ms (-)',
    ]);
  });
});
