/**
 * Formatting utilities tests
 */

import { describe, it, expect } from 'vitest';

import { type Move, parseCoordinateMove } from '@chesslens/rules';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { createColorFns } from '../progress/colors.js';
import {
  formatEvalBar,
  formatEvaluation,
  formatPv,
  formatSuggestion,
  getEvalVerbal,
} from '../progress/eval-formatter.js';
import {
  formatConfigDisplay,
  formatCount,
  formatDuration,
  formatRate,
} from '../progress/formatters.js';

const plain = createColorFns(false);

function move(text: string): Move {
  const parsed = parseCoordinateMove(text);
  if (!parsed) throw new Error(`bad move ${text}`);
  return { ...parsed, isCastle: false, isEnPassant: false };
}

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(5000)).toBe('5.0s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(60000)).toBe('1m 0s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('formatCount', () => {
  it('should group thousands', () => {
    expect(formatCount(20)).toBe('20');
    expect(formatCount(8902)).toBe('8,902');
    expect(formatCount(119060324)).toBe('119,060,324');
  });
});

describe('formatRate', () => {
  it('should scale to the largest unit', () => {
    expect(formatRate(12, 1000)).toBe('12/s');
    expect(formatRate(1000, 500)).toBe('2k/s');
    expect(formatRate(3_000_000, 1000)).toBe('3.0M/s');
  });

  it('should not divide by zero', () => {
    expect(formatRate(400, 0)).toBe('-');
  });
});

describe('formatConfigDisplay', () => {
  it('should list the engine and analysis settings', () => {
    const text = formatConfigDisplay(DEFAULT_CONFIG);
    expect(text).toContain('  Command: stockfish');
    expect(text).toContain('  Depth: unlimited');
    expect(text).toContain('  Move time: 100ms');
    expect(text).toContain('  Mate hunt: off');
  });

  it('should mark a disabled engine', () => {
    const text = formatConfigDisplay({
      ...DEFAULT_CONFIG,
      engine: { ...DEFAULT_CONFIG.engine, enabled: false },
    });
    expect(text).not.toContain('Command:');
    expect(text).toContain('disabled');
  });
});

describe('getEvalVerbal', () => {
  it('should describe the size of the edge', () => {
    expect(getEvalVerbal(10)).toBe('Equal');
    expect(getEvalVerbal(-60)).toBe('Slight edge Black');
    expect(getEvalVerbal(120)).toBe('White better');
    expect(getEvalVerbal(-250)).toBe('Black much better');
    expect(getEvalVerbal(400)).toBe('White winning');
    expect(getEvalVerbal(900)).toBe('White winning decisively');
  });
});

describe('formatEvaluation', () => {
  it('should show pawns with a verbal description', () => {
    expect(formatEvaluation({ kind: 'cp', value: 35 }, plain)).toBe('+0.35 (Slight edge White)');
    expect(formatEvaluation({ kind: 'cp', value: 0 }, plain)).toBe('+0.00 (Equal)');
    expect(formatEvaluation({ kind: 'cp', value: -180 }, plain)).toBe('-1.80 (Black much better)');
  });

  it('should show mates with the mating side', () => {
    expect(formatEvaluation({ kind: 'mate', moves: 3, winner: 'w' }, plain)).toBe(
      '#3 (White mates in 3)',
    );
    expect(formatEvaluation({ kind: 'mate', moves: 2, winner: 'b' }, plain)).toBe(
      '#-2 (Black mates in 2)',
    );
  });

  it('should describe a mate already on the board', () => {
    expect(formatEvaluation({ kind: 'mate', moves: 0, winner: 'b' }, plain)).toBe(
      '#-0 (Black has mated)',
    );
  });
});

describe('formatEvalBar', () => {
  it('should split the bar at equality', () => {
    expect(formatEvalBar(0, 10)).toBe('[█████░░░░░]');
  });

  it('should clamp to the display range', () => {
    expect(formatEvalBar(15, 4)).toBe('[████]');
    expect(formatEvalBar(-10, 4)).toBe('[░░░░]');
  });
});

describe('formatPv', () => {
  it('should show short lines whole', () => {
    expect(formatPv(['e2e4', 'e7e5'])).toBe('e2e4 e7e5');
    expect(formatPv([])).toBe('');
  });

  it('should truncate long lines', () => {
    const pv = ['e2e4', 'e7e5', 'g1f3', 'b8c6', 'f1b5', 'a7a6', 'b5a4', 'g8f6'];
    expect(formatPv(pv)).toBe('e2e4 e7e5 g1f3 b8c6 f1b5 a7a6 ...');
  });
});

describe('formatSuggestion', () => {
  it('should name best and mating moves', () => {
    expect(formatSuggestion({ move: move('e2e4'), kind: 'best' }, plain)).toBe('Best move: e2e4');
    expect(formatSuggestion({ move: move('a1a8'), kind: 'mate' }, plain)).toBe(
      'Mating move: a1a8',
    );
  });
});
