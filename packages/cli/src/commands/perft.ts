/**
 * Perft command implementation: move generator node counts
 */

import { perft, perftDivide, parseFen, STARTING_FEN } from '@chesslens/rules';

import { InputError } from '../errors/index.js';
import { formatCount, formatDuration, formatRate } from '../progress/formatters.js';
import { Reporter } from '../progress/reporter.js';

export interface PerftReport {
  fen: string;
  depth: number;
  nodes: number;
  /** Per-move counts in coordinate notation, when divided */
  divide: Map<string, number> | null;
  elapsedMs: number;
}

/**
 * Count the leaf nodes of a position's move tree
 *
 * @throws InputError for an unparseable FEN
 */
export function runPerft(
  fen: string,
  depth: number,
  divide: boolean,
  now: () => number = Date.now,
): PerftReport {
  const parsed = parseFen(fen);
  if (parsed.isErr) {
    throw new InputError(parsed.error.message, 'Pass a complete six-field FEN with --fen');
  }

  const startedAt = now();
  let nodes: number;
  let breakdown: Map<string, number> | null = null;
  if (divide) {
    breakdown = perftDivide(parsed.value, depth);
    nodes = 0;
    for (const count of breakdown.values()) nodes += count;
  } else {
    nodes = perft(parsed.value, depth);
  }

  return { fen, depth, nodes, divide: breakdown, elapsedMs: now() - startedAt };
}

/**
 * Lines printed for a perft report
 */
export function formatPerftReport(report: PerftReport): string[] {
  const lines: string[] = [];
  if (report.divide) {
    const moves = [...report.divide.keys()].sort();
    for (const move of moves) {
      lines.push(`${move}: ${formatCount(report.divide.get(move) ?? 0)}`);
    }
    lines.push('');
  }
  lines.push(`Depth ${report.depth}: ${formatCount(report.nodes)} nodes`);
  lines.push(
    `Time: ${formatDuration(report.elapsedMs)} (${formatRate(report.nodes, report.elapsedMs)})`,
  );
  return lines;
}

/**
 * Main perft command handler
 */
export function perftCommand(depth: number, rawOptions: Record<string, unknown>): void {
  const fen = typeof rawOptions['fen'] === 'string' ? rawOptions['fen'] : STARTING_FEN;
  const reporter = new Reporter({ color: rawOptions['color'] !== false });

  reporter.printMessage(reporter.colors.dim(fen));
  const report = runPerft(fen, depth, rawOptions['divide'] === true);
  for (const line of formatPerftReport(report)) {
    reporter.printMessage(line);
  }
}
