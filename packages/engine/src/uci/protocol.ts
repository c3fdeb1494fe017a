/**
 * UCI line protocol: command builders and engine output parsing
 */

import { Result } from '@badrap/result';

import { MalformedResponseError } from '../errors.js';
import type { AnalysisBudget } from '../types.js';

/**
 * Time budget used when a request names neither depth nor movetime
 */
export const DEFAULT_MOVETIME_MS = 100;

export const UCI = 'uci';
export const IS_READY = 'isready';
export const UCI_NEW_GAME = 'ucinewgame';
export const STOP = 'stop';
export const QUIT = 'quit';

/**
 * Score as the engine reports it, from the side to move's point of view
 */
export type UciScore =
  | { readonly kind: 'cp'; readonly value: number; readonly bound?: 'lower' | 'upper' }
  | { readonly kind: 'mate'; readonly moves: number; readonly bound?: 'lower' | 'upper' };

/**
 * Fields of an `info` line. Absent fields were not sent.
 */
export interface UciInfo {
  depth?: number;
  seldepth?: number;
  multipv?: number;
  score?: UciScore;
  nodes?: number;
  nps?: number;
  timeMs?: number;
  hashfull?: number;
  currmove?: string;
  pv: string[];
  /** Free text after `info string` */
  text?: string;
}

export interface UciBestMove {
  /** null for `(none)` or `0000` */
  move: string | null;
  ponder: string | null;
}

/**
 * One parsed line of engine output
 */
export type UciMessage =
  | { type: 'uciok' }
  | { type: 'readyok' }
  | { type: 'id'; field: string; value: string }
  | { type: 'option'; text: string }
  | { type: 'info'; info: UciInfo }
  | { type: 'bestmove'; bestMove: UciBestMove }
  | { type: 'other'; line: string };

const MOVE_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

type NumericInfoField = 'depth' | 'seldepth' | 'multipv' | 'nodes' | 'nps' | 'timeMs' | 'hashfull';

/**
 * Integer-valued info fields and the property each one fills
 */
const NUMERIC_FIELDS: Record<string, NumericInfoField> = {
  depth: 'depth',
  seldepth: 'seldepth',
  multipv: 'multipv',
  nodes: 'nodes',
  nps: 'nps',
  time: 'timeMs',
  hashfull: 'hashfull',
};

/**
 * Integer fields that are read and dropped
 */
const IGNORED_NUMERIC_FIELDS = new Set(['tbhits', 'sbhits', 'cpuload', 'currmovenumber']);

// Command builders

export function positionCommand(fen: string): string {
  return `position fen ${fen}`;
}

export function goCommand(budget: AnalysisBudget): string {
  const parts = ['go'];
  if (budget.depth !== undefined) parts.push(`depth ${budget.depth}`);
  if (budget.movetimeMs !== undefined) parts.push(`movetime ${budget.movetimeMs}`);
  if (parts.length === 1) parts.push(`movetime ${DEFAULT_MOVETIME_MS}`);
  return parts.join(' ');
}

export function setOptionCommand(name: string, value: string | number | boolean): string {
  return `setoption name ${name} value ${String(value)}`;
}

function isMoveToken(token: string): boolean {
  return MOVE_PATTERN.test(token) || token === '0000';
}

function parseInteger(token: string | undefined): number | null {
  if (token === undefined || !/^-?\d+$/.test(token)) return null;
  return Number.parseInt(token, 10);
}

/**
 * Parse an `info` line
 */
export function parseInfoLine(line: string): Result<UciInfo, MalformedResponseError> {
  const tokens = line.trim().split(/\s+/);
  const fail = (detail: string): Result<UciInfo, MalformedResponseError> =>
    Result.err(new MalformedResponseError(line, detail));

  if (tokens[0] !== 'info') {
    return fail('not an info line');
  }

  const info: UciInfo = { pv: [] };
  let i = 1;
  while (i < tokens.length) {
    const key = tokens[i] ?? '';
    i++;

    const numericField = NUMERIC_FIELDS[key];
    if (numericField !== undefined || IGNORED_NUMERIC_FIELDS.has(key)) {
      const value = parseInteger(tokens[i]);
      if (value === null) return fail(`${key} needs an integer`);
      if (numericField !== undefined) info[numericField] = value;
      i++;
      continue;
    }

    switch (key) {
      case 'score': {
        const kind = tokens[i];
        const value = parseInteger(tokens[i + 1]);
        if ((kind !== 'cp' && kind !== 'mate') || value === null) {
          return fail('score needs "cp <n>" or "mate <n>"');
        }
        i += 2;
        let bound: 'lower' | 'upper' | undefined;
        if (tokens[i] === 'lowerbound' || tokens[i] === 'upperbound') {
          bound = tokens[i] === 'lowerbound' ? 'lower' : 'upper';
          i++;
        }
        const base: UciScore = kind === 'cp' ? { kind, value } : { kind, moves: value };
        info.score = bound ? { ...base, bound } : base;
        break;
      }
      case 'wdl':
        i += 3;
        break;
      case 'currmove': {
        const move = tokens[i];
        if (move === undefined || !isMoveToken(move)) return fail('currmove needs a move');
        info.currmove = move;
        i++;
        break;
      }
      case 'pv': {
        const moves = tokens.slice(i);
        const bad = moves.find((move) => !isMoveToken(move));
        if (bad !== undefined) return fail(`bad move "${bad}" in pv`);
        info.pv = moves;
        i = tokens.length;
        break;
      }
      case 'string':
        info.text = tokens.slice(i).join(' ');
        i = tokens.length;
        break;
      case 'refutation':
      case 'currline':
        i = tokens.length;
        break;
      default:
        // Unknown keys are skipped; engines add their own
        break;
    }
  }
  return Result.ok(info);
}

/**
 * Parse a `bestmove` line
 */
export function parseBestMoveLine(line: string): Result<UciBestMove, MalformedResponseError> {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'bestmove' || tokens[1] === undefined) {
    return Result.err(new MalformedResponseError(line, 'bestmove needs a move'));
  }

  const raw = tokens[1];
  const move = raw === '(none)' || raw === '0000' ? null : raw;
  if (move !== null && !MOVE_PATTERN.test(move)) {
    return Result.err(new MalformedResponseError(line, `bad move "${raw}"`));
  }

  let ponder: string | null = null;
  if (tokens[2] === 'ponder') {
    const candidate = tokens[3];
    if (candidate === undefined || !MOVE_PATTERN.test(candidate)) {
      return Result.err(new MalformedResponseError(line, 'ponder needs a move'));
    }
    ponder = candidate;
  }
  return Result.ok({ move, ponder });
}

/**
 * Classify and parse one line of engine output
 */
export function parseEngineLine(line: string): Result<UciMessage, MalformedResponseError> {
  const trimmed = line.trim();
  const [head = '', ...rest] = trimmed.split(/\s+/);

  switch (head) {
    case 'uciok':
      return Result.ok({ type: 'uciok' });
    case 'readyok':
      return Result.ok({ type: 'readyok' });
    case 'id': {
      const [field = '', ...value] = rest;
      return Result.ok({ type: 'id', field, value: value.join(' ') });
    }
    case 'option':
      return Result.ok({ type: 'option', text: rest.join(' ') });
    case 'info':
      return parseInfoLine(trimmed).map((info): UciMessage => ({ type: 'info', info }));
    case 'bestmove':
      return parseBestMoveLine(trimmed).map((bestMove): UciMessage => ({ type: 'bestmove', bestMove }));
    default:
      return Result.ok({ type: 'other', line: trimmed });
  }
}
