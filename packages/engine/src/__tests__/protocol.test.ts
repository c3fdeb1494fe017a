import { describe, it, expect } from 'vitest';

import { MalformedResponseError } from '../errors.js';
import {
  goCommand,
  parseBestMoveLine,
  parseEngineLine,
  parseInfoLine,
  positionCommand,
  setOptionCommand,
} from '../uci/protocol.js';

describe('UCI protocol', () => {
  describe('command builders', () => {
    it('builds a position command from a FEN', () => {
      expect(positionCommand('7k/8/8/8/8/8/8/4K3 w - - 0 1')).toBe(
        'position fen 7k/8/8/8/8/8/8/4K3 w - - 0 1',
      );
    });

    it('builds go commands from the budget', () => {
      expect(goCommand({ depth: 12 })).toBe('go depth 12');
      expect(goCommand({ movetimeMs: 250 })).toBe('go movetime 250');
      expect(goCommand({ depth: 8, movetimeMs: 500 })).toBe('go depth 8 movetime 500');
      expect(goCommand({})).toBe('go movetime 100');
    });

    it('builds setoption commands', () => {
      expect(setOptionCommand('Hash', 64)).toBe('setoption name Hash value 64');
      expect(setOptionCommand('UCI_ShowWDL', true)).toBe('setoption name UCI_ShowWDL value true');
    });
  });

  describe('parseInfoLine', () => {
    it('reads a typical search line', () => {
      const info = parseInfoLine(
        'info depth 18 seldepth 24 multipv 1 score cp 35 nodes 120000 nps 900000 hashfull 12 tbhits 0 time 133 pv e2e4 e7e5 g1f3',
      ).unwrap();

      expect(info).toEqual({
        depth: 18,
        seldepth: 24,
        multipv: 1,
        score: { kind: 'cp', value: 35 },
        nodes: 120000,
        nps: 900000,
        hashfull: 12,
        timeMs: 133,
        pv: ['e2e4', 'e7e5', 'g1f3'],
      });
    });

    it('reads mate scores and bounds', () => {
      expect(parseInfoLine('info depth 5 score mate -2 pv h7h8').unwrap().score).toEqual({
        kind: 'mate',
        moves: -2,
      });
      expect(parseInfoLine('info depth 9 score cp 40 lowerbound').unwrap().score).toEqual({
        kind: 'cp',
        value: 40,
        bound: 'lower',
      });
    });

    it('skips wdl triples and unknown keys', () => {
      const info = parseInfoLine('info depth 3 score cp 10 wdl 300 500 200 custom pv d2d4').unwrap();
      expect(info.depth).toBe(3);
      expect(info.pv).toEqual(['d2d4']);
    });

    it('keeps info string text', () => {
      expect(parseInfoLine('info string NNUE evaluation enabled').unwrap()).toEqual({
        pv: [],
        text: 'NNUE evaluation enabled',
      });
    });

    it('reads currmove', () => {
      expect(parseInfoLine('info depth 7 currmove e7e8q currmovenumber 2').unwrap().currmove).toBe(
        'e7e8q',
      );
    });

    it('rejects a non-integer numeric field', () => {
      const result = parseInfoLine('info depth deep');
      expect(result.isErr).toBe(true);
      if (result.isErr) {
        expect(result.error).toBeInstanceOf(MalformedResponseError);
        expect(result.error.message).toBe('Malformed engine response "info depth deep": depth needs an integer');
      }
    });

    it('rejects a broken score', () => {
      const result = parseInfoLine('info score pawns 3');
      expect(result.isErr && result.error.detail).toBe('score needs "cp <n>" or "mate <n>"');
    });

    it('rejects a bad move in the pv', () => {
      const result = parseInfoLine('info depth 2 score cp 1 pv e2e4 zz99');
      expect(result.isErr && result.error.detail).toBe('bad move "zz99" in pv');
    });
  });

  describe('parseBestMoveLine', () => {
    it('reads a move with ponder', () => {
      expect(parseBestMoveLine('bestmove e2e4 ponder e7e5').unwrap()).toEqual({
        move: 'e2e4',
        ponder: 'e7e5',
      });
    });

    it('reads a promotion', () => {
      expect(parseBestMoveLine('bestmove a7a8q').unwrap()).toEqual({ move: 'a7a8q', ponder: null });
    });

    it('maps (none) and 0000 to no move', () => {
      expect(parseBestMoveLine('bestmove (none)').unwrap().move).toBeNull();
      expect(parseBestMoveLine('bestmove 0000').unwrap().move).toBeNull();
    });

    it('rejects a missing or bad move', () => {
      const missing = parseBestMoveLine('bestmove');
      expect(missing.isErr && missing.error.detail).toBe('bestmove needs a move');

      const bad = parseBestMoveLine('bestmove e9e4');
      expect(bad.isErr && bad.error.detail).toBe('bad move "e9e4"');

      const ponder = parseBestMoveLine('bestmove e2e4 ponder');
      expect(ponder.isErr && ponder.error.detail).toBe('ponder needs a move');
    });
  });

  describe('parseEngineLine', () => {
    it('classifies handshake lines', () => {
      expect(parseEngineLine('uciok').unwrap()).toEqual({ type: 'uciok' });
      expect(parseEngineLine('readyok').unwrap()).toEqual({ type: 'readyok' });
      expect(parseEngineLine('id name Some Engine 16').unwrap()).toEqual({
        type: 'id',
        field: 'name',
        value: 'Some Engine 16',
      });
      expect(parseEngineLine('option name Hash type spin default 16').unwrap()).toEqual({
        type: 'option',
        text: 'name Hash type spin default 16',
      });
    });

    it('passes unknown lines through', () => {
      expect(parseEngineLine('Stockfish 16 by the Stockfish developers').unwrap()).toEqual({
        type: 'other',
        line: 'Stockfish 16 by the Stockfish developers',
      });
    });

    it('parses info and bestmove lines', () => {
      expect(parseEngineLine('bestmove g1f3').unwrap()).toEqual({
        type: 'bestmove',
        bestMove: { move: 'g1f3', ponder: null },
      });
      expect(parseEngineLine('info depth 1 score cp 5 pv g1f3').unwrap()).toEqual({
        type: 'info',
        info: { depth: 1, score: { kind: 'cp', value: 5 }, pv: ['g1f3'] },
      });
    });

    it('reports malformed info lines', () => {
      expect(parseEngineLine('info nodes many').isErr).toBe(true);
    });
  });
});
