import { afterEach, describe, it, expect, vi } from 'vitest';

import { EngineBridge, EngineUnavailableError } from '@chesslens/engine';
import {
  InvalidFenError,
  InvalidPromotionKindError,
  NoPendingPromotionError,
  sameSquare,
} from '@chesslens/rules';
import { createFakeEngineFactory, fenOf, searchOutput } from '@chesslens/test-utils';

import { type AnalysisSource, AnalyzerSession } from '../session/analyzer-session.js';

import { StubSource, evaluationResult as result, legal, sq } from './stub-source.js';

function open(source: AnalysisSource | null, fen?: string, mateHunt = false): AnalyzerSession {
  return AnalyzerSession.create({ fen, bridge: source, mateHunt }).unwrap();
}

describe('AnalyzerSession', () => {
  describe('create', () => {
    it('should request analysis of the starting position', () => {
      const source = new StubSource();
      const session = open(source);

      expect(source.requests).toHaveLength(1);
      expect(source.requests[0]?.positionId).toBe(session.positionId);
      expect(session.snapshot().fen).toBe(fenOf('start'));
    });

    it('should reject a bad FEN', () => {
      const created = AnalyzerSession.create({ fen: 'not a fen' });

      expect(created.isErr).toBe(true);
      if (created.isErr) {
        expect(created.error).toBeInstanceOf(InvalidFenError);
      }
    });

    it('should play without an engine', () => {
      const session = open(null);
      const snapshot = session.snapshot();

      expect(snapshot.engineStatus).toBe('disabled');
      expect(snapshot.analysisDisabled).toBe(true);
      expect(snapshot.evaluation).toBeNull();
      expect(session.submitMove(sq('e2'), sq('e4')).isOk).toBe(true);
    });
  });

  describe('submitMove', () => {
    it('should apply a legal move and analyse the new position', () => {
      const source = new StubSource();
      const session = open(source);
      const before = session.positionId;

      const moved = session.submitMove(sq('e2'), sq('e4'));

      expect(moved.isOk && moved.value.status).toBe('applied');
      expect(session.positionId).not.toBe(before);
      expect(source.requests.map((r) => r.positionId)).toEqual([before, session.positionId]);
      expect(session.snapshot().board.turn).toBe('b');
      expect(session.snapshot().lastMove?.san).toBe('e4');
    });

    it('should leave everything alone for an illegal move', () => {
      const source = new StubSource();
      const session = open(source);
      const before = session.snapshot();

      const moved = session.submitMove(sq('e2'), sq('e5'));

      expect(moved.isErr).toBe(true);
      expect(session.positionId).toBe(before.positionId);
      expect(session.snapshot().fen).toBe(before.fen);
      expect(source.requests).toHaveLength(1);
    });
  });

  describe('promotion', () => {
    it('should wait for the piece before moving', () => {
      const source = new StubSource();
      const session = open(source, fenOf('promotion'));

      const moved = session.submitMove(sq('e7'), sq('e8'));

      expect(moved.isOk && moved.value.status).toBe('promotion_required');
      expect(session.pendingPromotion).not.toBeNull();
      expect(source.requests).toHaveLength(1);

      const chosen = session.choosePromotion('n');

      expect(chosen.isOk).toBe(true);
      if (chosen.isOk) {
        expect(chosen.value.move.promotion).toBe('n');
      }
      expect(session.pendingPromotion).toBeNull();
      expect(source.requests).toHaveLength(2);
    });

    it('should refuse a king and keep the move pending', () => {
      const session = open(new StubSource(), fenOf('promotion'));
      session.submitMove(sq('e7'), sq('e8'));

      const chosen = session.choosePromotion('k');

      expect(chosen.isErr && chosen.error).toBeInstanceOf(InvalidPromotionKindError);
      expect(session.pendingPromotion).not.toBeNull();
    });

    it('should report when nothing is pending', () => {
      const chosen = open(new StubSource()).choosePromotion('q');

      expect(chosen.isErr && chosen.error).toBeInstanceOf(NoPendingPromotionError);
    });

    it('should cancel the pending move', () => {
      const session = open(new StubSource(), fenOf('promotion'));
      session.submitMove(sq('e7'), sq('e8'));

      expect(session.cancelPromotion()).toBe(true);
      expect(session.cancelPromotion()).toBe(false);
      expect(session.snapshot().fen).toBe(fenOf('promotion'));
    });
  });

  describe('requestUndo', () => {
    it('should take back the last move and analyse again', () => {
      const source = new StubSource();
      const session = open(source);
      session.submitMove(sq('e2'), sq('e4'));

      const undone = session.requestUndo();

      expect(undone?.san).toBe('e4');
      expect(session.snapshot().fen).toBe(fenOf('start'));
      expect(source.requests).toHaveLength(3);
    });

    it('should return null with no history', () => {
      const source = new StubSource();

      expect(open(source).requestUndo()).toBeNull();
      expect(source.requests).toHaveLength(1);
    });
  });

  describe('requestNewGame', () => {
    it('should start from a FEN', () => {
      const session = open(new StubSource());
      session.submitMove(sq('e2'), sq('e4'));

      const started = session.requestNewGame(fenOf('kingsOnly'));

      expect(started.isOk).toBe(true);
      expect(session.history).toHaveLength(0);
      expect(session.snapshot().outcome).toEqual({ kind: 'draw', reason: 'insufficient_material' });
    });

    it('should keep the current game on a bad FEN', () => {
      const session = open(new StubSource());
      session.submitMove(sq('e2'), sq('e4'));

      const started = session.requestNewGame('8/8/8 w - - 0 1');

      expect(started.isErr).toBe(true);
      expect(session.history).toHaveLength(1);
    });
  });

  describe('selection', () => {
    it('should select a piece of the side to move', () => {
      const session = open(new StubSource());

      const targets = session.select(sq('e2'));

      expect(targets).toHaveLength(2);
      expect(targets.some((t) => sameSquare(t, sq('e4')))).toBe(true);
      expect(session.snapshot().selected).toEqual(sq('e2'));
    });

    it('should clear the selection for an opposing piece', () => {
      const session = open(new StubSource());
      session.select(sq('e2'));

      expect(session.select(sq('e7'))).toEqual([]);
      expect(session.snapshot().selected).toBeNull();
    });

    it('should list a promotion target once', () => {
      const session = open(new StubSource(), fenOf('promotion'));

      expect(session.legalTargets(sq('e7'))).toEqual([sq('e8')]);
    });
  });

  describe('view settings', () => {
    it('should flip the board and toggle mate hunting', () => {
      const session = open(new StubSource());

      expect(session.flipBoard()).toBe('black');
      expect(session.flipBoard()).toBe('white');
      expect(session.toggleMateHunt()).toBe(true);
      expect(session.snapshot().mateHunt).toBe(true);
    });

    it('should write the move text', () => {
      const session = open(new StubSource());
      session.submitMove(sq('e2'), sq('e4'));
      session.submitMove(sq('e7'), sq('e5'));

      expect(session.pgn()).toBe('1. e4 e5 *');
    });
  });

  describe('evaluation', () => {
    it('should show the result for the current position', () => {
      const source = new StubSource();
      const session = open(source);
      source.latest = result(session.positionId);

      const view = session.evaluation();

      expect(view?.text).toBe('+0.35');
      expect(view?.pawns).toBeCloseTo(0.35);
      expect(view?.suggestion?.kind).toBe('best');
      expect(session.snapshot().evaluation?.depth).toBe(12);
    });

    it('should ignore a result for another position', () => {
      const source = new StubSource();
      const session = open(source);
      source.latest = result(session.positionId + 1);

      expect(session.evaluation()).toBeNull();
    });

    it('should mark a forced mate under mate hunting', () => {
      const source = new StubSource();
      const fen = fenOf('whiteMateInOne');
      const session = open(source, fen, true);
      source.latest = result(session.positionId, {
        fen,
        score: { kind: 'mate', moves: 1, winner: 'w' },
        bestMove: legal(fen, 'a1', 'a8'),
        pv: ['a1a8'],
      });

      expect(session.evaluation()?.suggestion?.kind).toBe('mate');
      expect(session.evaluation()?.text).toBe('#1');

      session.toggleMateHunt();
      expect(session.evaluation()?.suggestion?.kind).toBe('best');
    });

    it('should disable analysis once the engine is unavailable', () => {
      const source = new StubSource();
      const session = open(source);
      source.latest = result(session.positionId);
      source.status = 'unavailable';
      source.lastError = new EngineUnavailableError('engine process ended');

      const snapshot = session.snapshot();

      expect(snapshot.analysisDisabled).toBe(true);
      expect(snapshot.evaluation).toBeNull();
      expect(snapshot.engineError).toBe('Engine unavailable: engine process ended');
    });
  });

  describe('with an engine bridge', () => {
    let bridge: EngineBridge | null = null;

    afterEach(async () => {
      await bridge?.close();
      bridge = null;
    });

    it('should follow the game with fresh evaluations', async () => {
      const engines = createFakeEngineFactory({
        onGo: (fen) =>
          fen.includes(' b ')
            ? searchOutput('cp 20', ['e7e5', 'g1f3'])
            : searchOutput('cp 35', ['e2e4', 'e7e5']),
      });
      bridge = new EngineBridge({
        transportFactory: engines.factory,
        budget: { movetimeMs: 10 },
        handshakeTimeoutMs: 50,
        responseTimeoutMs: 50,
        closeGraceMs: 20,
      });
      const session = open(bridge);

      await vi.waitFor(() => {
        expect(session.evaluation()?.isFinal).toBe(true);
      });
      expect(session.evaluation()?.text).toBe('+0.35');

      session.submitMove(sq('e2'), sq('e4'));
      expect(session.evaluation()).toBeNull();

      await vi.waitFor(() => {
        expect(session.evaluation()?.isFinal).toBe(true);
      });
      // Black's +0.20 is White's -0.20
      expect(session.evaluation()?.text).toBe('-0.20');
      expect(session.evaluation()?.pv).toEqual(['e7e5', 'g1f3']);
      expect(session.snapshot().engineStatus).toBe('ready');
    });
  });
});
