import { describe, it, expect } from 'vitest';

import { IllegalMoveError, InvalidPromotionKindError, NoPendingPromotionError } from '../errors.js';
import { Game } from '../game.js';
import { PROMOTION_CHOICES, PromotionResolver, requiresPromotion } from '../promotion.js';

import { boardOf, errorOf, req, sq } from './helpers.js';

const PAWN_ON_E7 = 'k7/4P3/8/8/8/8/8/7K w - - 0 1';

function setup(fen = PAWN_ON_E7): { game: Game; resolver: PromotionResolver } {
  const game = Game.create(fen).unwrap();
  return { game, resolver: new PromotionResolver(game) };
}

describe('PromotionResolver', () => {
  it('lists choices in picker order', () => {
    expect(PROMOTION_CHOICES).toEqual(['q', 'r', 'b', 'n']);
  });

  it('recognises last-rank pawn moves for the side to move', () => {
    const board = boardOf('k7/4P3/8/8/8/8/3p4/7K w - - 0 1');
    expect(requiresPromotion(board, sq('e7'), sq('e8'))).toBe(true);
    expect(requiresPromotion(board, sq('d2'), sq('d1'))).toBe(false);
    expect(requiresPromotion(board, sq('h1'), sq('h2'))).toBe(false);
  });

  it('holds a promoting move until a piece is chosen', () => {
    const { game, resolver } = setup();
    const result = resolver.request(sq('e7'), sq('e8')).unwrap();

    expect(result).toEqual({
      status: 'promotion_required',
      pending: { from: sq('e7'), to: sq('e8'), positionId: game.positionId },
    });
    expect(game.fen()).toBe(PAWN_ON_E7);

    const snapshot = resolver.choose('n').unwrap();
    expect(snapshot.fen).toBe('k3N3/8/8/8/8/8/8/7K b - - 0 1');
    expect(resolver.pending).toBeNull();
  });

  it('refuses a king or pawn and keeps the move pending', () => {
    const { game, resolver } = setup();
    resolver.request(sq('e7'), sq('e8')).unwrap();

    const error = errorOf(resolver.choose('k'));
    expect(error).toBeInstanceOf(InvalidPromotionKindError);
    expect(error.message).toBe('Cannot promote to "k"; choose one of q, r, b, n');
    expect(resolver.pending).not.toBeNull();
    expect(game.history).toEqual([]);

    expect(resolver.choose('q').unwrap().lastMove?.san).toBe('e8=Q+');
  });

  it('reports a choice with nothing pending', () => {
    const { resolver } = setup();
    expect(errorOf(resolver.choose('q'))).toBeInstanceOf(NoPendingPromotionError);
  });

  it('drops the pending move on cancel', () => {
    const { game, resolver } = setup();
    resolver.request(sq('e7'), sq('e8')).unwrap();

    expect(resolver.cancel()).toBe(true);
    expect(resolver.cancel()).toBe(false);
    expect(game.fen()).toBe(PAWN_ON_E7);
    expect(errorOf(resolver.choose('q'))).toBeInstanceOf(NoPendingPromotionError);
  });

  it('forgets a pending move once the position changes', () => {
    const { game, resolver } = setup();
    resolver.request(sq('e7'), sq('e8')).unwrap();
    game.submitMove(req('h1h2')).unwrap();

    expect(errorOf(resolver.choose('q'))).toBeInstanceOf(NoPendingPromotionError);
  });

  it('passes ordinary moves straight to the game', () => {
    const { game, resolver } = setup();
    const result = resolver.request(sq('h1'), sq('g1')).unwrap();

    expect(result.status).toBe('applied');
    expect(game.history).toHaveLength(1);
  });

  it('reports a blocked last-rank push as illegal', () => {
    const { resolver } = setup('k3n3/4P3/8/8/8/8/8/7K w - - 0 1');
    expect(errorOf(resolver.request(sq('e7'), sq('e8')))).toBeInstanceOf(IllegalMoveError);
  });
});
