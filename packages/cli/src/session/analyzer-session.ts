/**
 * Analyzer session
 *
 * The state a front end drives: one game, the pending promotion, board
 * orientation, mate hunting and the latest engine evaluation. Every accepted
 * transition asks the engine to analyse the new position; nothing here waits
 * for the engine, and a session without one plays normally.
 */

import { Result } from '@badrap/result';
import {
  type AppliedMove,
  type Board,
  type ChooseError,
  type InvalidFenError,
  type Move,
  type MoveError,
  type Outcome,
  type PendingPromotion,
  type PieceKind,
  type PromotionRequest,
  type Square,
  Game,
  PromotionResolver,
  pieceAt,
  sameSquare,
} from '@chesslens/rules';
import {
  type EngineBridge,
  type EngineScore,
  type EngineStatus,
  type Suggestion,
  formatScore,
  scoreToPawns,
  suggestMove,
} from '@chesslens/engine';

import type { BoardOrientation } from '../config/schema.js';

/**
 * The part of the engine bridge a session talks to
 */
export type AnalysisSource = Pick<EngineBridge, 'requestAnalysis' | 'readLatest' | 'status' | 'lastError'>;

export interface SessionOptions {
  /** Starting position; the standard one when omitted */
  fen?: string;
  bridge?: AnalysisSource | null;
  orientation?: BoardOrientation;
  mateHunt?: boolean;
}

/**
 * Engine evaluation of the current position, ready for display
 */
export interface EvaluationView {
  score: EngineScore;
  /** "+0.35", "#-2" */
  text: string;
  /** White-relative pawns, clamped to the bar range */
  pawns: number;
  depth: number;
  isFinal: boolean;
  pv: readonly string[];
  suggestion: Suggestion | null;
}

export interface SessionSnapshot {
  board: Board;
  fen: string;
  outcome: Outcome;
  inCheck: boolean;
  lastMove: AppliedMove | null;
  positionId: number;
  pendingPromotion: PendingPromotion | null;
  orientation: BoardOrientation;
  mateHunt: boolean;
  selected: Square | null;
  /** null until the engine has something for this position */
  evaluation: EvaluationView | null;
  /** True when there is no engine or it has failed */
  analysisDisabled: boolean;
  engineStatus: EngineStatus | 'disabled';
  /** Why the engine is unavailable, if it failed */
  engineError: string | null;
}

export class AnalyzerSession {
  private readonly promotion: PromotionResolver;
  private orientationValue: BoardOrientation;
  private mateHuntValue: boolean;
  private selectedSquare: Square | null = null;

  private constructor(
    private readonly game: Game,
    private readonly bridge: AnalysisSource | null,
    options: SessionOptions,
  ) {
    this.promotion = new PromotionResolver(game);
    this.orientationValue = options.orientation ?? 'white';
    this.mateHuntValue = options.mateHunt ?? false;
    this.requestAnalysis();
  }

  /**
   * Open a session on the given (or standard) position
   */
  static create(options: SessionOptions = {}): Result<AnalyzerSession, InvalidFenError> {
    return Game.create(options.fen).map((game) => new AnalyzerSession(game, options.bridge ?? null, options));
  }

  get positionId(): number {
    return this.game.positionId;
  }

  get history(): readonly AppliedMove[] {
    return this.game.history;
  }

  get orientation(): BoardOrientation {
    return this.orientationValue;
  }

  get mateHunt(): boolean {
    return this.mateHuntValue;
  }

  get pendingPromotion(): PendingPromotion | null {
    return this.promotion.pending;
  }

  /**
   * Move a piece. A pawn reaching the last rank waits for `choosePromotion`.
   */
  submitMove(from: Square, to: Square): Result<PromotionRequest, MoveError> {
    this.selectedSquare = null;
    const result = this.promotion.request(from, to);
    if (result.isOk && result.value.status === 'applied') {
      this.requestAnalysis();
    }
    return result;
  }

  /**
   * Finish a pending promotion
   */
  choosePromotion(kind: PieceKind): Result<AppliedMove, ChooseError> {
    const result = this.promotion.choose(kind);
    if (result.isErr) {
      return Result.err(result.error);
    }
    this.requestAnalysis();
    const applied = result.value.lastMove;
    if (!applied) {
      throw new Error('promotion applied without a recorded move');
    }
    return Result.ok(applied);
  }

  cancelPromotion(): boolean {
    return this.promotion.cancel();
  }

  /**
   * Start a new game from the standard position or a FEN. A bad FEN leaves the
   * current game alone.
   */
  requestNewGame(fen?: string): Result<SessionSnapshot, InvalidFenError> {
    const result = this.game.reset(fen);
    if (result.isErr) {
      return Result.err(result.error);
    }
    this.promotion.cancel();
    this.selectedSquare = null;
    this.requestAnalysis();
    return Result.ok(this.snapshot());
  }

  /**
   * Take back the last move
   *
   * @returns the move taken back, or null with no history
   */
  requestUndo(): AppliedMove | null {
    const undone = this.game.undo();
    if (!undone) return null;
    this.promotion.cancel();
    this.selectedSquare = null;
    this.requestAnalysis();
    return undone;
  }

  /**
   * Select a square for highlighting. Only a piece of the side to move can be
   * selected; anything else clears the selection.
   *
   * @returns the selected piece's legal destinations
   */
  select(square: Square | null): Square[] {
    const occupant = square ? pieceAt(this.game.board, square) : null;
    if (!square || !occupant || occupant.color !== this.game.board.turn) {
      this.selectedSquare = null;
      return [];
    }
    this.selectedSquare = square;
    return this.legalTargets(square);
  }

  /**
   * Legal destinations of the piece on a square (each listed once, whatever
   * the promotion choices)
   */
  legalTargets(square: Square): Square[] {
    const targets: Square[] = [];
    for (const move of this.game.legalTargets(square)) {
      if (!targets.some((target) => sameSquare(target, move.to))) targets.push(move.to);
    }
    return targets;
  }

  flipBoard(): BoardOrientation {
    this.orientationValue = this.orientationValue === 'white' ? 'black' : 'white';
    return this.orientationValue;
  }

  toggleMateHunt(): boolean {
    this.mateHuntValue = !this.mateHuntValue;
    return this.mateHuntValue;
  }

  /**
   * All legal moves in the current position
   */
  legalMoves(): readonly Move[] {
    return this.game.legalMoves();
  }

  /**
   * Move text of the game so far in PGN style
   */
  pgn(): string {
    return this.game.pgnMoveText();
  }

  snapshot(): SessionSnapshot {
    const game = this.game.snapshot();
    const status: EngineStatus | 'disabled' = this.bridge ? this.bridge.status : 'disabled';
    const analysisDisabled = status === 'disabled' || status === 'unavailable' || status === 'closed';

    return {
      board: game.board,
      fen: game.fen,
      outcome: game.outcome,
      inCheck: game.inCheck,
      lastMove: game.lastMove,
      positionId: game.positionId,
      pendingPromotion: this.promotion.pending,
      orientation: this.orientationValue,
      mateHunt: this.mateHuntValue,
      selected: this.selectedSquare,
      evaluation: analysisDisabled ? null : this.evaluation(),
      analysisDisabled,
      engineStatus: status,
      engineError: this.bridge?.lastError?.message ?? null,
    };
  }

  /**
   * Current evaluation, or null when the engine has nothing for this position
   */
  evaluation(): EvaluationView | null {
    const result = this.bridge?.readLatest() ?? null;
    if (!result || result.positionId !== this.game.positionId) {
      return null;
    }
    return {
      score: result.score,
      text: formatScore(result.score),
      pawns: scoreToPawns(result.score),
      depth: result.depth,
      isFinal: result.isFinal,
      pv: result.pv,
      suggestion: suggestMove(result, this.game.board.turn, this.mateHuntValue),
    };
  }

  private requestAnalysis(): void {
    this.bridge?.requestAnalysis({ positionId: this.game.positionId, board: this.game.board });
  }
}
