/**
 * Game State Machine
 *
 * Owns the Board Model across plies: validates and applies moves, keeps the
 * history and repetition counts, and recomputes the outcome after every
 * transition. Each transition is atomic: on failure nothing changes.
 */

import { Result } from '@badrap/result';

import { isInCheck } from './attacks.js';
import {
  type Board,
  apply,
  capturedPiece,
  createInitialBoard,
  formatMoveRequest,
} from './board.js';
import {
  GameOverError,
  IllegalMoveError,
  InvalidFenError,
  InvalidPromotionError,
  type MoveError,
} from './errors.js';
import { parseFen, toFen } from './fen.js';
import { findLegalMove, legalMoves, legalMovesFrom } from './movegen.js';
import { toSan } from './notation.js';
import {
  IN_PROGRESS,
  computeOutcome,
  describeOutcome,
  outcomeResult,
  positionSignature,
} from './outcome.js';
import { sameSquare } from './square.js';
import {
  type Move,
  type MoveRequest,
  type Outcome,
  type Piece,
  type Square,
  isPromotionKind,
} from './types.js';

/**
 * A move as recorded in the game history
 */
export interface AppliedMove {
  readonly move: Move;
  readonly san: string;
  readonly before: Board;
  readonly after: Board;
  readonly captured: Piece | null;
  readonly signature: string;
}

/**
 * Read-only view of the game after a transition
 */
export interface GameSnapshot {
  readonly board: Board;
  readonly fen: string;
  readonly outcome: Outcome;
  readonly inCheck: boolean;
  readonly lastMove: AppliedMove | null;
  /** Identity of the current position; changes on every transition */
  readonly positionId: number;
}

export class Game {
  private current: Board;
  private outcomeValue: Outcome = IN_PROGRESS;
  private readonly moves: AppliedMove[] = [];
  private readonly repetitions = new Map<string, number>();
  private positionCounter = 0;
  private cachedLegal: Move[] | null = null;

  private constructor(private start: Board) {
    this.current = start;
    this.restart(start);
  }

  /**
   * Start a game from the standard initial position
   */
  static standard(): Game {
    return new Game(createInitialBoard());
  }

  /**
   * Start a game from a FEN, or from the initial position when omitted
   */
  static create(fen?: string): Result<Game, InvalidFenError> {
    if (fen === undefined) {
      return Result.ok(Game.standard());
    }
    return parseFen(fen).map((board) => new Game(board));
  }

  get board(): Board {
    return this.current;
  }

  get outcome(): Outcome {
    return this.outcomeValue;
  }

  get isOver(): boolean {
    return this.outcomeValue.kind !== 'in_progress';
  }

  get history(): readonly AppliedMove[] {
    return this.moves;
  }

  get positionId(): number {
    return this.positionCounter;
  }

  get startBoard(): Board {
    return this.start;
  }

  fen(): string {
    return toFen(this.current);
  }

  inCheck(): boolean {
    return isInCheck(this.current, this.current.turn);
  }

  /**
   * Legal moves in the current position (empty once the game is over)
   */
  legalMoves(): readonly Move[] {
    if (this.isOver) return [];
    if (!this.cachedLegal) {
      this.cachedLegal = legalMoves(this.current);
    }
    return this.cachedLegal;
  }

  /**
   * Legal destinations for the piece on `square`, for highlighting
   */
  legalTargets(square: Square): Move[] {
    if (this.isOver) return [];
    return legalMovesFrom(this.current, square);
  }

  /**
   * Occurrence count of the current position
   */
  repetitionCount(): number {
    return this.repetitions.get(positionSignature(this.current)) ?? 0;
  }

  snapshot(): GameSnapshot {
    return {
      board: this.current,
      fen: this.fen(),
      outcome: this.outcomeValue,
      inCheck: this.inCheck(),
      lastMove: this.moves[this.moves.length - 1] ?? null,
      positionId: this.positionCounter,
    };
  }

  /**
   * Validate and apply a move
   */
  submitMove(request: MoveRequest): Result<GameSnapshot, MoveError> {
    const label = formatMoveRequest(request);
    if (this.isOver) {
      return Result.err(new GameOverError(describeOutcome(this.outcomeValue)));
    }

    const candidates = this.legalMoves();
    const move = findLegalMove(candidates, request);
    if (!move) {
      return Result.err(this.explainRejection(candidates, request, label));
    }

    const next = apply(this.current, move);
    if (next.isErr) {
      return Result.err(
        next.error instanceof InvalidPromotionError
          ? next.error
          : new IllegalMoveError(label, next.error.message),
      );
    }

    const after = next.value;
    const signature = positionSignature(after);
    const record: AppliedMove = {
      move,
      san: toSan(this.current, move),
      before: this.current,
      after,
      captured: capturedPiece(this.current, move),
      signature,
    };

    this.moves.push(record);
    this.repetitions.set(signature, (this.repetitions.get(signature) ?? 0) + 1);
    this.enter(after);
    return Result.ok(this.snapshot());
  }

  /**
   * Take back the last move, also out of a finished game
   */
  undo(): AppliedMove | null {
    const last = this.moves.pop();
    if (!last) return null;

    const count = (this.repetitions.get(last.signature) ?? 1) - 1;
    if (count > 0) {
      this.repetitions.set(last.signature, count);
    } else {
      this.repetitions.delete(last.signature);
    }
    this.enter(last.before);
    return last;
  }

  /**
   * Start over, from the standard position or a FEN
   */
  reset(fen?: string): Result<GameSnapshot, InvalidFenError> {
    const board: Result<Board, InvalidFenError> =
      fen === undefined ? Result.ok(createInitialBoard()) : parseFen(fen);
    if (board.isErr) {
      return Result.err(board.error);
    }
    this.restart(board.value);
    return Result.ok(this.snapshot());
  }

  /**
   * Move text in PGN style ("1. e4 e5 2. Nf3 *")
   */
  pgnMoveText(): string {
    const parts: string[] = [];
    this.moves.forEach((record, i) => {
      const { before } = record;
      if (before.turn === 'w') {
        parts.push(`${before.fullmoveNumber}. ${record.san}`);
      } else if (i === 0) {
        parts.push(`${before.fullmoveNumber}... ${record.san}`);
      } else {
        parts.push(record.san);
      }
    });
    parts.push(outcomeResult(this.outcomeValue));
    return parts.join(' ');
  }

  private restart(board: Board): void {
    this.start = board;
    this.moves.length = 0;
    this.repetitions.clear();
    this.repetitions.set(positionSignature(board), 1);
    this.enter(board);
  }

  private enter(board: Board): void {
    this.current = board;
    this.cachedLegal = null;
    this.positionCounter++;
    this.outcomeValue = computeOutcome(board, this.repetitions);
  }

  private explainRejection(
    candidates: readonly Move[],
    request: MoveRequest,
    label: string,
  ): MoveError {
    const between = candidates.filter(
      (move) => sameSquare(move.from, request.from) && sameSquare(move.to, request.to),
    );
    if (between.length > 0) {
      const promotes = between.some((move) => move.promotion !== undefined);
      if (promotes && request.promotion === undefined) {
        return new InvalidPromotionError(label, 'pawn reaching the last rank needs a piece');
      }
      if (promotes && request.promotion !== undefined && !isPromotionKind(request.promotion)) {
        return new InvalidPromotionError(label, `cannot promote to "${request.promotion}"`);
      }
      if (!promotes && request.promotion !== undefined) {
        return new InvalidPromotionError(label, 'move does not promote');
      }
    }
    return new IllegalMoveError(label, `not legal in position ${this.fen()}`);
  }
}
