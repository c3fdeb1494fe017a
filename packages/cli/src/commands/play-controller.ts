/**
 * Play command controller: turns REPL lines and engine events into session
 * calls and terminal output
 */

import type { BridgeEvent } from '@chesslens/engine';
import {
  type PieceKind,
  type Square,
  COLOR_NAMES,
  InvalidPromotionError,
  PIECE_NAMES,
  PROMOTION_CHOICES,
  describeOutcome,
  formatMoveRequest,
  requiresPromotion,
  squareName,
  toSan,
} from '@chesslens/rules';

import type { Reporter } from '../progress/reporter.js';
import {
  formatEvalBar,
  formatEvaluation,
  formatPv,
  formatSuggestion,
} from '../progress/eval-formatter.js';
import { renderBoard } from '../render/board-renderer.js';
import type { AnalyzerSession, EvaluationView, SessionSnapshot } from '../session/analyzer-session.js';

import { PLAY_HELP, type PlayInput, parsePlayInput } from './play-input.js';

export interface PlayControllerOptions {
  reporter: Reporter;
  /** Chess glyphs instead of letters */
  unicode?: boolean;
  /** Minimum gap between interim evaluation lines (ms) */
  throttleMs?: number;
  now?: () => number;
}

export type PlayOutcome = 'continue' | 'quit';

export const PROMOTION_PROMPT = `Promote to? ${PROMOTION_CHOICES.map((kind) => `${kind}=${PIECE_NAMES[kind]}`).join(' ')} (cancel to drop the move)`;

/**
 * One-line description of whose turn it is or how the game ended
 */
export function statusLine(snapshot: Pick<SessionSnapshot, 'board' | 'outcome' | 'inCheck'>): string {
  if (snapshot.outcome.kind !== 'in_progress') {
    return `Game over: ${describeOutcome(snapshot.outcome)}`;
  }
  const side = COLOR_NAMES[snapshot.board.turn];
  return snapshot.inCheck ? `${side} to move (check)` : `${side} to move`;
}

export class PlayController {
  private readonly reporter: Reporter;
  private readonly unicode: boolean;
  private readonly throttleMs: number;
  private readonly now: () => number;
  private lastInterimAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly session: AnalyzerSession,
    options: PlayControllerOptions,
  ) {
    this.reporter = options.reporter;
    this.unicode = options.unicode ?? false;
    this.throttleMs = options.throttleMs ?? 100;
    this.now = options.now ?? Date.now;
  }

  /**
   * Draw the board and the status line
   */
  renderPosition(targets: readonly Square[] = []): void {
    const snapshot = this.session.snapshot();
    this.reporter.printMessage(
      renderBoard(snapshot.board, {
        perspective: snapshot.orientation,
        unicode: this.unicode,
        selected: snapshot.selected,
        targets,
        lastMove: snapshot.lastMove?.move ?? null,
        suggestion: snapshot.evaluation?.suggestion ?? null,
        colors: this.reporter.colors,
      }),
    );
    this.reporter.printMessage(statusLine(snapshot));
    if (snapshot.pendingPromotion) {
      this.reporter.printMessage(PROMOTION_PROMPT);
    }
  }

  /**
   * Handle one line typed at the prompt
   */
  handle(line: string): PlayOutcome {
    return this.dispatch(parsePlayInput(line));
  }

  /**
   * React to engine output
   *
   * @returns true when something was printed
   */
  handleBridgeEvent(event: BridgeEvent): boolean {
    if (event.type === 'status') {
      if (event.status === 'unavailable') {
        const reason = this.session.snapshot().engineError;
        this.reporter.printWarning(`Engine analysis disabled${reason ? `: ${reason}` : ''}`);
        return true;
      }
      if (event.status === 'ready' && this.reporter.isVerbose()) {
        this.reporter.printVerbose('Engine ready');
        return true;
      }
      return false;
    }

    const { result } = event;
    if (result.positionId !== this.session.positionId) return false;

    const view = this.session.evaluation();
    if (!view) return false;

    if (!view.isFinal) {
      if (!this.reporter.isVerbose()) return false;
      const at = this.now();
      if (at - this.lastInterimAt < this.throttleMs) return false;
      this.lastInterimAt = at;
    }
    this.reporter.printMessage(this.evaluationLine(view));
    return true;
  }

  private dispatch(input: PlayInput): PlayOutcome {
    switch (input.kind) {
      case 'empty':
        break;
      case 'quit':
        return 'quit';
      case 'help':
        this.reporter.printMessage(PLAY_HELP);
        break;
      case 'move':
        this.move(input.from, input.to, input.promotion);
        break;
      case 'promote': {
        const result = this.session.choosePromotion(input.piece);
        if (result.isErr) {
          this.reporter.printError(result.error.message);
        } else {
          this.renderPosition();
        }
        break;
      }
      case 'cancel':
        this.reporter.printMessage(
          this.session.cancelPromotion() ? 'Promotion cancelled' : 'No promotion is pending',
        );
        break;
      case 'moves':
        this.listMoves(input.square);
        break;
      case 'undo': {
        const undone = this.session.requestUndo();
        if (!undone) {
          this.reporter.printWarning('Nothing to undo');
        } else {
          this.reporter.printMessage(`Took back ${undone.san}`);
          this.renderPosition();
        }
        break;
      }
      case 'new': {
        const result = this.session.requestNewGame(input.fen);
        if (result.isErr) {
          this.reporter.printError(result.error.message);
        } else {
          this.renderPosition();
        }
        break;
      }
      case 'flip':
        this.session.flipBoard();
        this.renderPosition();
        break;
      case 'board':
        this.renderPosition();
        break;
      case 'mate':
        this.reporter.printMessage(`Mate hunt ${this.session.toggleMateHunt() ? 'enabled' : 'disabled'}`);
        break;
      case 'eval':
        this.showEvaluation();
        break;
      case 'fen':
        this.reporter.printMessage(this.session.snapshot().fen);
        break;
      case 'pgn':
        this.reporter.printMessage(this.session.pgn());
        break;
      case 'unknown':
        this.reporter.printError(`Unknown command: ${input.text} (type help for commands)`);
        break;
    }
    return 'continue';
  }

  private move(from: Square, to: Square, promotion?: PieceKind): void {
    if (promotion && !requiresPromotion(this.session.snapshot().board, from, to)) {
      const label = formatMoveRequest({ from, to, promotion });
      this.reporter.printError(new InvalidPromotionError(label, 'move does not promote').message);
      return;
    }

    const result = this.session.submitMove(from, to);
    if (result.isErr) {
      this.reporter.printError(result.error.message);
      return;
    }

    if (result.value.status === 'promotion_required' && promotion) {
      const chosen = this.session.choosePromotion(promotion);
      if (chosen.isErr) {
        this.reporter.printError(chosen.error.message);
        this.reporter.printMessage(PROMOTION_PROMPT);
        return;
      }
    }
    this.renderPosition();
  }

  private listMoves(square: Square | null): void {
    if (square) {
      const targets = this.session.select(square);
      if (targets.length === 0) {
        this.reporter.printMessage(`No legal moves from ${squareName(square)}`);
        return;
      }
      this.renderPosition(targets);
      this.reporter.printMessage(`${squareName(square)}: ${targets.map(squareName).join(' ')}`);
      return;
    }

    const board = this.session.snapshot().board;
    const moves = this.session.legalMoves().map((move) => toSan(board, move));
    this.reporter.printMessage(moves.length > 0 ? moves.join(' ') : 'No legal moves');
  }

  private showEvaluation(): void {
    const snapshot = this.session.snapshot();
    if (snapshot.analysisDisabled) {
      this.reporter.printWarning(
        `Engine analysis disabled${snapshot.engineError ? `: ${snapshot.engineError}` : ''}`,
      );
      return;
    }
    this.reporter.printMessage(
      snapshot.evaluation ? this.evaluationLine(snapshot.evaluation) : 'No evaluation yet',
    );
  }

  private evaluationLine(view: EvaluationView): string {
    const c = this.reporter.colors;
    const parts = [
      `Eval ${formatEvaluation(view.score, c)}`,
      formatEvalBar(view.pawns),
      c.dim(`depth ${view.depth}`),
    ];
    if (view.suggestion) {
      parts.push(formatSuggestion(view.suggestion, c));
    }
    const pv = formatPv(view.pv);
    if (pv) {
      parts.push(c.dim(`pv ${pv}`));
    }
    return parts.join('  ');
  }
}
