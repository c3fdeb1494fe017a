/**
 * Engine bridge types
 */

import type { Board, Color, Move } from '@chesslens/rules';

/**
 * Search budget for one analysis request
 */
export interface AnalysisBudget {
  /** Search depth in plies */
  depth?: number;
  /** Time limit in milliseconds */
  movetimeMs?: number;
}

/**
 * UCI options applied after the handshake
 */
export interface EngineOptions {
  threads?: number;
  hashMb?: number;
  multiPv?: number;
}

/**
 * Evaluation from White's point of view. A mate score names the side that
 * mates and the distance in moves (0 once the mate is on the board).
 */
export type EngineScore =
  | { readonly kind: 'cp'; readonly value: number }
  | { readonly kind: 'mate'; readonly moves: number; readonly winner: Color };

/**
 * Analysis of one position, tagged with the position it belongs to
 */
export interface EvaluationResult {
  readonly positionId: number;
  readonly fen: string;
  readonly score: EngineScore;
  /** Best move resolved against the position's legal moves */
  readonly bestMove: Move | null;
  /** Principal variation in coordinate notation */
  readonly pv: readonly string[];
  readonly depth: number;
  /** True once the engine has sent bestmove for this search */
  readonly isFinal: boolean;
  readonly receivedAt: number;
}

/**
 * Immutable position handed to the bridge
 */
export interface PositionSnapshot {
  readonly positionId: number;
  readonly board: Board;
}

export type EngineStatus = 'idle' | 'starting' | 'ready' | 'analysing' | 'unavailable' | 'closed';

export type BridgeEvent =
  | { readonly type: 'status'; readonly status: EngineStatus }
  | { readonly type: 'result'; readonly result: EvaluationResult };

/**
 * Sink for bridge diagnostics
 */
export interface EngineLogger {
  debug(message: string): void;
  warn(message: string): void;
}
