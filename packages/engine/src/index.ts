/**
 * @chesslens/engine - UCI engine bridge
 *
 * This package handles:
 * - Launching a UCI engine and completing the handshake
 * - Non-blocking analysis requests tagged by position
 * - Dropping results for superseded positions
 * - Score normalisation and formatting
 * - Recovering from engine crashes and timeouts
 */

export const VERSION = '0.1.0';

// Types
export type {
  AnalysisBudget,
  EngineOptions,
  EngineScore,
  EvaluationResult,
  PositionSnapshot,
  EngineStatus,
  BridgeEvent,
  EngineLogger,
} from './types.js';

// Errors
export {
  EngineError,
  EngineUnavailableError,
  EngineTimeoutError,
  MalformedResponseError,
  toError,
} from './errors.js';

// UCI protocol
export {
  DEFAULT_MOVETIME_MS,
  UCI,
  IS_READY,
  UCI_NEW_GAME,
  STOP,
  QUIT,
  positionCommand,
  goCommand,
  setOptionCommand,
  parseInfoLine,
  parseBestMoveLine,
  parseEngineLine,
  type UciScore,
  type UciInfo,
  type UciBestMove,
  type UciMessage,
} from './uci/protocol.js';

// Transport
export type { EngineTransport, TransportExit, TransportFactory } from './transport/types.js';
export { ProcessTransport, type ProcessTransportConfig } from './transport/process-transport.js';

// Bridge
export { EngineBridge, DEFAULT_BRIDGE_CONFIG, type EngineBridgeConfig } from './bridge.js';

// Scores
export {
  MATE_SCORE,
  DISPLAY_LIMIT_PAWNS,
  normalizeScore,
  scoreToCentipawns,
  scoreToPawns,
  formatScore,
  suggestMove,
  type Suggestion,
} from './score.js';
