/**
 * @chesslens/rules - Chess rules engine
 *
 * This package handles:
 * - Board Model and FEN parsing/serialisation
 * - Attack maps, pins and legal move generation
 * - Game state: move submission, undo, outcome detection
 * - Pawn promotion flow
 * - Coordinate and SAN notation
 */

export const VERSION = '0.1.0';

// Types
export type {
  Color,
  PieceKind,
  PromotionKind,
  Square,
  Piece,
  CastlingRights,
  MoveRequest,
  Move,
  DrawReason,
  Outcome,
} from './types.js';
export { opposite, isPromotionKind, PROMOTION_KINDS, PIECE_NAMES, COLOR_NAMES } from './types.js';

// Squares
export {
  FILE_NAMES,
  SQUARES,
  onBoard,
  squareAt,
  squareIndex,
  squareFromIndex,
  squareName,
  parseSquare,
  sameSquare,
  isLightSquare,
} from './square.js';

// Errors
export {
  RulesError,
  InvalidFenError,
  IllegalMoveError,
  InvalidPromotionError,
  InvalidPromotionKindError,
  NoPendingPromotionError,
  GameOverError,
} from './errors.js';
export type { MoveError } from './errors.js';

// Board Model
export {
  ALL_CASTLING,
  NO_CASTLING,
  apply,
  capturedPiece,
  createInitialBoard,
  findKing,
  formatMoveRequest,
  piece,
  pieceAt,
  piecesOf,
  promotionRank,
} from './board.js';
export type { Board, ApplyError } from './board.js';

// FEN
export { STARTING_FEN, parseFen, toFen, placementToFen, castlingToFen, pieceToChar } from './fen.js';

// Attacks and legality
export {
  attackedSquares,
  attackersOf,
  attacksFrom,
  checkers,
  findPins,
  isInCheck,
  isSquareAttacked,
} from './attacks.js';
export type { Pin, Vector } from './attacks.js';
export {
  findLegalMove,
  hasLegalEnPassant,
  hasLegalMove,
  legalMoves,
  legalMovesFrom,
  perft,
  perftDivide,
  pseudoLegalMoves,
} from './movegen.js';

// Notation
export { parseCoordinateMove, toCoordinate, toSan } from './notation.js';

// Outcome
export {
  FIFTY_MOVE_PLIES,
  REPETITION_LIMIT,
  computeOutcome,
  describeOutcome,
  isInsufficientMaterial,
  outcomeResult,
  positionSignature,
} from './outcome.js';

// Game
export { Game } from './game.js';
export type { AppliedMove, GameSnapshot } from './game.js';

// Promotion
export { PROMOTION_CHOICES, PromotionResolver, requiresPromotion } from './promotion.js';
export type { PendingPromotion, PromotionRequest, ChooseError } from './promotion.js';
