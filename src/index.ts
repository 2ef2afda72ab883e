export * from './types.js';

export {
  defined,
  isSquare,
  opposite,
  squareRank,
  squareFile,
  squareFromCoords,
  parseSquare,
  makeSquare,
  kingCastlesTo,
  rookCastlesTo,
  moveIdOf,
} from './util.js';

export { SquareSet } from './squareSet.js';

export type { Direction, SlidingRole } from './attacks.js';
export {
  BISHOP_DIRECTIONS,
  ROOK_DIRECTIONS,
  attacks,
  bishopAttacks,
  between,
  directionRay,
  kingAttacks,
  knightAttacks,
  pawnAttacks,
  queenAttacks,
  ray,
  rookAttacks,
  slidingRays,
} from './attacks.js';

export { Board } from './board.js';

export type { Setup } from './setup.js';

export type { BackRankId } from './backrank.js';
export {
  BACK_RANK_COUNT,
  STANDARD_BACK_RANK,
  backRankIdOf,
  backRankName,
  backRankOf,
  isBackRankId,
  randomBackRankId,
} from './backrank.js';

export type { MoveState } from './chess.js';
export {
  Castles,
  IllegalSetup,
  Position,
  PositionError,
  castlingSide,
  normalizeMove,
} from './chess.js';

export { FIFTY_MOVE_PLIES, REPETITION_LIMIT, detectOutcome } from './outcome.js';

export { History } from './history.js';

export { ReviewNavigator } from './review.js';

export type { BoardOptions, LegalMoves, Logger, Reviewable } from './game.js';
export { IllegalPlay, PlayError, formatMove } from './game.js';

export { buildPreMove, preDests, previewPreMove } from './premove.js';

export { EngineBoard } from './engine.js';

export type { PreMoveResolution, Submission } from './player.js';
export { PlayerBoard } from './player.js';

export type { GameRecord, RecordIssue } from './record.js';
export { RecordError, gameRecordSchema, moveSchema, parseGameRecord } from './record.js';

export { makePieceChar, perft, renderBoard, renderSquareSet } from './debug.js';
