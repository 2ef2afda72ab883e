import { Result } from '@badrap/result';
import { BackRankId, STANDARD_BACK_RANK } from './backrank.js';
import { Position, PositionError } from './chess.js';
import { History } from './history.js';
import { detectOutcome } from './outcome.js';
import { ReviewNavigator } from './review.js';
import { SquareSet } from './squareSet.js';
import { Color, LegalMove, Move, MoveId, Outcome, Square } from './types.js';
import { defined, isSquare, makeSquare } from './util.js';

export enum IllegalPlay {
  IllegalMove = 'ERR_ILLEGAL_MOVE',
  GameOver = 'ERR_GAME_OVER',
}

export class PlayError extends Error {}

/**
 * Anything with console-style `debug` and `warn`, such as `console` itself.
 */
export type Logger = Pick<Console, 'debug' | 'warn'>;

const silent: Logger = {
  debug: () => {},
  warn: () => {},
};

export interface BoardOptions {
  /** Chess960 back rank; standard chess when omitted. */
  backRank?: BackRankId;
  logger?: Logger;
}

/**
 * Read access to the rules, shared by both boards.
 */
export interface LegalMoves {
  readonly turn: Color;
  readonly outcome: Outcome | undefined;
  position(): Position;
  moveDests(square: Square): SquareSet;
  legalMoves(): LegalMove[];
  isLegal(move: Move): boolean;
}

export interface Reviewable {
  readonly review: ReviewNavigator;
}

const squareLabel = (square: Square): string => (isSquare(square) ? makeSquare(square) : `[${square}]`);

export const formatMove = (move: Move): string =>
  `${squareLabel(move.from)}${squareLabel(move.to)}${move.promotion ? `=${move.promotion}` : ''}`;

/**
 * Position, history and result of one game. Both boards delegate to it and
 * expose only the operations their role allows.
 */
export class Game {
  private pos: Position;
  private result: Outcome | undefined;
  readonly history: History;
  readonly logger: Logger;

  private constructor(
    pos: Position,
    readonly backRank: BackRankId,
    logger: Logger | undefined,
  ) {
    this.pos = pos;
    this.history = new History(pos);
    this.logger = logger ?? silent;
  }

  static create(options: BoardOptions = {}): Result<Game, PositionError> {
    const backRank = options.backRank ?? STANDARD_BACK_RANK;
    return Position.fromBackRank(backRank).map(pos => new Game(pos, backRank, options.logger));
  }

  get turn(): Color {
    return this.pos.turn;
  }

  get outcome(): Outcome | undefined {
    return this.result;
  }

  isTerminal(): boolean {
    return defined(this.result);
  }

  position(): Position {
    return this.pos.clone();
  }

  moveId(): MoveId {
    return this.pos.moveId();
  }

  moveDests(square: Square): SquareSet {
    return this.result ? SquareSet.empty() : this.pos.dests(square);
  }

  legalMoves(): LegalMove[] {
    return this.result ? [] : this.pos.legalMoves();
  }

  isLegal(move: Move): boolean {
    return !this.result && this.pos.isLegal(move);
  }

  findLegal(move: Move): Result<LegalMove, PlayError> {
    if (this.result) return Result.err(new PlayError(IllegalPlay.GameOver));
    const legal = this.pos.findLegal(move);
    if (!legal) {
      this.logger.debug(`rejected ${formatMove(move)} at ply ${this.pos.moveId()}`);
      return Result.err(new PlayError(IllegalPlay.IllegalMove));
    }
    return Result.ok(legal);
  }

  /**
   * Plays a move for the side to move. Returns the id of the position it
   * was played from.
   */
  play(move: Move): Result<MoveId, PlayError> {
    return this.findLegal(move).map(legal => {
      const id = this.pos.moveId();
      const next = this.pos.clone();
      next.play(legal);
      this.pos = next;
      const repetitions = this.history.push(legal, next);
      const outcome = detectOutcome(next, repetitions);
      if (outcome) this.finish(outcome);
      return id;
    });
  }

  /**
   * Ends the game with a result decided outside the rules, such as a
   * resignation or an agreed draw.
   */
  declare(outcome: Outcome): Result<Outcome, PlayError> {
    if (this.result) return Result.err(new PlayError(IllegalPlay.GameOver));
    this.finish(outcome);
    return Result.ok(outcome);
  }

  private finish(outcome: Outcome): void {
    this.result = outcome;
    this.logger.debug(
      `game over at ply ${this.pos.moveId()}: ${outcome.reason}${outcome.winner ? `, ${outcome.winner} wins` : ''}`,
    );
  }
}
