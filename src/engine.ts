import { Result } from '@badrap/result';
import { BackRankId, randomBackRankId } from './backrank.js';
import { Position, PositionError } from './chess.js';
import { BoardOptions, formatMove, Game, LegalMoves, Logger, PlayError } from './game.js';
import { GameRecord, parseGameRecord, RecordError } from './record.js';
import { SquareSet } from './squareSet.js';
import { Color, LegalMove, Move, MoveId, Outcome, Square } from './types.js';
import { opposite } from './util.js';

/**
 * The authoritative board. Plays both sides and enforces every rule that
 * ends a game.
 */
export class EngineBoard implements LegalMoves {
  private constructor(private readonly game: Game) {}

  static standard(options: { logger?: Logger } = {}): EngineBoard {
    return new EngineBoard(Game.create(options).unwrap());
  }

  static chess960(backRank: BackRankId, options: { logger?: Logger } = {}): Result<EngineBoard, PositionError> {
    return Game.create({ ...options, backRank }).map(game => new EngineBoard(game));
  }

  static shuffled(random?: () => number, options: { logger?: Logger } = {}): EngineBoard {
    return new EngineBoard(Game.create({ ...options, backRank: randomBackRankId(random) }).unwrap());
  }

  /**
   * Rebuilds a game by playing `moves` from the starting position. Fails on
   * the first move that is not legal.
   */
  static replay(moves: Iterable<Move>, options: BoardOptions = {}): Result<EngineBoard, PositionError | PlayError> {
    const created = Game.create(options);
    if (created.isErr) return Result.err(created.error);
    const game = created.value;
    let ply = 0;
    for (const move of moves) {
      const played = game.play(move);
      if (played.isErr) {
        game.logger.warn(`replay stopped at ply ${ply}: ${formatMove(move)} (${played.error.message})`);
        return Result.err(played.error);
      }
      ply++;
    }
    return Result.ok(new EngineBoard(game));
  }

  /**
   * Validates a stored {@link GameRecord} and replays it.
   */
  static restore(
    record: unknown,
    options: { logger?: Logger } = {},
  ): Result<EngineBoard, RecordError | PositionError | PlayError> {
    const parsed = parseGameRecord(record);
    if (parsed.isErr) {
      options.logger?.warn(`rejected game record: ${parsed.error.issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
      return Result.err(parsed.error);
    }
    return EngineBoard.replay(parsed.value.moves, { ...options, backRank: parsed.value.backRank });
  }

  get turn(): Color {
    return this.game.turn;
  }

  get outcome(): Outcome | undefined {
    return this.game.outcome;
  }

  get backRank(): BackRankId {
    return this.game.backRank;
  }

  isTerminal(): boolean {
    return this.game.isTerminal();
  }

  position(): Position {
    return this.game.position();
  }

  moveId(): MoveId {
    return this.game.moveId();
  }

  moveDests(square: Square): SquareSet {
    return this.game.moveDests(square);
  }

  legalMoves(): LegalMove[] {
    return this.game.legalMoves();
  }

  isLegal(move: Move): boolean {
    return this.game.isLegal(move);
  }

  play(move: Move): Result<MoveId, PlayError> {
    return this.game.play(move);
  }

  resign(color: Color): Result<Outcome, PlayError> {
    return this.game.declare({ winner: opposite(color), reason: 'resignation' });
  }

  timeout(color: Color): Result<Outcome, PlayError> {
    return this.game.declare({ winner: opposite(color), reason: 'timeout' });
  }

  abandon(color: Color): Result<Outcome, PlayError> {
    return this.game.declare({ winner: opposite(color), reason: 'abandonment' });
  }

  agreeDraw(): Result<Outcome, PlayError> {
    return this.game.declare({ winner: undefined, reason: 'agreement' });
  }

  /** Moves played so far, in order. */
  moves(): LegalMove[] {
    return this.game.history.moveList();
  }

  /** Position after `ply` moves. */
  positionAt(ply: number): Position | undefined {
    return this.game.history.positionAt(ply);
  }

  toRecord(): GameRecord {
    return {
      backRank: this.game.backRank,
      moves: this.game.history
        .moveList()
        .map(({ from, to, promotion }) => (promotion ? { from, to, promotion } : { from, to })),
    };
  }
}
