import { Result } from '@badrap/result';
import { Position, PositionError } from './chess.js';
import { BoardOptions, formatMove, Game, IllegalPlay, LegalMoves, PlayError, Reviewable } from './game.js';
import { buildPreMove, preDests, previewPreMove } from './premove.js';
import { ReviewNavigator } from './review.js';
import { SquareSet } from './squareSet.js';
import { Color, LegalMove, Move, MoveId, Outcome, PreMove, Square } from './types.js';

export type Submission =
  | { kind: 'played'; moveId: MoveId }
  | { kind: 'queued'; preMove: PreMove };

/**
 * What happened to the queued pre-move once the opponent's move arrived.
 */
export type PreMoveResolution = 'none' | 'applied' | 'discarded';

const resolved = (resolution: PreMoveResolution): Result<PreMoveResolution, PlayError> => Result.ok(resolution);

/**
 * One player's board. Moves for the other side arrive from outside; while
 * waiting for them a single pre-move can be queued.
 */
export class PlayerBoard implements LegalMoves, Reviewable {
  private queued: PreMove | undefined;
  readonly review: ReviewNavigator;

  private constructor(
    readonly color: Color,
    private readonly game: Game,
  ) {
    this.review = new ReviewNavigator(game.history);
  }

  static create(color: Color, options: BoardOptions = {}): Result<PlayerBoard, PositionError> {
    return Game.create(options).map(game => new PlayerBoard(color, game));
  }

  /**
   * Rebuilds the board from moves of both sides. No pre-move is queued
   * afterwards.
   */
  static replay(
    color: Color,
    moves: Iterable<Move>,
    options: BoardOptions = {},
  ): Result<PlayerBoard, PositionError | PlayError> {
    const created = Game.create(options);
    if (created.isErr) return Result.err(created.error);
    const game = created.value;
    for (const move of moves) {
      const played = game.play(move);
      if (played.isErr) {
        game.logger.warn(`replay stopped at ${formatMove(move)} (${played.error.message})`);
        return Result.err(played.error);
      }
    }
    return Result.ok(new PlayerBoard(color, game));
  }

  get turn(): Color {
    return this.game.turn;
  }

  get outcome(): Outcome | undefined {
    return this.game.outcome;
  }

  get preMove(): PreMove | undefined {
    return this.queued;
  }

  isTerminal(): boolean {
    return this.game.isTerminal();
  }

  isOurTurn(): boolean {
    return this.game.turn === this.color;
  }

  position(): Position {
    return this.game.position();
  }

  moveId(): MoveId {
    return this.game.moveId();
  }

  moveDests(square: Square): SquareSet {
    return this.isOurTurn() ? this.game.moveDests(square) : SquareSet.empty();
  }

  legalMoves(): LegalMove[] {
    return this.isOurTurn() ? this.game.legalMoves() : [];
  }

  isLegal(move: Move): boolean {
    return this.isOurTurn() && this.game.isLegal(move);
  }

  preDests(square: Square): SquareSet {
    if (this.isTerminal()) return SquareSet.empty();
    return preDests(this.game.position(), this.color, square);
  }

  /**
   * Plays `move` when it is our turn, otherwise queues it as a pre-move in
   * place of any earlier one.
   */
  submitOurMove(move: Move): Result<Submission, PlayError> {
    if (this.isOurTurn()) return this.game.play(move).map((moveId): Submission => ({ kind: 'played', moveId }));
    if (this.isTerminal()) return Result.err(new PlayError(IllegalPlay.GameOver));
    const preMove = buildPreMove(this.game.position(), this.color, move);
    if (!preMove) {
      this.game.logger.debug(`rejected pre-move ${formatMove(move)}`);
      return Result.err(new PlayError(IllegalPlay.IllegalMove));
    }
    this.queued = preMove;
    const submission: Submission = { kind: 'queued', preMove };
    return Result.ok(submission);
  }

  /**
   * Applies the opponent's move, then plays the queued pre-move if it has
   * become legal or drops it if not.
   */
  submitTheirMove(move: Move): Result<PreMoveResolution, PlayError> {
    if (this.isOurTurn()) {
      return Result.err(new PlayError(this.isTerminal() ? IllegalPlay.GameOver : IllegalPlay.IllegalMove));
    }
    const played = this.game.play(move);
    if (played.isErr) return Result.err(played.error);

    const preMove = this.queued;
    if (!preMove) return resolved('none');
    this.queued = undefined;
    if (this.game.play(preMove).isOk) return resolved('applied');
    this.game.logger.debug(`discarded pre-move ${formatMove(preMove)}`);
    return resolved('discarded');
  }

  cancelPreMove(): boolean {
    const had = !!this.queued;
    this.queued = undefined;
    return had;
  }

  /**
   * The position to draw: the reviewed one when looking back, otherwise the
   * current one with any pre-move shown on it.
   */
  view(): Position {
    if (!this.review.atEnd()) return this.review.current();
    const pos = this.game.position();
    return this.queued ? previewPreMove(pos, this.color, this.queued) : pos;
  }
}
