import { Result } from '@badrap/result';
import {
  attacks,
  between,
  bishopAttacks,
  kingAttacks,
  knightAttacks,
  pawnAttacks,
  rookAttacks,
} from './attacks.js';
import { BackRankId, backRankOf } from './backrank.js';
import { Board } from './board.js';
import { Setup } from './setup.js';
import { SquareSet } from './squareSet.js';
import {
  ByCastlingSide,
  ByColor,
  CASTLING_SIDES,
  CastlingSide,
  Color,
  COLORS,
  LegalMove,
  Move,
  MoveId,
  MoveKind,
  Piece,
  PROMOTION_ROLES,
  ROLES,
  Square,
} from './types.js';
import { defined, isSquare, kingCastlesTo, moveIdOf, opposite, rookCastlesTo, squareRank } from './util.js';

export enum IllegalSetup {
  Empty = 'ERR_EMPTY',
  OppositeCheck = 'ERR_OPPOSITE_CHECK',
  PawnsOnBackrank = 'ERR_PAWNS_ON_BACKRANK',
  Kings = 'ERR_KINGS',
  BackRank = 'ERR_BACK_RANK',
}

export class PositionError extends Error {}

const attacksTo = (square: Square, attacker: Color, board: Board, occupied: SquareSet): SquareSet =>
  board[attacker].intersect(
    rookAttacks(square, occupied)
      .intersect(board.rooksAndQueens())
      .union(bishopAttacks(square, occupied).intersect(board.bishopsAndQueens()))
      .union(knightAttacks(square).intersect(board.knight))
      .union(kingAttacks(square).intersect(board.king))
      .union(pawnAttacks(opposite(attacker), square).intersect(board.pawn)),
  );

const attackedBy = (color: Color, board: Board, occupied: SquareSet): SquareSet => {
  let attacked = SquareSet.empty();
  for (const square of board[color]) {
    const role = board.getRole(square);
    if (role) attacked = attacked.union(attacks({ role, color }, square, occupied));
  }
  return attacked;
};

/**
 * Castling rights. Only ever shrink over a game.
 */
export class Castles {
  castlingRights: SquareSet;
  rook: ByColor<ByCastlingSide<Square | undefined>>;
  path: ByColor<ByCastlingSide<SquareSet>>;

  private constructor(
    castlingRights: SquareSet,
    rook: ByColor<ByCastlingSide<Square | undefined>>,
    path: ByColor<ByCastlingSide<SquareSet>>,
  ) {
    this.castlingRights = castlingRights;
    this.rook = rook;
    this.path = path;
  }

  static default(): Castles {
    return new Castles(
      SquareSet.corners(),
      {
        white: { a: 0, h: 7 },
        black: { a: 56, h: 63 },
      },
      {
        white: { a: new SquareSet(0xe, 0), h: new SquareSet(0x60, 0) },
        black: { a: new SquareSet(0, 0x0e00_0000), h: new SquareSet(0, 0x6000_0000) },
      },
    );
  }

  static empty(): Castles {
    return new Castles(
      SquareSet.empty(),
      {
        white: { a: undefined, h: undefined },
        black: { a: undefined, h: undefined },
      },
      {
        white: { a: SquareSet.empty(), h: SquareSet.empty() },
        black: { a: SquareSet.empty(), h: SquareSet.empty() },
      },
    );
  }

  clone(): Castles {
    return new Castles(
      this.castlingRights,
      {
        white: { a: this.rook.white.a, h: this.rook.white.h },
        black: { a: this.rook.black.a, h: this.rook.black.h },
      },
      {
        white: { a: this.path.white.a, h: this.path.white.h },
        black: { a: this.path.black.a, h: this.path.black.h },
      },
    );
  }

  private add(color: Color, side: CastlingSide, king: Square, rook: Square): void {
    const kingTo = kingCastlesTo(color, side);
    const rookTo = rookCastlesTo(color, side);
    this.castlingRights = this.castlingRights.with(rook);
    this.rook[color][side] = rook;
    this.path[color][side] = between(rook, rookTo)
      .with(rookTo)
      .union(between(king, kingTo).with(kingTo))
      .without(king)
      .without(rook);
  }

  /**
   * Keeps only the rights backed by a rook on the back rank, on the
   * outermost such rook on either side of the king.
   */
  static fromSetup(setup: Setup): Castles {
    const castles = Castles.empty();
    const rooks = setup.castlingRights.intersect(setup.board.rook);
    for (const color of COLORS) {
      const backrank = SquareSet.backrank(color);
      const king = setup.board.kingOf(color);
      if (!defined(king) || !backrank.has(king)) continue;
      const side = rooks.intersect(setup.board[color]).intersect(backrank);
      const aSide = side.first();
      if (defined(aSide) && aSide < king) castles.add(color, 'a', king, aSide);
      const hSide = side.last();
      if (defined(hSide) && king < hSide) castles.add(color, 'h', king, hSide);
    }
    return castles;
  }

  has(color: Color, side: CastlingSide): boolean {
    return defined(this.rook[color][side]);
  }

  discardRook(square: Square): void {
    if (this.castlingRights.has(square)) {
      this.castlingRights = this.castlingRights.without(square);
      for (const color of COLORS) {
        for (const side of CASTLING_SIDES) {
          if (this.rook[color][side] === square) this.rook[color][side] = undefined;
        }
      }
    }
  }

  discardColor(color: Color): void {
    this.castlingRights = this.castlingRights.diff(SquareSet.backrank(color));
    this.rook[color].a = undefined;
    this.rook[color].h = undefined;
  }
}

/**
 * Everything move generation derives from one position before looking at
 * individual pieces.
 */
export interface MoveState {
  king: Square | undefined;
  checkers: SquareSet;
  /** Lone pieces of either color between our king and an enemy slider. */
  blockers: SquareSet;
  /** Our pinned pieces, mapped to the squares they may still move to. */
  pins: Map<Square, SquareSet>;
  /** The side not to move is computed with our king lifted off the board. */
  attacked: ByColor<SquareSet>;
}

export class Position {
  board: Board;
  turn: Color;
  castles: Castles;
  epSquare: Square | undefined;
  halfmoves: number;
  fullmoves: number;

  private constructor(
    board: Board,
    turn: Color,
    castles: Castles,
    epSquare: Square | undefined,
    halfmoves: number,
    fullmoves: number,
  ) {
    this.board = board;
    this.turn = turn;
    this.castles = castles;
    this.epSquare = epSquare;
    this.halfmoves = halfmoves;
    this.fullmoves = fullmoves;
  }

  static default(): Position {
    return new Position(Board.default(), 'white', Castles.default(), undefined, 0, 1);
  }

  static fromSetup(setup: Setup): Result<Position, PositionError> {
    const pos = new Position(
      setup.board.clone(),
      setup.turn,
      Castles.fromSetup(setup),
      undefined,
      setup.halfmoves,
      setup.fullmoves,
    );
    pos.epSquare = validEpSquare(pos, setup.epSquare);
    return pos.validate().map(_ => pos);
  }

  /**
   * The starting position with the given back rank for both sides, pawns
   * in front and castling rights on both rooks.
   */
  static fromBackRank(id: BackRankId): Result<Position, PositionError> {
    const rank = backRankOf(id);
    if (!rank) return Result.err(new PositionError(IllegalSetup.BackRank));
    const board = Board.empty();
    for (const [file, role] of rank.entries()) {
      board.set(file, { role, color: 'white' });
      board.set(file + 8, { role: 'pawn', color: 'white' });
      board.set(file + 48, { role: 'pawn', color: 'black' });
      board.set(file + 56, { role, color: 'black' });
    }
    return Position.fromSetup({
      board,
      turn: 'white',
      castlingRights: board.rook.intersect(SquareSet.backranks()),
      epSquare: undefined,
      halfmoves: 0,
      fullmoves: 1,
    });
  }

  clone(): Position {
    return new Position(
      this.board.clone(),
      this.turn,
      this.castles.clone(),
      this.epSquare,
      this.halfmoves,
      this.fullmoves,
    );
  }

  private validate(): Result<undefined, PositionError> {
    if (this.board.occupied.isEmpty()) return Result.err(new PositionError(IllegalSetup.Empty));
    if (this.board.king.size() !== 2) return Result.err(new PositionError(IllegalSetup.Kings));

    if (!defined(this.board.kingOf(this.turn))) return Result.err(new PositionError(IllegalSetup.Kings));

    const otherKing = this.board.kingOf(opposite(this.turn));
    if (!defined(otherKing)) return Result.err(new PositionError(IllegalSetup.Kings));
    if (this.kingAttackers(otherKing, this.turn, this.board.occupied).nonEmpty()) {
      return Result.err(new PositionError(IllegalSetup.OppositeCheck));
    }

    if (SquareSet.backranks().intersects(this.board.pawn)) {
      return Result.err(new PositionError(IllegalSetup.PawnsOnBackrank));
    }

    return Result.ok(undefined);
  }

  kingAttackers(square: Square, attacker: Color, occupied: SquareSet): SquareSet {
    return attacksTo(square, attacker, this.board, occupied);
  }

  moveState(): MoveState {
    const us = this.turn;
    const them = opposite(us);
    const king = this.board.kingOf(us);
    const ours = attackedBy(us, this.board, this.board.occupied);
    if (!defined(king)) {
      const theirs = attackedBy(them, this.board, this.board.occupied);
      return {
        king,
        checkers: SquareSet.empty(),
        blockers: SquareSet.empty(),
        pins: new Map(),
        attacked: us === 'white' ? { white: ours, black: theirs } : { white: theirs, black: ours },
      };
    }

    const snipers = rookAttacks(king, SquareSet.empty())
      .intersect(this.board.rooksAndQueens())
      .union(bishopAttacks(king, SquareSet.empty()).intersect(this.board.bishopsAndQueens()))
      .intersect(this.board[them]);
    let blockers = SquareSet.empty();
    const pins = new Map<Square, SquareSet>();
    for (const sniper of snipers) {
      const line = between(king, sniper);
      const b = line.intersect(this.board.occupied);
      if (b.moreThanOne()) continue;
      blockers = blockers.union(b);
      const pinned = b.intersect(this.board[us]).singleSquare();
      if (defined(pinned)) pins.set(pinned, line.with(sniper));
    }

    const theirs = attackedBy(them, this.board, this.board.occupied.without(king));
    return {
      king,
      checkers: this.kingAttackers(king, them, this.board.occupied),
      blockers,
      pins,
      attacked: us === 'white' ? { white: ours, black: theirs } : { white: theirs, black: ours },
    };
  }

  dests(square: Square, state?: MoveState): SquareSet {
    if (!isSquare(square)) return SquareSet.empty();
    state = state || this.moveState();
    const piece = this.board.get(square);
    if (!piece || piece.color !== this.turn) return SquareSet.empty();

    let pseudo: SquareSet;
    let legal: SquareSet | undefined;
    if (piece.role === 'pawn') {
      pseudo = pawnAttacks(this.turn, square).intersect(this.board[opposite(this.turn)]);
      const delta = this.turn === 'white' ? 8 : -8;
      const step = square + delta;
      if (0 <= step && step < 64 && !this.board.occupied.has(step)) {
        pseudo = pseudo.with(step);
        const canDoubleStep = this.turn === 'white' ? square < 16 : square >= 48;
        const doubleStep = step + delta;
        if (canDoubleStep && !this.board.occupied.has(doubleStep)) {
          pseudo = pseudo.with(doubleStep);
        }
      }
      if (defined(this.epSquare) && canCaptureEp(this, square, state)) {
        legal = SquareSet.fromSquare(this.epSquare);
      }
    } else {
      pseudo = attacks(piece, square, this.board.occupied);
    }

    pseudo = pseudo.diff(this.board[this.turn]);

    if (defined(state.king)) {
      if (piece.role === 'king') {
        return pseudo
          .diff(state.attacked[opposite(this.turn)])
          .union(castlingDest(this, 'a', state))
          .union(castlingDest(this, 'h', state));
      }

      if (state.checkers.nonEmpty()) {
        const checker = state.checkers.singleSquare();
        if (!defined(checker)) return legal ?? SquareSet.empty();
        pseudo = pseudo.intersect(between(checker, state.king).with(checker));
      }

      const pin = state.pins.get(square);
      if (pin) pseudo = pseudo.intersect(pin);
    }

    if (legal) pseudo = pseudo.union(legal);
    return pseudo;
  }

  allDests(state?: MoveState): Map<Square, SquareSet> {
    state = state || this.moveState();
    const d = new Map<Square, SquareSet>();
    for (const square of this.board[this.turn]) {
      d.set(square, this.dests(square, state));
    }
    return d;
  }

  hasDests(state?: MoveState): boolean {
    state = state || this.moveState();
    for (const square of this.board[this.turn]) {
      if (this.dests(square, state).nonEmpty()) return true;
    }
    return false;
  }

  legalMovesFrom(square: Square, state?: MoveState): LegalMove[] {
    const moves: LegalMove[] = [];
    for (const to of this.dests(square, state)) {
      const kind = this.moveKind(square, to);
      if (this.board.pawn.has(square) && SquareSet.backranks().has(to)) {
        for (const promotion of PROMOTION_ROLES) moves.push({ from: square, to, promotion, kind });
      } else {
        moves.push({ from: square, to, kind });
      }
    }
    return moves;
  }

  legalMoves(state?: MoveState): LegalMove[] {
    state = state || this.moveState();
    const moves: LegalMove[] = [];
    for (const square of this.board[this.turn]) {
      moves.push(...this.legalMovesFrom(square, state));
    }
    return moves;
  }

  /**
   * Looks up `move` among the legal moves, accepting a two-file king step
   * for castling. Returns the generated move, carrying its kind.
   */
  findLegal(move: Move, state?: MoveState): LegalMove | undefined {
    if (!isSquare(move.from) || !isSquare(move.to)) return;
    const normalized = normalizeMove(this, move);
    const needsPromotion = this.board.pawn.has(normalized.from) && SquareSet.backranks().has(normalized.to);
    if (defined(normalized.promotion) !== needsPromotion) return;
    if (!this.dests(normalized.from, state).has(normalized.to)) return;
    const kind = this.moveKind(normalized.from, normalized.to);
    return defined(normalized.promotion)
      ? { from: normalized.from, to: normalized.to, promotion: normalized.promotion, kind }
      : { from: normalized.from, to: normalized.to, kind };
  }

  isLegal(move: Move, state?: MoveState): boolean {
    return defined(this.findLegal(move, state));
  }

  private moveKind(from: Square, to: Square): MoveKind {
    if (this.board.king.has(from) && this.board[this.turn].has(to)) return 'castle';
    if (this.board.pawn.has(from)) {
      if (to === this.epSquare && !this.board.occupied.has(to)) return 'enPassant';
      if (Math.abs(to - from) === 16) return 'doublePush';
    }
    return 'normal';
  }

  canCastle(side: CastlingSide, state?: MoveState): boolean {
    return castlingDest(this, side, state || this.moveState()).nonEmpty();
  }

  isCheck(): boolean {
    const king = this.board.kingOf(this.turn);
    return defined(king) && this.kingAttackers(king, opposite(this.turn), this.board.occupied).nonEmpty();
  }

  isCheckmate(state?: MoveState): boolean {
    state = state || this.moveState();
    return state.checkers.nonEmpty() && !this.hasDests(state);
  }

  isStalemate(state?: MoveState): boolean {
    state = state || this.moveState();
    return state.checkers.isEmpty() && !this.hasDests(state);
  }

  /**
   * No pawn, rook or queen, and either at most one minor piece in total or
   * one bishop each on the same square color.
   *
   * A simplification of the FIDE dead-position rule: blocked pawn chains
   * and other positions where no mate is possible still count as
   * sufficient.
   */
  isInsufficientMaterial(): boolean {
    if (this.board.pawn.union(this.board.rooksAndQueens()).nonEmpty()) return false;
    const minors = this.board.minors();
    if (!minors.moreThanOne()) return true;
    if (this.board.knight.nonEmpty() || minors.size() !== 2) return false;
    if (this.board.pieces('white', 'bishop').size() !== 1) return false;
    return this.board.bishop.isDisjoint(SquareSet.darkSquares())
      || this.board.bishop.isDisjoint(SquareSet.lightSquares());
  }

  moveId(): MoveId {
    return moveIdOf(this.turn, this.fullmoves);
  }

  /**
   * Identifies the position for repetition counting: placement, side to
   * move, castling rights and en passant square, without clocks.
   */
  repetitionKey(): string {
    const placement = [this.board.white.toHex(), ...ROLES.map(role => this.board[role].toHex())].join('/');
    const ep = defined(this.epSquare) ? this.epSquare.toString() : '-';
    return `${placement} ${this.turn} ${this.castles.castlingRights.toHex()} ${ep}`;
  }

  toSetup(): Setup {
    return {
      board: this.board.clone(),
      turn: this.turn,
      castlingRights: this.castles.castlingRights,
      epSquare: this.epSquare,
      halfmoves: this.halfmoves,
      fullmoves: this.fullmoves,
    };
  }

  /**
   * Applies a move without checking legality. Use {@link findLegal} first.
   */
  play(move: Move): void {
    const turn = this.turn;
    const prevEp = this.epSquare;
    const castling = castlingSide(this, move);

    this.epSquare = undefined;
    this.halfmoves += 1;
    if (turn === 'black') this.fullmoves += 1;
    this.turn = opposite(turn);

    const piece = this.board.take(move.from);
    if (!piece) return;

    let epCapture: Piece | undefined;
    if (piece.role === 'pawn') {
      this.halfmoves = 0;
      if (move.to === prevEp) {
        epCapture = this.board.take(prevEp + (turn === 'white' ? -8 : 8));
      }
      const delta = move.from - move.to;
      if (Math.abs(delta) === 16 && 8 <= move.from && move.from <= 55) {
        this.epSquare = (move.from + move.to) >> 1;
      }
      if (move.promotion) piece.role = move.promotion;
    } else if (piece.role === 'rook') {
      this.castles.discardRook(move.from);
    } else if (piece.role === 'king') {
      if (castling) {
        const rookFrom = this.castles.rook[turn][castling];
        if (defined(rookFrom)) {
          const rook = this.board.take(rookFrom);
          this.board.set(kingCastlesTo(turn, castling), piece);
          if (rook) this.board.set(rookCastlesTo(turn, castling), rook);
        }
        this.castles.discardColor(turn);
        return;
      }
      this.castles.discardColor(turn);
    }

    const capture = this.board.set(move.to, piece) || epCapture;
    if (capture) {
      this.halfmoves = 0;
      if (capture.role === 'rook') this.castles.discardRook(move.to);
    }
  }
}

/**
 * Keeps an en passant square only if a pawn of the side that just moved
 * could have double-pushed past it.
 */
const validEpSquare = (pos: Position, square: Square | undefined): Square | undefined => {
  if (!defined(square)) return;
  const epRank = pos.turn === 'white' ? 5 : 2;
  const forward = pos.turn === 'white' ? 8 : -8;
  if (squareRank(square) !== epRank) return;
  if (pos.board.occupied.has(square + forward)) return;
  const pawn = square - forward;
  if (!pos.board.pawn.has(pawn) || !pos.board[opposite(pos.turn)].has(pawn)) return;
  return square;
};

const canCaptureEp = (pos: Position, pawnFrom: Square, state: MoveState): boolean => {
  if (!defined(pos.epSquare)) return false;
  if (!pawnAttacks(pos.turn, pawnFrom).has(pos.epSquare)) return false;
  if (!defined(state.king)) return true;
  const captured = pos.epSquare + (pos.turn === 'white' ? -8 : 8);
  if (!pos.board.pieces(opposite(pos.turn), 'pawn').has(captured)) return false;
  return pos
    .kingAttackers(
      state.king,
      opposite(pos.turn),
      pos.board.occupied.toggle(pawnFrom).toggle(captured).with(pos.epSquare),
    )
    .without(captured)
    .isEmpty();
};

const castlingDest = (pos: Position, side: CastlingSide, state: MoveState): SquareSet => {
  if (!defined(state.king) || state.checkers.nonEmpty()) return SquareSet.empty();
  const rook = pos.castles.rook[pos.turn][side];
  if (!defined(rook)) return SquareSet.empty();
  if (!pos.board.pieces(pos.turn, 'rook').has(rook)) return SquareSet.empty();
  if (pos.castles.path[pos.turn][side].intersects(pos.board.occupied)) return SquareSet.empty();

  const kingTo = kingCastlesTo(pos.turn, side);
  const kingPath = between(state.king, kingTo);
  const occ = pos.board.occupied.without(state.king);
  for (const sq of kingPath) {
    if (pos.kingAttackers(sq, opposite(pos.turn), occ).nonEmpty()) return SquareSet.empty();
  }

  // The castling rook may have been shielding the king's destination.
  const rookTo = rookCastlesTo(pos.turn, side);
  const after = pos.board.occupied.toggle(state.king).toggle(rook).toggle(rookTo);
  if (pos.kingAttackers(kingTo, opposite(pos.turn), after).nonEmpty()) return SquareSet.empty();

  return SquareSet.fromSquare(rook);
};

/**
 * Detects castling by `color`, written either as king to own rook or as a
 * two-file king step onto the castling destination.
 */
export const castlingSide = (pos: Position, move: Move, color: Color = pos.turn): CastlingSide | undefined => {
  if (!pos.board.pieces(color, 'king').has(move.from)) return;
  for (const side of CASTLING_SIDES) {
    if (pos.castles.rook[color][side] === move.to) return side;
  }
  const delta = move.to - move.from;
  if (Math.abs(delta) !== 2) return;
  const side = delta > 0 ? 'h' : 'a';
  if (!pos.castles.has(color, side) || move.to !== kingCastlesTo(color, side)) return;
  return side;
};

export const normalizeMove = (pos: Position, move: Move, color: Color = pos.turn): Move => {
  const side = castlingSide(pos, move, color);
  if (!side) return move;
  const rookFrom = pos.castles.rook[color][side];
  return {
    ...move,
    to: defined(rookFrom) ? rookFrom : move.to,
  };
};
