import { kingAttacks, knightAttacks, pawnAttacks, SlidingRole, slidingRays } from './attacks.js';
import { normalizeMove, Position } from './chess.js';
import { SquareSet } from './squareSet.js';
import { CASTLING_SIDES, Color, Move, MoveKind, PreMove, Square } from './types.js';
import { defined, isSquare, kingCastlesTo, rookCastlesTo, squareRank } from './util.js';

const sweep = (role: SlidingRole, square: Square): SquareSet =>
  slidingRays(role, square).reduce((dests, ray) => dests.union(ray), SquareSet.empty());

/**
 * Destinations a piece of `color` could plausibly have after the opponent
 * replies. Other pieces are ignored, so sliders see through the board and
 * pawns may push or capture diagonally.
 */
export const preDests = (pos: Position, color: Color, square: Square): SquareSet => {
  if (!isSquare(square)) return SquareSet.empty();
  const piece = pos.board.get(square);
  if (!piece || piece.color !== color) return SquareSet.empty();
  switch (piece.role) {
    case 'pawn': {
      const forward = color === 'white' ? 8 : -8;
      let dests = pawnAttacks(color, square);
      const step = square + forward;
      if (0 <= step && step < 64) dests = dests.with(step);
      if (squareRank(square) === (color === 'white' ? 1 : 6)) dests = dests.with(step + forward);
      return dests;
    }
    case 'knight':
      return knightAttacks(square);
    case 'bishop':
    case 'rook':
    case 'queen':
      return sweep(piece.role, square);
    case 'king': {
      // Castling: the rook square, or the two-file step where there is one.
      let dests = kingAttacks(square);
      for (const side of CASTLING_SIDES) {
        const rook = pos.castles.rook[color][side];
        if (!defined(rook)) continue;
        dests = dests.with(rook);
        const kingTo = kingCastlesTo(color, side);
        if (Math.abs(kingTo - square) === 2) dests = dests.with(kingTo);
      }
      return dests;
    }
  }
};

const preMoveKind = (pos: Position, color: Color, move: Move): MoveKind => {
  if (pos.board.king.has(move.from) && CASTLING_SIDES.some(side => pos.castles.rook[color][side] === move.to)) {
    return 'castle';
  }
  if (pos.board.pawn.has(move.from) && Math.abs(move.to - move.from) === 16) return 'doublePush';
  return 'normal';
};

/**
 * Builds a pre-move for `color` from its pre-move destinations. Legality is
 * left to the position it will eventually be played in.
 */
export const buildPreMove = (pos: Position, color: Color, input: Move): PreMove | undefined => {
  if (!isSquare(input.from) || !isSquare(input.to)) return;
  if (!preDests(pos, color, input.from).has(input.to)) return;
  const move = normalizeMove(pos, input, color);
  const needsPromotion = pos.board.pawn.has(move.from) && SquareSet.backranks().has(move.to);
  if (defined(move.promotion) !== needsPromotion) return;
  const kind = preMoveKind(pos, color, move);
  return defined(move.promotion)
    ? { from: move.from, to: move.to, promotion: move.promotion, kind }
    : { from: move.from, to: move.to, kind };
};

/**
 * The position with the pre-move drawn on it. The side to move and the
 * clocks are left alone, since nothing was played.
 */
export const previewPreMove = (pos: Position, color: Color, preMove: PreMove): Position => {
  const preview = pos.clone();
  const piece = preview.board.take(preMove.from);
  if (!piece) return preview;
  if (preMove.kind === 'castle') {
    const side = CASTLING_SIDES.find(side => pos.castles.rook[color][side] === preMove.to);
    if (side) {
      const rook = preview.board.take(preMove.to);
      preview.board.set(kingCastlesTo(color, side), piece);
      if (rook) preview.board.set(rookCastlesTo(color, side), rook);
      return preview;
    }
  }
  if (preMove.promotion) piece.role = preMove.promotion;
  preview.board.set(preMove.to, piece);
  return preview;
};
