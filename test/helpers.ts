import { Board } from '../src/board.js';
import { Position } from '../src/chess.js';
import { Setup } from '../src/setup.js';
import { SquareSet } from '../src/squareSet.js';
import { Color, Move, Piece, PROMOTION_ROLES, PromotionRole, Role, Square } from '../src/types.js';
import { defined, parseSquare } from '../src/util.js';

const ROLE_BY_CHAR: Record<string, Role> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

export const square = (name: string): Square => {
  const sq = parseSquare(name);
  if (!defined(sq)) throw new Error(`bad square ${name}`);
  return sq;
};

export const squares = (...names: string[]): SquareSet => SquareSet.fromSquares(names.map(square));

const parsePiece = (ch: string): Piece => {
  const role = ROLE_BY_CHAR[ch.toLowerCase()];
  if (!role) throw new Error(`bad piece ${ch}`);
  return { role, color: ch === ch.toLowerCase() ? 'black' : 'white' };
};

const parsePlacement = (placement: string): Board => {
  const board = Board.empty();
  const ranks = placement.split('/');
  if (ranks.length !== 8) throw new Error(`bad placement ${placement}`);
  for (const [i, rank] of ranks.entries()) {
    let file = 0;
    for (const ch of rank) {
      const skip = parseInt(ch, 10);
      if (skip > 0) file += skip;
      else board.set(file++ + 8 * (7 - i), parsePiece(ch));
    }
  }
  return board;
};

const backRankRooks = (board: Board, color: Color): SquareSet =>
  board.pieces(color, 'rook').intersect(SquareSet.backrank(color));

const parseCastling = (board: Board, field: string): SquareSet => {
  let rights = SquareSet.empty();
  if (field === '-') return rights;
  for (const ch of field) {
    const color = ch === ch.toLowerCase() ? 'black' : 'white';
    const rooks = backRankRooks(board, color);
    const lower = ch.toLowerCase();
    let rook: Square | undefined;
    if (lower === 'k') rook = rooks.last();
    else if (lower === 'q') rook = rooks.first();
    else rook = (lower.charCodeAt(0) - 'a'.charCodeAt(0)) + (color === 'white' ? 0 : 56);
    if (defined(rook)) rights = rights.with(rook);
  }
  return rights;
};

/**
 * Reads a position in the usual six-field text notation. Castling may be
 * given as `KQkq` or by rook files such as `HFhf`.
 */
export const setupFrom = (text: string): Setup => {
  const [placement, turn = 'w', castling = '-', ep = '-', halfmoves = '0', fullmoves = '1'] = text.split(' ');
  const board = parsePlacement(placement);
  return {
    board,
    turn: turn === 'w' ? 'white' : 'black',
    castlingRights: parseCastling(board, castling),
    epSquare: ep === '-' ? undefined : square(ep),
    halfmoves: parseInt(halfmoves, 10),
    fullmoves: parseInt(fullmoves, 10),
  };
};

export const position = (text: string): Position => Position.fromSetup(setupFrom(text)).unwrap();

const isPromotionRole = (role: Role | undefined): role is PromotionRole =>
  PROMOTION_ROLES.some(r => r === role);

/**
 * `e2e4`, or `e7e8q` with a promotion.
 */
export const move = (uci: string): Move => {
  const from = square(uci.slice(0, 2));
  const to = square(uci.slice(2, 4));
  if (uci.length === 4) return { from, to };
  const promotion = ROLE_BY_CHAR[uci.slice(4)];
  if (!isPromotionRole(promotion)) throw new Error(`bad promotion ${uci}`);
  return { from, to, promotion };
};

export const moves = (line: string): Move[] => line.split(' ').filter(s => s.length > 0).map(move);
