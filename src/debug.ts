import { Board } from './board.js';
import { Position } from './chess.js';
import { SquareSet } from './squareSet.js';
import { Piece, Role } from './types.js';

const ROLE_CHARS: Record<Role, string> = {
  pawn: 'p',
  knight: 'n',
  bishop: 'b',
  rook: 'r',
  queen: 'q',
  king: 'k',
};

export const makePieceChar = (piece: Piece): string =>
  piece.color === 'white' ? ROLE_CHARS[piece.role].toUpperCase() : ROLE_CHARS[piece.role];

/**
 * Eight lines from rank 8 down to rank 1, white pieces in uppercase and
 * empty squares as dots.
 */
export const renderBoard = (board: Board): string => {
  let r = '';
  for (let y = 7; y >= 0; y--) {
    for (let x = 0; x < 8; x++) {
      const piece = board.get(x + y * 8);
      r += piece ? makePieceChar(piece) : '.';
      if (x < 7) r += ' ';
    }
    if (y > 0) r += '\n';
  }
  return r;
};

export const renderSquareSet = (squares: SquareSet): string => {
  let r = '';
  for (let y = 7; y >= 0; y--) {
    for (let x = 0; x < 8; x++) {
      r += squares.has(x + y * 8) ? '1' : '.';
      if (x < 7) r += ' ';
    }
    if (y > 0) r += '\n';
  }
  return r;
};

/**
 * Counts the leaf nodes of the legal move tree to the given depth.
 */
export const perft = (pos: Position, depth: number): number => {
  if (depth < 1) return 1;
  const moves = pos.legalMoves();
  if (depth === 1) return moves.length;
  let nodes = 0;
  for (const move of moves) {
    const child = pos.clone();
    child.play(move);
    nodes += perft(child, depth - 1);
  }
  return nodes;
};
