import { Board } from './board.js';
import { SquareSet } from './squareSet.js';
import { Color, Square } from './types.js';

/**
 * A not necessarily legal chess position.
 *
 * `castlingRights` holds the squares of the rooks that may still castle,
 * so it describes Chess960 back ranks as well as the standard one.
 */
export interface Setup {
  board: Board;
  turn: Color;
  castlingRights: SquareSet;
  epSquare: Square | undefined;
  halfmoves: number;
  fullmoves: number;
}
