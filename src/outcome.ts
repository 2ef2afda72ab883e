import { MoveState, Position } from './chess.js';
import { Outcome } from './types.js';
import { opposite } from './util.js';

export const REPETITION_LIMIT = 3;

export const FIFTY_MOVE_PLIES = 100;

/**
 * Decides whether the game ended with the last move. Checks run in a
 * fixed order and the first that applies wins: checkmate, stalemate,
 * repetition, the fifty-move rule, insufficient material.
 *
 * @param repetitions How often the current position has occurred, this
 * occurrence included.
 */
export const detectOutcome = (pos: Position, repetitions: number, state?: MoveState): Outcome | undefined => {
  state = state || pos.moveState();
  if (!pos.hasDests(state)) {
    return state.checkers.nonEmpty()
      ? { winner: opposite(pos.turn), reason: 'checkmate' }
      : { winner: undefined, reason: 'stalemate' };
  }
  if (repetitions >= REPETITION_LIMIT) return { winner: undefined, reason: 'repetition' };
  if (pos.halfmoves >= FIFTY_MOVE_PLIES) return { winner: undefined, reason: 'fiftyMoves' };
  if (pos.isInsufficientMaterial()) return { winner: undefined, reason: 'insufficientMaterial' };
  return;
};
