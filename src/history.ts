import { Position } from './chess.js';
import { LegalMove } from './types.js';

/**
 * Positions `p0 … pn` of a game and the moves `m1 … mn` between them,
 * with a count of every repetition key seen so far.
 *
 * Stored positions and moves are never handed out directly, only copies.
 */
export class History {
  private readonly positions: Position[];
  private readonly moves: LegalMove[] = [];
  private readonly seen = new Map<string, number>();

  constructor(initial: Position) {
    this.positions = [initial.clone()];
    this.count(initial);
  }

  private count(pos: Position): number {
    const key = pos.repetitionKey();
    const n = (this.seen.get(key) ?? 0) + 1;
    this.seen.set(key, n);
    return n;
  }

  /**
   * Appends a move and the position it led to. Returns how often that
   * position has now occurred.
   */
  push(move: LegalMove, pos: Position): number {
    this.moves.push(move);
    this.positions.push(pos.clone());
    return this.count(pos);
  }

  /** Number of moves played. */
  get plies(): number {
    return this.moves.length;
  }

  positionAt(ply: number): Position | undefined {
    return this.positions[ply]?.clone();
  }

  /** The move that led to position `ply`, for `ply >= 1`. */
  moveAt(ply: number): LegalMove | undefined {
    const move = this.moves[ply - 1];
    return move && { ...move };
  }

  last(): Position {
    return this.positions[this.positions.length - 1].clone();
  }

  repetitions(pos: Position): number {
    return this.seen.get(pos.repetitionKey()) ?? 0;
  }

  moveList(): LegalMove[] {
    return this.moves.map(move => ({ ...move }));
  }
}
