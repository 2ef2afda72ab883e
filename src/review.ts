import { Position } from './chess.js';
import { History } from './history.js';

/**
 * Read-only cursor over the positions of a {@link History}.
 *
 * While parked on the last position the cursor follows it as moves are
 * added; once moved back it stays where it was put.
 */
export class ReviewNavigator {
  private cursor = 0;
  private live = true;

  constructor(private readonly history: History) {}

  /** Number of positions, the initial one included. */
  get length(): number {
    return this.history.plies + 1;
  }

  /** Ply index of the position under the cursor. */
  get offset(): number {
    return this.live ? this.history.plies : this.cursor;
  }

  current(): Position {
    return this.history.positionAt(this.offset) ?? this.history.last();
  }

  atStart(): boolean {
    return this.offset === 0;
  }

  atEnd(): boolean {
    return this.offset === this.history.plies;
  }

  toStart(): Position {
    return this.park(0);
  }

  toEnd(): Position {
    this.live = true;
    return this.current();
  }

  forward(): Position {
    return this.atEnd() ? this.current() : this.park(this.offset + 1);
  }

  back(): Position {
    return this.atStart() ? this.current() : this.park(this.offset - 1);
  }

  /**
   * Moves to position `ply`, or returns `undefined` and stays put if there
   * is no such position.
   */
  jump(ply: number): Position | undefined {
    if (!Number.isInteger(ply) || ply < 0 || ply > this.history.plies) return;
    return this.park(ply);
  }

  private park(ply: number): Position {
    this.cursor = ply;
    this.live = ply === this.history.plies;
    return this.current();
  }
}
