/**
 * Attack tables and line geometry.
 *
 * Every table is filled once at import from the eight compass rays of each
 * square. Leapers read their tables directly. Sliders combine the rays into
 * whole lines and resolve blockers with
 * [Hyperbola Quintessence](https://www.chessprogramming.org/Hyperbola_Quintessence).
 *
 * @packageDocumentation
 */

import { SquareSet } from './squareSet.js';
import { BySquare, Color, Piece, Role, Square } from './types.js';
import { squareFile, squareFromCoords, squareRank } from './util.js';

export type Direction = 'north' | 'northEast' | 'east' | 'southEast' | 'south' | 'southWest' | 'west' | 'northWest';

export type SlidingRole = Extract<Role, 'bishop' | 'rook' | 'queen'>;

const STEPS: Record<Direction, readonly [file: number, rank: number]> = {
  north: [0, 1],
  northEast: [1, 1],
  east: [1, 0],
  southEast: [1, -1],
  south: [0, -1],
  southWest: [-1, -1],
  west: [-1, 0],
  northWest: [-1, 1],
};

export const ROOK_DIRECTIONS: readonly Direction[] = ['north', 'east', 'south', 'west'];
export const BISHOP_DIRECTIONS: readonly Direction[] = ['northEast', 'southEast', 'southWest', 'northWest'];
const ALL_DIRECTIONS: readonly Direction[] = [...ROOK_DIRECTIONS, ...BISHOP_DIRECTIONS];

const KNIGHT_JUMPS: readonly (readonly [number, number])[] = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2],
];

const tabulate = <T>(f: (square: Square) => T): BySquare<T> => {
  const table: BySquare<T> = [];
  for (let square = 0; square < 64; square++) table[square] = f(square);
  return table;
};

const offsets = (square: Square, deltas: readonly (readonly [number, number])[]): SquareSet => {
  let set = SquareSet.empty();
  for (const [df, dr] of deltas) {
    const target = squareFromCoords(squareFile(square) + df, squareRank(square) + dr);
    if (target !== undefined) set = set.with(target);
  }
  return set;
};

const walk = (square: Square, direction: Direction): SquareSet => {
  const [df, dr] = STEPS[direction];
  let set = SquareSet.empty();
  let target = squareFromCoords(squareFile(square) + df, squareRank(square) + dr);
  while (target !== undefined) {
    set = set.with(target);
    target = squareFromCoords(squareFile(target) + df, squareRank(target) + dr);
  }
  return set;
};

const RAYS: Record<Direction, BySquare<SquareSet>> = {
  north: tabulate(sq => walk(sq, 'north')),
  northEast: tabulate(sq => walk(sq, 'northEast')),
  east: tabulate(sq => walk(sq, 'east')),
  southEast: tabulate(sq => walk(sq, 'southEast')),
  south: tabulate(sq => walk(sq, 'south')),
  southWest: tabulate(sq => walk(sq, 'southWest')),
  west: tabulate(sq => walk(sq, 'west')),
  northWest: tabulate(sq => walk(sq, 'northWest')),
};

const line = (a: Direction, b: Direction): BySquare<SquareSet> => tabulate(sq => RAYS[a][sq].union(RAYS[b][sq]));

const FILE_LINE = line('north', 'south');
const RANK_LINE = line('east', 'west');
const DIAG_LINE = line('northEast', 'southWest');
const ANTI_DIAG_LINE = line('northWest', 'southEast');

const KING_ATTACKS = tabulate(sq => offsets(sq, ALL_DIRECTIONS.map(d => STEPS[d])));
const KNIGHT_ATTACKS = tabulate(sq => offsets(sq, KNIGHT_JUMPS));
const PAWN_ATTACKS: Record<Color, BySquare<SquareSet>> = {
  white: tabulate(sq => offsets(sq, [STEPS.northWest, STEPS.northEast])),
  black: tabulate(sq => offsets(sq, [STEPS.southWest, STEPS.southEast])),
};

export const kingAttacks = (square: Square): SquareSet => KING_ATTACKS[square];

export const knightAttacks = (square: Square): SquareSet => KNIGHT_ATTACKS[square];

/**
 * Squares a pawn of `color` on `square` attacks diagonally.
 */
export const pawnAttacks = (color: Color, square: Square): SquareSet => PAWN_ATTACKS[color][square];

/**
 * The squares from `square` to the edge of the board in one direction,
 * `square` itself excluded.
 */
export const directionRay = (direction: Direction, square: Square): SquareSet => RAYS[direction][square];

/**
 * The rays a slider of `role` on `square` moves along: four for a rook or
 * bishop, eight for a queen, rook directions first. Intersecting a ray with
 * a blocker mask gives the pieces standing on it.
 */
export const slidingRays = (role: SlidingRole, square: Square): SquareSet[] => {
  const directions = role === 'rook' ? ROOK_DIRECTIONS : role === 'bishop' ? BISHOP_DIRECTIONS : ALL_DIRECTIONS;
  return directions.map(direction => RAYS[direction][square]);
};

// Lines through `square` hold at most one bit per rank, except ranks, which
// are mirrored with a full bit reversal instead of a byte swap.
const slide = (square: Square, range: SquareSet, occupied: SquareSet, vertical: boolean): SquareSet => {
  const mirror = (set: SquareSet): SquareSet => (vertical ? set.bswap64() : set.rbit64());
  const bit = SquareSet.fromSquare(square);
  const blockers = occupied.intersect(range);
  const forward = blockers.minus64(bit);
  const reverse = mirror(blockers).minus64(mirror(bit));
  return forward.xor(mirror(reverse)).intersect(range);
};

/**
 * Squares a bishop on `square` attacks, up to and including the first
 * blocker in each direction.
 */
export const bishopAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  slide(square, DIAG_LINE[square], occupied, true).union(slide(square, ANTI_DIAG_LINE[square], occupied, true));

export const rookAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  slide(square, FILE_LINE[square], occupied, true).union(slide(square, RANK_LINE[square], occupied, false));

export const queenAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  bishopAttacks(square, occupied).union(rookAttacks(square, occupied));

export const attacks = (piece: Piece, square: Square, occupied: SquareSet): SquareSet => {
  switch (piece.role) {
    case 'pawn':
      return pawnAttacks(piece.color, square);
    case 'knight':
      return knightAttacks(square);
    case 'bishop':
      return bishopAttacks(square, occupied);
    case 'rook':
      return rookAttacks(square, occupied);
    case 'queen':
      return queenAttacks(square, occupied);
    case 'king':
      return kingAttacks(square);
  }
};

/**
 * The whole line through `a` and `b`, both included, or an empty set if
 * they share no rank, file or diagonal.
 */
export const ray = (a: Square, b: Square): SquareSet => {
  for (const range of [FILE_LINE, RANK_LINE, DIAG_LINE, ANTI_DIAG_LINE]) {
    if (range[a].has(b)) return range[a].with(a);
  }
  return SquareSet.empty();
};

/**
 * Squares strictly between `a` and `b` on a shared line, or an empty set.
 */
export const between = (a: Square, b: Square): SquareSet => {
  for (const direction of ALL_DIRECTIONS) {
    const outward = RAYS[direction][a];
    if (outward.has(b)) return outward.diff(RAYS[direction][b]).without(b);
  }
  return SquareSet.empty();
};
