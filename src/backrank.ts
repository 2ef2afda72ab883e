import { Role } from './types.js';

/**
 * Index of a Chess960 starting back rank, in Scharnagl numbering.
 */
export type BackRankId = number;

export const BACK_RANK_COUNT = 960;

/**
 * `RNBQKBNR`.
 */
export const STANDARD_BACK_RANK: BackRankId = 518;

const KNIGHT_PATTERNS: readonly (readonly [number, number])[] = [
  [0, 1],
  [0, 2],
  [0, 3],
  [0, 4],
  [1, 2],
  [1, 3],
  [1, 4],
  [2, 3],
  [2, 4],
  [3, 4],
];

const ROLE_LETTERS: Record<Role, string> = {
  pawn: 'p',
  knight: 'n',
  bishop: 'b',
  rook: 'r',
  queen: 'q',
  king: 'k',
};

const computeBackRank = (id: BackRankId): readonly Role[] => {
  const rank: (Role | undefined)[] = new Array<Role | undefined>(8).fill(undefined);
  const emptyFiles = (): number[] => rank.flatMap((role, file) => (role ? [] : [file]));

  let n = id;
  rank[2 * (n % 4) + 1] = 'bishop';
  n = Math.floor(n / 4);
  rank[2 * (n % 4)] = 'bishop';
  n = Math.floor(n / 4);
  rank[emptyFiles()[n % 6]] = 'queen';
  n = Math.floor(n / 6);

  const free = emptyFiles();
  for (const index of KNIGHT_PATTERNS[n]) rank[free[index]] = 'knight';

  const [queenSideRook, king, kingSideRook] = emptyFiles();
  rank[queenSideRook] = 'rook';
  rank[king] = 'king';
  rank[kingSideRook] = 'rook';

  return rank.map(role => role ?? 'pawn');
};

let table: readonly (readonly Role[])[] | undefined;
let inverse: Map<string, BackRankId> | undefined;

const backRankTable = (): readonly (readonly Role[])[] => {
  if (!table) {
    const ranks: (readonly Role[])[] = [];
    for (let id = 0; id < BACK_RANK_COUNT; id++) ranks.push(computeBackRank(id));
    table = ranks;
  }
  return table;
};

const backRankKey = (roles: readonly Role[]): string => roles.map(role => ROLE_LETTERS[role]).join('');

export const isBackRankId = (id: number): id is BackRankId =>
  Number.isInteger(id) && 0 <= id && id < BACK_RANK_COUNT;

/**
 * Roles from the a-file to the h-file, or `undefined` if `id` is out of range.
 */
export const backRankOf = (id: BackRankId): readonly Role[] | undefined =>
  isBackRankId(id) ? backRankTable()[id] : undefined;

export const backRankIdOf = (roles: readonly Role[]): BackRankId | undefined => {
  if (!inverse) {
    inverse = new Map();
    for (const [id, rank] of backRankTable().entries()) inverse.set(backRankKey(rank), id);
  }
  return inverse.get(backRankKey(roles));
};

/**
 * Uppercase letters of the back rank, such as `RNBQKBNR` for 518.
 */
export const backRankName = (id: BackRankId): string | undefined => {
  const rank = backRankOf(id);
  return rank && backRankKey(rank).toUpperCase();
};

/**
 * Draws a back rank from `random`, expected to return values in [0, 1).
 * Values outside that range are clamped, and NaN draws id 0.
 */
export const randomBackRankId = (random: () => number = Math.random): BackRankId => {
  const id = Math.floor(random() * BACK_RANK_COUNT);
  if (Number.isNaN(id)) return 0;
  return Math.min(Math.max(id, 0), BACK_RANK_COUNT - 1);
};
