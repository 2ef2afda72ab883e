export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export type FileName = (typeof FILE_NAMES)[number];

export const RANK_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export type RankName = (typeof RANK_NAMES)[number];

/**
 * A square index, from 0 (a1) to 63 (h8).
 */
export type Square = number;

export type SquareName = `${FileName}${RankName}`;

/**
 * Indexable by square indices.
 */
export type BySquare<T> = T[];

export const COLORS = ['white', 'black'] as const;

export type Color = (typeof COLORS)[number];

/**
 * Indexable by `white` and `black`.
 */
export type ByColor<T> = {
  [color in Color]: T;
};

export const ROLES = ['pawn', 'knight', 'bishop', 'rook', 'queen', 'king'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Indexable by `pawn`, `knight`, `bishop`, `rook`, `queen`, and `king`.
 */
export type ByRole<T> = {
  [role in Role]: T;
};

export const PROMOTION_ROLES = ['queen', 'rook', 'bishop', 'knight'] as const;

export type PromotionRole = (typeof PROMOTION_ROLES)[number];

export const CASTLING_SIDES = ['a', 'h'] as const;

/**
 * `a` is the queen side, `h` the king side, whatever files the rooks
 * start on.
 */
export type CastlingSide = (typeof CASTLING_SIDES)[number];

export type ByCastlingSide<T> = {
  [side in CastlingSide]: T;
};

export interface Piece {
  role: Role;
  color: Color;
}

/**
 * A move as submitted by a caller. Castling is king to own rook; a two-file
 * king step is also understood.
 */
export interface Move {
  from: Square;
  to: Square;
  promotion?: PromotionRole;
}

export type MoveKind = 'normal' | 'castle' | 'enPassant' | 'doublePush';

/**
 * A move produced by the legal-move generator of one specific position.
 */
export interface LegalMove extends Move {
  readonly kind: MoveKind;
}

/**
 * A speculative move built from pre-move destinations. Same shape as a
 * {@link LegalMove}, but never checked against a position.
 */
export interface PreMove extends Move {
  readonly kind: MoveKind;
}

/**
 * Ply index of a position: even when white is to move, odd for black.
 */
export type MoveId = number;

export type WinReason = 'checkmate' | 'resignation' | 'timeout' | 'abandonment';

export type DrawReason = 'stalemate' | 'repetition' | 'fiftyMoves' | 'insufficientMaterial' | 'agreement';

export type Outcome =
  | { winner: Color; reason: WinReason }
  | { winner: undefined; reason: DrawReason };
