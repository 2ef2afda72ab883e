import { Result } from '@badrap/result';
import { z } from 'zod';
import { BACK_RANK_COUNT } from './backrank.js';
import { PROMOTION_ROLES } from './types.js';

const squareSchema = z.number().int().min(0).max(63);

export const moveSchema = z.object({
  from: squareSchema,
  to: squareSchema,
  promotion: z.enum(PROMOTION_ROLES).optional(),
});

/**
 * A finished or ongoing game as it is stored: the back rank it started
 * from and every move since.
 */
export const gameRecordSchema = z.object({
  backRank: z.number().int().min(0).max(BACK_RANK_COUNT - 1),
  moves: z.array(moveSchema),
});

export type GameRecord = z.infer<typeof gameRecordSchema>;

export interface RecordIssue {
  path: string;
  message: string;
}

export class RecordError extends Error {
  constructor(readonly issues: RecordIssue[]) {
    super('ERR_RECORD');
    this.name = 'RecordError';
  }
}

export const parseGameRecord = (input: unknown): Result<GameRecord, RecordError> => {
  const parsed = gameRecordSchema.safeParse(input);
  if (!parsed.success) {
    return Result.err(
      new RecordError(parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))),
    );
  }
  return Result.ok(parsed.data);
};
