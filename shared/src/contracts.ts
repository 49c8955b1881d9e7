import { z } from 'zod';

export const SAVE_DATA_VERSION = 1;

export const GameOverReasonSchema = z.enum(['player_won', 'player_died', 'exited']);

export const Vector3TupleSchema = z.tuple([z.number(), z.number(), z.number()]);

// Column-major, the layout three.js Matrix3 stores and serializes.
export const BasisTupleSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number()
]);

export const GameSaveDataSchema = z
  .object({
    version: z.literal(SAVE_DATA_VERSION),
    savedAt: z.number(),
    numCoinsCollected: z.number().int().nonnegative(),
    numCoinsAtStart: z.number().int().nonnegative(),
    playerGlobalPosition: Vector3TupleSchema,
    cameraBasis: BasisTupleSchema
  })
  .strict();

export type GameOverReason = z.infer<typeof GameOverReasonSchema>;
export type Vector3Tuple = z.infer<typeof Vector3TupleSchema>;
export type BasisTuple = z.infer<typeof BasisTupleSchema>;
export type GameSaveData = z.infer<typeof GameSaveDataSchema>;
