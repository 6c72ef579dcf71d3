import { z } from 'zod';

/** Smallest possible secret */
export const MIN_SECRET = 1;

/** Largest possible secret */
export const MAX_SECRET = 100;

export const DEFAULT_TRIES = 7;

export const NumguessMoveSchema = z.object({
  guess: z.number().int(),
});

export type NumguessMove = z.infer<typeof NumguessMoveSchema>;

export const NumguessOptionsSchema = z.object({
  tries: z.number().int().min(1).default(DEFAULT_TRIES),
});

export type NumguessOptions = z.infer<typeof NumguessOptionsSchema>;

/**
 * How a guess compares to the secret: -1 too low, 1 too high, 0 exact;
 * -2 and 2 for guesses at or outside the current bounds.
 */
export type Comparison = -2 | -1 | 0 | 1 | 2;

export interface NumguessBoard {
  /** Exclusive lower bound */
  readonly low: number;
  /** Exclusive upper bound */
  readonly high: number;
  readonly triesLeft: number;
  readonly lastGuess: number | null;
  readonly lastResult: Comparison | null;
  /** Revealed once the game is over */
  readonly secret: number | null;
}
