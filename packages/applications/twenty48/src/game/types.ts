import { z } from 'zod';

/** Board dimension (rows and columns) */
export const BOARD_SIZE = 4;

/** Chance that a spawned tile is a 2 rather than a 4 */
export const TWO_CHANCE = 0.9;

export const DEFAULT_WIN_TILE = 2048;

export type Tile = number | null;

export const DirectionSchema = z.enum(['up', 'down', 'left', 'right']);

export type Direction = z.infer<typeof DirectionSchema>;

export const Twenty48MoveSchema = z.object({
  direction: DirectionSchema,
});

export type Twenty48Move = z.infer<typeof Twenty48MoveSchema>;

export const Twenty48OptionsSchema = z.object({
  /** Tile value that wins the game */
  winTile: z
    .number()
    .int()
    .min(4)
    .refine((value) => (value & (value - 1)) === 0, 'winTile must be a power of two')
    .default(DEFAULT_WIN_TILE),
  /** Keep playing after reaching the win tile until no move is left */
  allowContinue: z.boolean().default(false),
});

export type Twenty48Options = z.infer<typeof Twenty48OptionsSchema>;

/**
 * What a single slide did.
 */
export interface SlideResult {
  readonly moved: boolean;
  /** Points gained from merges */
  readonly gained: number;
}

export interface Twenty48Board {
  /** Row 0 is the top row */
  readonly tiles: readonly (readonly Tile[])[];
  readonly points: number;
  readonly winTile: number;
  readonly allowContinue: boolean;
  readonly reachedWinTile: boolean;
}
